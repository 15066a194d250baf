import { AuctionConfig } from "../domain/entities/auctionConfig";
import { formatIdentity } from "../domain/entities/identity";
import { PurchaseReceipt } from "../domain/entities/purchase";
import { PriceQuote } from "../application/usecases/getPrice";

// Integers leave the service as decimal strings.

export function presentConfig(config: AuctionConfig) {
  return {
    admin: formatIdentity(config.admin),
    paymentAssetId: config.paymentAssetId,
    prizeAssetId: config.prizeAssetId,
    startingPrice: config.startingPrice.toString(),
    minimumPrice: config.minimumPrice.toString(),
    decayRate: config.decayRate.toString(),
    startTime: config.startTime.toString()
  };
}

export function presentReceipt(receipt: PurchaseReceipt) {
  return {
    buyer: formatIdentity(receipt.buyer),
    price: receipt.price.toString(),
    prizeAmount: receipt.prizeAmount.toString(),
    purchasedAt: receipt.purchasedAt.toString()
  };
}

export function presentQuote(quote: PriceQuote) {
  return {
    price: quote.price.toString(),
    quotedAt: quote.quotedAt.toString(),
    floorReachedAt: quote.floorReachedAt.toString()
  };
}
