import { Identity, formatIdentity } from "../../domain/entities/identity";
import { PurchaseReceipt } from "../../domain/entities/purchase";
import { computePrice } from "../../domain/services/pricing";
import { log } from "../../infrastructure/logging/logger";
import { ContractRuntime } from "../contractRuntime";
import { LedgerClock, RealtimePublisher, TokenService } from "../ports/services";

export class BuyUseCase {
  constructor(
    private readonly runtime: ContractRuntime,
    private readonly tokens: TokenService,
    private readonly clock: LedgerClock,
    private readonly realtime: RealtimePublisher
  ) {}

  async execute(buyer: Identity): Promise<PurchaseReceipt> {
    const receipt = await this.runtime.invoke(async (state) => {
      const config = await state.readConfig();
      const now = this.clock.timestamp();
      const price = computePrice(config, now);

      // Payment settles before the prize is released.
      const payment = this.tokens.client(config.paymentAssetId);
      await payment.transferFrom(this.runtime.invoker, 0n, buyer, config.admin, price);

      // No closed state: once emptied, later buys pay the floor for a zero-amount prize.
      const prize = this.tokens.client(config.prizeAssetId);
      const prizeAmount = await prize.balance(this.runtime.contract);
      await prize.transfer(this.runtime.invoker, 0n, buyer, prizeAmount);

      return { buyer, price, prizeAmount, purchasedAt: now } satisfies PurchaseReceipt;
    });

    log("info", "auction.purchased", {
      contractId: this.runtime.contract.id,
      buyer: formatIdentity(buyer),
      price: receipt.price.toString(),
      prizeAmount: receipt.prizeAmount.toString()
    });
    this.realtime.publish({ type: "auction:purchased", contractId: this.runtime.contract.id, receipt });
    return receipt;
  }
}
