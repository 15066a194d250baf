import { AssetId } from "./asset";
import { Identity } from "./identity";

export interface AuctionConfig {
  admin: Identity;
  paymentAssetId: AssetId;
  prizeAssetId: AssetId;
  startingPrice: bigint;
  minimumPrice: bigint;
  /** Seconds of elapsed time that lower the price by one unit. */
  decayRate: bigint;
  /** Ledger time, in seconds, captured at initialization. */
  startTime: bigint;
}

export type PricingParams = Pick<
  AuctionConfig,
  "startingPrice" | "minimumPrice" | "decayRate" | "startTime"
>;
