import { AssetId } from "../../domain/entities/asset";
import { AuctionConfig } from "../../domain/entities/auctionConfig";
import { Identity } from "../../domain/entities/identity";
import { PurchaseReceipt } from "../../domain/entities/purchase";

/** Consent of the calling identity to move its own funds. */
export type TokenAuthorization = { kind: "invoker"; invoker: Identity };

export interface TokenClient {
  readonly assetId: AssetId;
  balance(holder: Identity): Promise<bigint>;
  allowance(owner: Identity, spender: Identity): Promise<bigint>;
  approve(auth: TokenAuthorization, nonce: bigint, spender: Identity, amount: bigint): Promise<void>;
  transfer(auth: TokenAuthorization, nonce: bigint, to: Identity, amount: bigint): Promise<void>;
  transferFrom(
    auth: TokenAuthorization,
    nonce: bigint,
    from: Identity,
    to: Identity,
    amount: bigint
  ): Promise<void>;
  mint(to: Identity, amount: bigint): Promise<void>;
}

export interface TokenService {
  client(assetId: AssetId): TokenClient;
}

/** Monotonically non-decreasing ledger time in whole seconds. */
export interface LedgerClock {
  timestamp(): bigint;
}

export interface DistributedLock {
  withLock<T>(resource: string, ttlMs: number, handler: () => Promise<T>): Promise<T>;
}

export type RealtimeEvent =
  | { type: "auction:initialized"; contractId: string; config: AuctionConfig }
  | { type: "auction:purchased"; contractId: string; receipt: PurchaseReceipt };

export interface RealtimePublisher {
  publish(event: RealtimeEvent): void;
}
