import { AssetId } from "../../domain/entities/asset";
import { Identity } from "../../domain/entities/identity";
import { DataKey } from "../../domain/entities/stateKey";

export type StateValue = string;

/** Key/value storage scoped to one contract instance. */
export interface StateStore {
  get(key: DataKey): Promise<StateValue | null>;
  set(key: DataKey, value: StateValue): Promise<void>;
  has(key: DataKey): Promise<boolean>;
}

export interface TokenBalanceRepository {
  getBalance(assetId: AssetId, holder: Identity): Promise<bigint>;
  setBalance(assetId: AssetId, holder: Identity, amount: bigint): Promise<void>;
  getAllowance(assetId: AssetId, owner: Identity, spender: Identity): Promise<bigint>;
  setAllowance(assetId: AssetId, owner: Identity, spender: Identity, amount: bigint): Promise<void>;
}

export interface TransactionManager {
  withTransaction<T>(handler: () => Promise<T>): Promise<T>;
}

export type IdempotencyRecord = {
  id: string;
  key: string;
  scope: string;
  status: number;
  response: unknown;
  createdAt: Date;
};

export interface IdempotencyRepository {
  find(key: string, scope: string): Promise<IdempotencyRecord | null>;
  reserve(key: string, scope: string): Promise<boolean>;
  finalize(key: string, scope: string, status: number, response: unknown): Promise<void>;
}
