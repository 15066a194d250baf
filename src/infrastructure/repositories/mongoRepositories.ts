import { ObjectId } from "mongodb";
import { AssetId } from "../../domain/entities/asset";
import { Identity, formatIdentity } from "../../domain/entities/identity";
import { DataKey, encodeDataKey } from "../../domain/entities/stateKey";
import {
  IdempotencyRecord,
  IdempotencyRepository,
  StateStore,
  StateValue,
  TokenBalanceRepository,
  TransactionManager
} from "../../application/ports/repositories";
import { getCollections, withMongoSession } from "../db/mongo";
import { sessionOptions } from "../db/transactionContext";

function mapId(id: ObjectId): string {
  return id.toHexString();
}

export class MongoIdempotencyRepository implements IdempotencyRepository {
  async find(key: string, scope: string): Promise<IdempotencyRecord | null> {
    const { idempotency } = await getCollections();
    const doc = await idempotency.findOne({ key, scope }, sessionOptions());
    if (!doc) {
      return null;
    }
    return {
      id: mapId(doc._id),
      key: doc.key,
      scope: doc.scope,
      status: doc.status,
      response: doc.response,
      createdAt: doc.createdAt
    } satisfies IdempotencyRecord;
  }

  async reserve(key: string, scope: string): Promise<boolean> {
    const { idempotency } = await getCollections();
    const result = await idempotency.updateOne(
      { key, scope },
      {
        $setOnInsert: {
          key,
          scope,
          status: 0,
          response: null,
          createdAt: new Date()
        }
      },
      { upsert: true, ...sessionOptions() }
    );
    return Boolean(result.upsertedCount);
  }

  async finalize(key: string, scope: string, status: number, response: unknown): Promise<void> {
    const { idempotency } = await getCollections();
    await idempotency.updateOne({ key, scope }, { $set: { status, response } }, sessionOptions());
  }
}

export class MongoTransactionManager implements TransactionManager {
  async withTransaction<T>(handler: () => Promise<T>): Promise<T> {
    return withMongoSession(async () => handler());
  }
}

export class MongoStateStore implements StateStore {
  constructor(private readonly contractId: string) {}

  async get(key: DataKey): Promise<StateValue | null> {
    const { state } = await getCollections();
    const doc = await state.findOne(
      { contractId: this.contractId, key: encodeDataKey(key) },
      sessionOptions()
    );
    return doc ? doc.value : null;
  }

  async set(key: DataKey, value: StateValue): Promise<void> {
    const { state } = await getCollections();
    await state.updateOne(
      { contractId: this.contractId, key: encodeDataKey(key) },
      { $set: { value } },
      { upsert: true, ...sessionOptions() }
    );
  }

  async has(key: DataKey): Promise<boolean> {
    const { state } = await getCollections();
    const count = await state.countDocuments(
      { contractId: this.contractId, key: encodeDataKey(key) },
      { limit: 1, ...sessionOptions() }
    );
    return count > 0;
  }
}

// Amounts are stored as decimal strings; arithmetic happens in the caller's
// transaction, which makes read-modify-write safe.
export class MongoTokenBalanceRepository implements TokenBalanceRepository {
  async getBalance(assetId: AssetId, holder: Identity): Promise<bigint> {
    const { balances } = await getCollections();
    const doc = await balances.findOne(
      { assetId, holder: formatIdentity(holder) },
      sessionOptions()
    );
    return doc ? BigInt(doc.amount) : 0n;
  }

  async setBalance(assetId: AssetId, holder: Identity, amount: bigint): Promise<void> {
    const { balances } = await getCollections();
    await balances.updateOne(
      { assetId, holder: formatIdentity(holder) },
      { $set: { amount: amount.toString() } },
      { upsert: true, ...sessionOptions() }
    );
  }

  async getAllowance(assetId: AssetId, owner: Identity, spender: Identity): Promise<bigint> {
    const { allowances } = await getCollections();
    const doc = await allowances.findOne(
      { assetId, owner: formatIdentity(owner), spender: formatIdentity(spender) },
      sessionOptions()
    );
    return doc ? BigInt(doc.amount) : 0n;
  }

  async setAllowance(
    assetId: AssetId,
    owner: Identity,
    spender: Identity,
    amount: bigint
  ): Promise<void> {
    const { allowances } = await getCollections();
    await allowances.updateOne(
      { assetId, owner: formatIdentity(owner), spender: formatIdentity(spender) },
      { $set: { amount: amount.toString() } },
      { upsert: true, ...sessionOptions() }
    );
  }
}
