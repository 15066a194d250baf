import { MongoClient, Db, ClientSession, Collection } from "mongodb";
import { env } from "../../config/env";
import { runWithSession } from "./transactionContext";

let client: MongoClient | null = null;
let db: Db | null = null;

export type StateDocument = {
  contractId: string;
  key: string;
  value: string;
};

export type BalanceDocument = {
  assetId: string;
  holder: string;
  amount: string;
};

export type AllowanceDocument = {
  assetId: string;
  owner: string;
  spender: string;
  amount: string;
};

export type IdempotencyDocument = {
  key: string;
  scope: string;
  status: number;
  response: unknown;
  createdAt: Date;
};

export async function connectMongo(): Promise<Db> {
  if (db) {
    return db;
  }
  client = new MongoClient(env.MONGO_URI);
  await client.connect();
  db = client.db();
  return db;
}

export async function getDb(): Promise<Db> {
  return await connectMongo();
}

export async function closeMongo(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  db = null;
}

export async function withMongoSession<T>(handler: (session: ClientSession) => Promise<T>): Promise<T> {
  if (!client) {
    await connectMongo();
  }
  if (!client) {
    throw new Error("Mongo client not initialized");
  }
  const session = client.startSession();
  try {
    const results: T[] = [];
    await session.withTransaction(async () => {
      // withTransaction may retry the callback on transient errors
      results.length = 0;
      results.push(await runWithSession(session, async () => handler(session)));
    });
    if (results.length === 0) {
      throw new Error("Transaction finished without a result");
    }
    return results[0];
  } finally {
    await session.endSession();
  }
}

export type Collections = {
  state: Collection<StateDocument>;
  balances: Collection<BalanceDocument>;
  allowances: Collection<AllowanceDocument>;
  idempotency: Collection<IdempotencyDocument>;
};

export async function getCollections(): Promise<Collections> {
  const database = await getDb();
  return {
    state: database.collection<StateDocument>("contract_state"),
    balances: database.collection<BalanceDocument>("token_balances"),
    allowances: database.collection<AllowanceDocument>("token_allowances"),
    idempotency: database.collection<IdempotencyDocument>("idempotency")
  };
}

export async function ensureIndexes(): Promise<void> {
  const { state, balances, allowances, idempotency } = await getCollections();
  await state.createIndex({ contractId: 1, key: 1 }, { unique: true });
  await balances.createIndex({ assetId: 1, holder: 1 }, { unique: true });
  await allowances.createIndex({ assetId: 1, owner: 1, spender: 1 }, { unique: true });
  await idempotency.createIndex({ key: 1, scope: 1 }, { unique: true });
}
