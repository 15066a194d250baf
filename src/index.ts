import http from "node:http";
import { env } from "./config/env";
import { Identity } from "./domain/entities/identity";
import { closeMongo, connectMongo, ensureIndexes } from "./infrastructure/db/mongo";
import {
  MongoIdempotencyRepository,
  MongoStateStore,
  MongoTokenBalanceRepository,
  MongoTransactionManager
} from "./infrastructure/repositories/mongoRepositories";
import { closeRedis, getRedis } from "./infrastructure/cache/redis";
import { RedisDistributedLock } from "./infrastructure/locks/redlock";
import { SystemLedgerClock } from "./infrastructure/clock/systemClock";
import { createApp } from "./presentation/http/app";
import { rateLimiter } from "./presentation/http/rateLimiter";
import { initSocketServer, SocketPublisher } from "./presentation/ws/socket";
import { ContractRuntime } from "./application/contractRuntime";
import { LedgerTokenService } from "./application/tokens/ledgerTokenService";
import { InitializeAuctionUseCase } from "./application/usecases/initializeAuction";
import { GetPriceUseCase } from "./application/usecases/getPrice";
import { ReadNonceUseCase } from "./application/usecases/readNonce";
import { BuyUseCase } from "./application/usecases/buy";
import { MintTokensUseCase } from "./application/usecases/mintTokens";
import { ApproveSpenderUseCase } from "./application/usecases/approveSpender";
import { TransferTokensUseCase } from "./application/usecases/transferTokens";
import { log, logError, setLogLevel } from "./infrastructure/logging/logger";

async function bootstrap() {
  setLogLevel(env.LOG_LEVEL);
  await connectMongo();
  await ensureIndexes();

  const contract: Identity = { kind: "contract", id: env.CONTRACT_ID };
  const redis = getRedis();

  const tx = new MongoTransactionManager();
  const store = new MongoStateStore(env.CONTRACT_ID);
  const idempotency = new MongoIdempotencyRepository();
  const tokens = new LedgerTokenService(new MongoTokenBalanceRepository());
  const lock = new RedisDistributedLock(redis);
  const clock = new SystemLedgerClock();
  const runtime = new ContractRuntime(contract, store, tx, lock, env.INVOCATION_LOCK_TTL_MS);

  const server = http.createServer();
  const io = initSocketServer(server, env.CORS_ORIGIN, env.CONTRACT_ID);
  const realtime = new SocketPublisher(io);

  const app = createApp(
    {
      contract,
      initializeAuction: new InitializeAuctionUseCase(runtime, clock, realtime),
      getPrice: new GetPriceUseCase(runtime, clock),
      readNonce: new ReadNonceUseCase(runtime),
      buy: new BuyUseCase(runtime, tokens, clock, realtime),
      mintTokens: new MintTokensUseCase(tokens, tx),
      approveSpender: new ApproveSpenderUseCase(tokens, tx),
      transferTokens: new TransferTokensUseCase(tokens, tx),
      tokens,
      idempotency,
      adminToken: env.ADMIN_TOKEN,
      buyRateLimiter: rateLimiter({
        redis,
        windowMs: env.BUY_RATE_LIMIT_WINDOW_MS,
        maxRequests: env.BUY_RATE_LIMIT_MAX,
        keyPrefix: `ratelimit:buy:${env.CONTRACT_ID}`,
        extractId: (req) => {
          const body: unknown = req.body;
          if (body && typeof body === "object" && "buyer" in body && typeof body.buyer === "string") {
            return body.buyer;
          }
          return req.ip ?? null;
        }
      })
    },
    env.CORS_ORIGIN
  );
  server.on("request", (req, res) => {
    if (req.url?.startsWith("/socket.io")) {
      return;
    }
    app(req, res);
  });

  server.listen(env.PORT, () => {
    log("info", "server.started", { port: env.PORT, contract: `contract:${env.CONTRACT_ID}` });
  });

  const shutdown = async (signal: string) => {
    log("info", "server.stopping", { signal });
    await new Promise<void>((resolve) => io.close(() => resolve()));
    await closeRedis();
    await closeMongo();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error) => {
          logError("server.shutdown_failed", error);
          process.exit(1);
        });
    });
  }
}

bootstrap().catch((error) => {
  logError("server.bootstrap_failed", error);
  process.exit(1);
});
