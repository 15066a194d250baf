import { Router, Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { AppError, contractFundsLocked } from "../../application/errors";
import { IdempotencyRepository } from "../../application/ports/repositories";
import { TokenService } from "../../application/ports/services";
import { InitializeAuctionUseCase } from "../../application/usecases/initializeAuction";
import { GetPriceUseCase } from "../../application/usecases/getPrice";
import { ReadNonceUseCase } from "../../application/usecases/readNonce";
import { BuyUseCase } from "../../application/usecases/buy";
import { MintTokensUseCase } from "../../application/usecases/mintTokens";
import { ApproveSpenderUseCase } from "../../application/usecases/approveSpender";
import { TransferTokensUseCase } from "../../application/usecases/transferTokens";
import { amountSchema, assetIdSchema } from "../../domain/entities/asset";
import { Identity, formatIdentity, identitySchema, sameIdentity } from "../../domain/entities/identity";
import { logError } from "../../infrastructure/logging/logger";
import { presentConfig, presentQuote, presentReceipt } from "../serializers";

export type RouterDependencies = {
  contract: Identity;
  initializeAuction: InitializeAuctionUseCase;
  getPrice: GetPriceUseCase;
  readNonce: ReadNonceUseCase;
  buy: BuyUseCase;
  mintTokens: MintTokensUseCase;
  approveSpender: ApproveSpenderUseCase;
  transferTokens: TransferTokensUseCase;
  tokens: TokenService;
  idempotency: IdempotencyRepository;
  adminToken: string;
  buyRateLimiter?: RequestHandler;
};

type HandlerResult = { status: number; body: unknown };

const passThrough: RequestHandler = (_req, _res, next) => next();

export function createRouter(deps: RouterDependencies): Router {
  const router = Router();

  const adminGuard = (req: Request, res: Response, next: NextFunction) => {
    if (!deps.adminToken) {
      return next();
    }
    const token = req.header("x-admin-token");
    if (!token || token !== deps.adminToken) {
      return res.status(401).json({ error: "UNAUTHORIZED", message: "Invalid admin token" });
    }
    return next();
  };

  const ensureNotContract = (holder: Identity) => {
    if (sameIdentity(holder, deps.contract)) {
      throw contractFundsLocked();
    }
  };

  const buildIdempotencyResponse = (error: unknown, scope: string): HandlerResult => {
    if (error instanceof AppError) {
      return { status: error.status, body: { error: error.code, message: error.message } };
    }
    logError("http.unhandled_error", error, { scope });
    return { status: 500, body: { error: "INTERNAL_SERVER_ERROR" } };
  };

  const withIdempotency = async (
    key: string | undefined,
    scope: string,
    handler: () => Promise<HandlerResult>
  ): Promise<HandlerResult> => {
    if (!key) {
      return handler();
    }
    const existing = await deps.idempotency.find(key, scope);
    if (existing && existing.status !== 0) {
      return { status: existing.status, body: existing.response };
    }
    const reserved = await deps.idempotency.reserve(key, scope);
    if (!reserved) {
      const stored = await deps.idempotency.find(key, scope);
      if (stored && stored.status !== 0) {
        return { status: stored.status, body: stored.response };
      }
      throw new AppError("Idempotency key is already in progress", 409, "IDEMPOTENCY_IN_PROGRESS");
    }
    try {
      const result = await handler();
      await deps.idempotency.finalize(key, scope, result.status, result.body);
      return result;
    } catch (error) {
      const fallback = buildIdempotencyResponse(error, scope);
      await deps.idempotency.finalize(key, scope, fallback.status, fallback.body);
      return fallback;
    }
  };

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  router.get("/contract", (_req: Request, res: Response) => {
    res.json({ contractId: deps.contract.id, identity: formatIdentity(deps.contract) });
  });

  router.post("/contract/initialize", adminGuard, async (req, res, next) => {
    try {
      const input = z
        .object({
          admin: identitySchema,
          paymentAssetId: assetIdSchema,
          prizeAssetId: assetIdSchema,
          startingPrice: amountSchema,
          minimumPrice: amountSchema,
          decayRate: amountSchema
        })
        .parse(req.body);
      const config = await deps.initializeAuction.execute(input);
      res.status(201).json(presentConfig(config));
    } catch (error) {
      next(error);
    }
  });

  router.get("/contract/price", async (_req, res, next) => {
    try {
      const quote = await deps.getPrice.execute();
      res.json(presentQuote(quote));
    } catch (error) {
      next(error);
    }
  });

  router.get("/contract/nonce", async (_req, res, next) => {
    try {
      const nonce = await deps.readNonce.execute();
      res.json({ nonce: nonce.toString() });
    } catch (error) {
      next(error);
    }
  });

  router.post("/contract/buy", deps.buyRateLimiter ?? passThrough, async (req, res, next) => {
    try {
      const body = z.object({ buyer: identitySchema }).parse(req.body);
      const idempotencyKey = req.header("x-idempotency-key") ?? undefined;
      const result = await withIdempotency(
        idempotencyKey,
        `buy:${formatIdentity(body.buyer)}`,
        async () => {
          const receipt = await deps.buy.execute(body.buyer);
          return { status: 200, body: presentReceipt(receipt) };
        }
      );
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  router.post("/tokens/:assetId/mint", adminGuard, async (req, res, next) => {
    try {
      const { assetId } = z.object({ assetId: assetIdSchema }).parse(req.params);
      const body = z.object({ to: identitySchema, amount: amountSchema }).parse(req.body);
      const idempotencyKey = req.header("x-idempotency-key") ?? undefined;
      const result = await withIdempotency(
        idempotencyKey,
        `mint:${assetId}:${formatIdentity(body.to)}`,
        async () => {
          await deps.mintTokens.execute(assetId, body.to, body.amount);
          return { status: 201, body: { status: "minted" } };
        }
      );
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  router.post("/tokens/:assetId/approve", adminGuard, async (req, res, next) => {
    try {
      const { assetId } = z.object({ assetId: assetIdSchema }).parse(req.params);
      const body = z
        .object({ owner: identitySchema, spender: identitySchema, amount: amountSchema })
        .parse(req.body);
      ensureNotContract(body.owner);
      await deps.approveSpender.execute({ assetId, ...body });
      res.json({ status: "approved" });
    } catch (error) {
      next(error);
    }
  });

  router.post("/tokens/:assetId/transfer", adminGuard, async (req, res, next) => {
    try {
      const { assetId } = z.object({ assetId: assetIdSchema }).parse(req.params);
      const body = z
        .object({ from: identitySchema, to: identitySchema, amount: amountSchema })
        .parse(req.body);
      ensureNotContract(body.from);
      const idempotencyKey = req.header("x-idempotency-key") ?? undefined;
      const result = await withIdempotency(
        idempotencyKey,
        `transfer:${assetId}:${formatIdentity(body.from)}`,
        async () => {
          await deps.transferTokens.execute({ assetId, ...body });
          return { status: 200, body: { status: "transferred" } };
        }
      );
      res.status(result.status).json(result.body);
    } catch (error) {
      next(error);
    }
  });

  router.get("/tokens/:assetId/balance/:identity", async (req, res, next) => {
    try {
      const params = z
        .object({ assetId: assetIdSchema, identity: identitySchema })
        .parse(req.params);
      const balance = await deps.tokens.client(params.assetId).balance(params.identity);
      res.json({
        assetId: params.assetId,
        identity: formatIdentity(params.identity),
        balance: balance.toString()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
