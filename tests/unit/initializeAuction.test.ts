import { describe, it, expect, beforeEach } from "vitest";
import { InitializeAuctionUseCase } from "../../src/application/usecases/initializeAuction";
import { AppError } from "../../src/application/errors";
import {
  ADMIN,
  CONTRACT,
  LOCK_TTL_MS,
  START_TIME,
  createTestContract,
  defaultAuctionInput,
  TestContract
} from "../mocks/contract";

describe("InitializeAuctionUseCase", () => {
  let contract: TestContract;
  let useCase: InitializeAuctionUseCase;

  beforeEach(() => {
    contract = createTestContract();
    useCase = new InitializeAuctionUseCase(contract.runtime, contract.clock, contract.realtime);
  });

  describe("first call", () => {
    it("stores the configuration with the current ledger time", async () => {
      const config = await useCase.execute(defaultAuctionInput);

      expect(config).toEqual({ ...defaultAuctionInput, startTime: START_TIME });
      expect(await contract.runtime.state.readConfig()).toEqual(config);
    });

    it("runs under the contract lock inside one transaction", async () => {
      await useCase.execute(defaultAuctionInput);

      expect(contract.lock.acquired).toEqual([
        { resource: `lock:contract:${CONTRACT.id}`, ttlMs: LOCK_TTL_MS }
      ]);
      expect(contract.tx.committed).toBe(1);
    });

    it("publishes an initialized event", async () => {
      const config = await useCase.execute(defaultAuctionInput);

      expect(contract.realtime._events).toEqual([
        { type: "auction:initialized", contractId: CONTRACT.id, config }
      ]);
    });

    it("accepts a floor above the starting price and a zero decay rate unchecked", async () => {
      const config = await useCase.execute({
        ...defaultAuctionInput,
        startingPrice: 1n,
        minimumPrice: 10n,
        decayRate: 0n
      });

      expect(config.minimumPrice).toBe(10n);
      expect(config.decayRate).toBe(0n);
    });
  });

  describe("second call", () => {
    it("fails with ALREADY_INITIALIZED", async () => {
      await useCase.execute(defaultAuctionInput);

      const error = await useCase
        .execute({ ...defaultAuctionInput, admin: { kind: "account", id: "intruder" } })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({ code: "ALREADY_INITIALIZED", status: 409 });
    });

    it("leaves the original configuration unchanged", async () => {
      await useCase.execute(defaultAuctionInput);
      contract.clock.advance(60n);

      await expect(
        useCase.execute({ ...defaultAuctionInput, startingPrice: 99n, admin: { kind: "account", id: "intruder" } })
      ).rejects.toThrow("Auction is already initialized");

      const config = await contract.runtime.state.readConfig();
      expect(config.admin).toEqual(ADMIN);
      expect(config.startingPrice).toBe(5n);
      expect(config.startTime).toBe(START_TIME);
      expect(contract.tx.rolledBack).toBe(1);
      expect(contract.realtime._events).toHaveLength(1);
    });
  });
});
