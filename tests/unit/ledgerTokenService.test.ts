import { describe, it, expect, beforeEach } from "vitest";
import { LedgerTokenService } from "../../src/application/tokens/ledgerTokenService";
import { TokenAuthorization, TokenClient } from "../../src/application/ports/services";
import { Identity } from "../../src/domain/entities/identity";
import {
  createMockStorage,
  createMockTokenBalanceRepository,
  readAllowance,
  readBalance,
  seedAllowance,
  seedBalance,
  MockStorage
} from "../mocks/repositories";

const ASSET = "33".repeat(32);
const alice: Identity = { kind: "account", id: "alice" };
const bob: Identity = { kind: "account", id: "bob" };
const spender: Identity = { kind: "contract", id: "spender" };

const invokedBy = (invoker: Identity): TokenAuthorization => ({ kind: "invoker", invoker });

describe("LedgerTokenClient", () => {
  let storage: MockStorage;
  let token: TokenClient;

  beforeEach(() => {
    storage = createMockStorage();
    token = new LedgerTokenService(createMockTokenBalanceRepository(storage)).client(ASSET);
  });

  describe("transfer", () => {
    it("moves funds from the invoker", async () => {
      seedBalance(storage, ASSET, alice, 50n);

      await token.transfer(invokedBy(alice), 0n, bob, 20n);

      expect(readBalance(storage, ASSET, alice)).toBe(30n);
      expect(readBalance(storage, ASSET, bob)).toBe(20n);
    });

    it("allows a zero amount from an empty balance", async () => {
      await token.transfer(invokedBy(alice), 0n, bob, 0n);

      expect(readBalance(storage, ASSET, bob)).toBe(0n);
    });

    it("leaves the balance alone when sending to oneself", async () => {
      seedBalance(storage, ASSET, alice, 50n);

      await token.transfer(invokedBy(alice), 0n, alice, 50n);

      expect(readBalance(storage, ASSET, alice)).toBe(50n);
    });

    it("rejects insufficient balance", async () => {
      seedBalance(storage, ASSET, alice, 5n);

      await expect(token.transfer(invokedBy(alice), 0n, bob, 6n)).rejects.toMatchObject({
        code: "TRANSFER_REJECTED"
      });
      expect(readBalance(storage, ASSET, alice)).toBe(5n);
    });

    it("rejects a non-zero nonce and a negative amount", async () => {
      seedBalance(storage, ASSET, alice, 5n);

      await expect(token.transfer(invokedBy(alice), 1n, bob, 1n)).rejects.toThrow(
        "Transfer rejected: invoker authorization requires a zero nonce"
      );
      await expect(token.transfer(invokedBy(alice), 0n, bob, -1n)).rejects.toThrow(
        "Transfer rejected: amount must not be negative"
      );
    });
  });

  describe("approve and transferFrom", () => {
    it("sets the allowance rather than adding to it", async () => {
      await token.approve(invokedBy(alice), 0n, spender, 10n);
      await token.approve(invokedBy(alice), 0n, spender, 4n);

      expect(await token.allowance(alice, spender)).toBe(4n);
    });

    it("moves funds within the allowance and consumes it", async () => {
      seedBalance(storage, ASSET, alice, 100n);
      seedAllowance(storage, ASSET, alice, spender, 30n);

      await token.transferFrom(invokedBy(spender), 0n, alice, bob, 25n);

      expect(readBalance(storage, ASSET, alice)).toBe(75n);
      expect(readBalance(storage, ASSET, bob)).toBe(25n);
      expect(readAllowance(storage, ASSET, alice, spender)).toBe(5n);
    });

    it("rejects an amount above the allowance", async () => {
      seedBalance(storage, ASSET, alice, 100n);
      seedAllowance(storage, ASSET, alice, spender, 2n);

      await expect(token.transferFrom(invokedBy(spender), 0n, alice, bob, 3n)).rejects.toThrow(
        "Transfer rejected: allowance 2 is below 3"
      );
      expect(readBalance(storage, ASSET, alice)).toBe(100n);
    });

    it("only honours allowances granted to the invoker", async () => {
      seedBalance(storage, ASSET, alice, 100n);
      seedAllowance(storage, ASSET, alice, spender, 50n);

      await expect(token.transferFrom(invokedBy(bob), 0n, alice, bob, 10n)).rejects.toMatchObject({
        code: "TRANSFER_REJECTED"
      });
    });
  });

  describe("mint and balance", () => {
    it("adds to the holder's balance", async () => {
      await token.mint(alice, 10n);
      await token.mint(alice, 5n);

      expect(await token.balance(alice)).toBe(15n);
    });

    it("keeps balances per asset", async () => {
      const other = new LedgerTokenService(createMockTokenBalanceRepository(storage)).client("44".repeat(32));
      await token.mint(alice, 10n);

      expect(await other.balance(alice)).toBe(0n);
    });
  });
});
