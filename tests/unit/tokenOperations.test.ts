import { describe, it, expect, beforeEach } from "vitest";
import { MintTokensUseCase } from "../../src/application/usecases/mintTokens";
import { ApproveSpenderUseCase } from "../../src/application/usecases/approveSpender";
import { TransferTokensUseCase } from "../../src/application/usecases/transferTokens";
import { BUYER, CONTRACT, PAYMENT_ASSET, PRIZE_ASSET, ADMIN, createTestContract, TestContract } from "../mocks/contract";
import { readAllowance, readBalance, seedBalance } from "../mocks/repositories";

describe("token operations", () => {
  let contract: TestContract;

  beforeEach(() => {
    contract = createTestContract();
  });

  describe("MintTokensUseCase", () => {
    it("credits the recipient inside a transaction", async () => {
      const useCase = new MintTokensUseCase(contract.tokens, contract.tx);

      await useCase.execute(PAYMENT_ASSET, BUYER, 1000n);

      expect(readBalance(contract.storage, PAYMENT_ASSET, BUYER)).toBe(1000n);
      expect(contract.tx.committed).toBe(1);
    });

    it("throws error for non-positive amount", async () => {
      const useCase = new MintTokensUseCase(contract.tokens, contract.tx);

      await expect(useCase.execute(PAYMENT_ASSET, BUYER, 0n)).rejects.toMatchObject({
        code: "INVALID_AMOUNT",
        status: 400
      });
    });
  });

  describe("ApproveSpenderUseCase", () => {
    it("records the owner's allowance for the spender", async () => {
      const useCase = new ApproveSpenderUseCase(contract.tokens, contract.tx);

      await useCase.execute({ assetId: PAYMENT_ASSET, owner: BUYER, spender: CONTRACT, amount: 3n });

      expect(readAllowance(contract.storage, PAYMENT_ASSET, BUYER, CONTRACT)).toBe(3n);
    });
  });

  describe("TransferTokensUseCase", () => {
    it("deposits the prize stock into the contract", async () => {
      seedBalance(contract.storage, PRIZE_ASSET, ADMIN, 10n);
      const useCase = new TransferTokensUseCase(contract.tokens, contract.tx);

      await useCase.execute({ assetId: PRIZE_ASSET, from: ADMIN, to: CONTRACT, amount: 10n });

      expect(readBalance(contract.storage, PRIZE_ASSET, CONTRACT)).toBe(10n);
      expect(readBalance(contract.storage, PRIZE_ASSET, ADMIN)).toBe(0n);
    });

    it("rolls back on insufficient balance", async () => {
      seedBalance(contract.storage, PRIZE_ASSET, ADMIN, 1n);
      const useCase = new TransferTokensUseCase(contract.tokens, contract.tx);

      await expect(
        useCase.execute({ assetId: PRIZE_ASSET, from: ADMIN, to: CONTRACT, amount: 2n })
      ).rejects.toMatchObject({ code: "TRANSFER_REJECTED" });
      expect(contract.tx.rolledBack).toBe(1);
      expect(readBalance(contract.storage, PRIZE_ASSET, ADMIN)).toBe(1n);
    });
  });
});
