import { AssetId } from "../../domain/entities/asset";
import { Identity } from "../../domain/entities/identity";
import { TransactionManager } from "../ports/repositories";
import { TokenService } from "../ports/services";

export type TransferTokensInput = {
  assetId: AssetId;
  from: Identity;
  to: Identity;
  amount: bigint;
};

export class TransferTokensUseCase {
  constructor(
    private readonly tokens: TokenService,
    private readonly tx: TransactionManager
  ) {}

  async execute(input: TransferTokensInput): Promise<void> {
    await this.tx.withTransaction(async () => {
      await this.tokens
        .client(input.assetId)
        .transfer({ kind: "invoker", invoker: input.from }, 0n, input.to, input.amount);
    });
  }
}
