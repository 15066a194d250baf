import { AssetId } from "../../domain/entities/asset";
import { Identity } from "../../domain/entities/identity";
import { AppError } from "../errors";
import { TransactionManager } from "../ports/repositories";
import { TokenService } from "../ports/services";

export class MintTokensUseCase {
  constructor(
    private readonly tokens: TokenService,
    private readonly tx: TransactionManager
  ) {}

  async execute(assetId: AssetId, to: Identity, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new AppError("Amount must be positive", 400, "INVALID_AMOUNT");
    }
    await this.tx.withTransaction(async () => {
      await this.tokens.client(assetId).mint(to, amount);
    });
  }
}
