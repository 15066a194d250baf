import { AssetId } from "../../domain/entities/asset";
import { Identity } from "../../domain/entities/identity";
import { TransactionManager } from "../ports/repositories";
import { TokenService } from "../ports/services";

export type ApproveSpenderInput = {
  assetId: AssetId;
  owner: Identity;
  spender: Identity;
  amount: bigint;
};

// Sets, not adds to, the owner's allowance for the spender.
export class ApproveSpenderUseCase {
  constructor(
    private readonly tokens: TokenService,
    private readonly tx: TransactionManager
  ) {}

  async execute(input: ApproveSpenderInput): Promise<void> {
    await this.tx.withTransaction(async () => {
      await this.tokens
        .client(input.assetId)
        .approve({ kind: "invoker", invoker: input.owner }, 0n, input.spender, input.amount);
    });
  }
}
