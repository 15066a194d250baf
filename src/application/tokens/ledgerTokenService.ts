import { AssetId } from "../../domain/entities/asset";
import { Identity, sameIdentity } from "../../domain/entities/identity";
import { transferRejected } from "../errors";
import { TokenBalanceRepository } from "../ports/repositories";
import { TokenAuthorization, TokenClient, TokenService } from "../ports/services";

// Movements must run inside the caller's transaction; the repository reads and
// writes through whatever session is active.
export class LedgerTokenClient implements TokenClient {
  constructor(
    readonly assetId: AssetId,
    private readonly balances: TokenBalanceRepository
  ) {}

  balance(holder: Identity): Promise<bigint> {
    return this.balances.getBalance(this.assetId, holder);
  }

  allowance(owner: Identity, spender: Identity): Promise<bigint> {
    return this.balances.getAllowance(this.assetId, owner, spender);
  }

  async approve(
    auth: TokenAuthorization,
    nonce: bigint,
    spender: Identity,
    amount: bigint
  ): Promise<void> {
    checkAuthorization(nonce);
    checkAmount(amount);
    await this.balances.setAllowance(this.assetId, auth.invoker, spender, amount);
  }

  async transfer(auth: TokenAuthorization, nonce: bigint, to: Identity, amount: bigint): Promise<void> {
    checkAuthorization(nonce);
    checkAmount(amount);
    await this.move(auth.invoker, to, amount);
  }

  async transferFrom(
    auth: TokenAuthorization,
    nonce: bigint,
    from: Identity,
    to: Identity,
    amount: bigint
  ): Promise<void> {
    checkAuthorization(nonce);
    checkAmount(amount);
    const allowance = await this.balances.getAllowance(this.assetId, from, auth.invoker);
    if (allowance < amount) {
      throw transferRejected(`allowance ${allowance} is below ${amount}`);
    }
    await this.move(from, to, amount);
    await this.balances.setAllowance(this.assetId, from, auth.invoker, allowance - amount);
  }

  async mint(to: Identity, amount: bigint): Promise<void> {
    checkAmount(amount);
    const current = await this.balances.getBalance(this.assetId, to);
    await this.balances.setBalance(this.assetId, to, current + amount);
  }

  private async move(from: Identity, to: Identity, amount: bigint): Promise<void> {
    const fromBalance = await this.balances.getBalance(this.assetId, from);
    if (fromBalance < amount) {
      throw transferRejected(`balance ${fromBalance} is below ${amount}`);
    }
    if (amount === 0n || sameIdentity(from, to)) {
      return;
    }
    await this.balances.setBalance(this.assetId, from, fromBalance - amount);
    const toBalance = await this.balances.getBalance(this.assetId, to);
    await this.balances.setBalance(this.assetId, to, toBalance + amount);
  }
}

export class LedgerTokenService implements TokenService {
  constructor(private readonly balances: TokenBalanceRepository) {}

  client(assetId: AssetId): TokenClient {
    return new LedgerTokenClient(assetId, this.balances);
  }
}

function checkAuthorization(nonce: bigint): void {
  if (nonce !== 0n) {
    throw transferRejected("invoker authorization requires a zero nonce");
  }
}

function checkAmount(amount: bigint): void {
  if (amount < 0n) {
    throw transferRejected("amount must not be negative");
  }
}
