import { computePrice, floorReachedAt } from "../../domain/services/pricing";
import { ContractRuntime } from "../contractRuntime";
import { LedgerClock } from "../ports/services";

export type PriceQuote = {
  price: bigint;
  quotedAt: bigint;
  floorReachedAt: bigint;
};

export class GetPriceUseCase {
  constructor(
    private readonly runtime: ContractRuntime,
    private readonly clock: LedgerClock
  ) {}

  async execute(): Promise<PriceQuote> {
    return this.runtime.invoke(async (state) => {
      const pricing = await state.readPricing();
      const now = this.clock.timestamp();
      return {
        price: computePrice(pricing, now),
        quotedAt: now,
        floorReachedAt: floorReachedAt(pricing)
      };
    });
  }
}
