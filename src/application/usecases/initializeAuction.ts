import { AssetId } from "../../domain/entities/asset";
import { AuctionConfig } from "../../domain/entities/auctionConfig";
import { Identity } from "../../domain/entities/identity";
import { log } from "../../infrastructure/logging/logger";
import { ContractRuntime } from "../contractRuntime";
import { alreadyInitialized } from "../errors";
import { LedgerClock, RealtimePublisher } from "../ports/services";

export type InitializeAuctionInput = {
  admin: Identity;
  paymentAssetId: AssetId;
  prizeAssetId: AssetId;
  startingPrice: bigint;
  minimumPrice: bigint;
  decayRate: bigint;
};

export class InitializeAuctionUseCase {
  constructor(
    private readonly runtime: ContractRuntime,
    private readonly clock: LedgerClock,
    private readonly realtime: RealtimePublisher
  ) {}

  // Price bounds and decay rate are taken as given; callers own their sanity.
  async execute(input: InitializeAuctionInput): Promise<AuctionConfig> {
    const config = await this.runtime.invoke(async (state) => {
      if (await state.hasAdministrator()) {
        throw alreadyInitialized();
      }
      const stored: AuctionConfig = { ...input, startTime: this.clock.timestamp() };
      await state.writeConfig(stored);
      return stored;
    });

    log("info", "auction.initialized", {
      contractId: this.runtime.contract.id,
      startTime: config.startTime.toString()
    });
    this.realtime.publish({ type: "auction:initialized", contractId: this.runtime.contract.id, config });
    return config;
  }
}
