import { z } from "zod";
import { AssetId, assetIdSchema, signedIntegerSchema } from "../../domain/entities/asset";
import { AuctionConfig, PricingParams } from "../../domain/entities/auctionConfig";
import { Identity, formatIdentity, identitySchema } from "../../domain/entities/identity";
import { DataKey, DataKeys } from "../../domain/entities/stateKey";
import { uninitialized } from "../errors";
import { StateStore } from "../ports/repositories";

type Decoder<T> = z.ZodType<T, z.ZodTypeDef, string>;

/**
 * Typed accessors over the contract's state store. Price and nonce fields read as
 * zero when absent; configuration fields are required once initialized.
 */
export class AuctionState {
  constructor(private readonly store: StateStore) {}

  hasAdministrator(): Promise<boolean> {
    return this.store.has(DataKeys.admin);
  }

  readAdministrator(): Promise<Identity> {
    return this.readRequired(DataKeys.admin, identitySchema);
  }

  async writeAdministrator(admin: Identity): Promise<void> {
    await this.store.set(DataKeys.admin, formatIdentity(admin));
  }

  readPaymentAssetId(): Promise<AssetId> {
    return this.readRequired(DataKeys.paymentAssetId, assetIdSchema);
  }

  async putPaymentAssetId(assetId: AssetId): Promise<void> {
    await this.store.set(DataKeys.paymentAssetId, assetId);
  }

  readPrizeAssetId(): Promise<AssetId> {
    return this.readRequired(DataKeys.prizeAssetId, assetIdSchema);
  }

  async putPrizeAssetId(assetId: AssetId): Promise<void> {
    await this.store.set(DataKeys.prizeAssetId, assetId);
  }

  readStartingPrice(): Promise<bigint> {
    return this.readOrZero(DataKeys.startingPrice);
  }

  async putStartingPrice(price: bigint): Promise<void> {
    await this.store.set(DataKeys.startingPrice, price.toString());
  }

  readMinimumPrice(): Promise<bigint> {
    return this.readOrZero(DataKeys.minimumPrice);
  }

  async putMinimumPrice(price: bigint): Promise<void> {
    await this.store.set(DataKeys.minimumPrice, price.toString());
  }

  readDecayRate(): Promise<bigint> {
    return this.readRequired(DataKeys.decayRate, signedIntegerSchema);
  }

  async putDecayRate(decayRate: bigint): Promise<void> {
    await this.store.set(DataKeys.decayRate, decayRate.toString());
  }

  readStartTime(): Promise<bigint> {
    return this.readRequired(DataKeys.startTime, signedIntegerSchema);
  }

  async putStartTime(time: bigint): Promise<void> {
    await this.store.set(DataKeys.startTime, time.toString());
  }

  readNonce(identity: Identity): Promise<bigint> {
    return this.readOrZero(DataKeys.nonce(identity));
  }

  async readPricing(): Promise<PricingParams> {
    return {
      startingPrice: await this.readStartingPrice(),
      minimumPrice: await this.readMinimumPrice(),
      startTime: await this.readStartTime(),
      decayRate: await this.readDecayRate()
    };
  }

  async readConfig(): Promise<AuctionConfig> {
    const admin = await this.readAdministrator();
    const pricing = await this.readPricing();
    return {
      admin,
      paymentAssetId: await this.readPaymentAssetId(),
      prizeAssetId: await this.readPrizeAssetId(),
      ...pricing
    };
  }

  async writeConfig(config: AuctionConfig): Promise<void> {
    await this.writeAdministrator(config.admin);
    await this.putPaymentAssetId(config.paymentAssetId);
    await this.putPrizeAssetId(config.prizeAssetId);
    await this.putStartingPrice(config.startingPrice);
    await this.putStartTime(config.startTime);
    await this.putMinimumPrice(config.minimumPrice);
    await this.putDecayRate(config.decayRate);
  }

  private async readRequired<T>(key: DataKey, decoder: Decoder<T>): Promise<T> {
    const raw = await this.store.get(key);
    if (raw === null) {
      throw uninitialized(key.type);
    }
    return decoder.parse(raw);
  }

  private async readOrZero(key: DataKey): Promise<bigint> {
    const raw = await this.store.get(key);
    if (raw === null) {
      return 0n;
    }
    return signedIntegerSchema.parse(raw);
  }
}
