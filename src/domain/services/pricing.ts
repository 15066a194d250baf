import { PricingParams } from "../entities/auctionConfig";

export function elapsedSeconds(startTime: bigint, currentTime: bigint): bigint {
  return currentTime > startTime ? currentTime - startTime : 0n;
}

/**
 * Staircase-linear decay: the price drops one unit per full `decayRate` seconds
 * and never goes below `minimumPrice`.
 */
export function computePrice(params: PricingParams, currentTime: bigint): bigint {
  const elapsed = elapsedSeconds(params.startTime, currentTime);
  const raw = params.startingPrice - elapsed / params.decayRate;
  return raw < params.minimumPrice ? params.minimumPrice : raw;
}

export function floorReachedAt(params: PricingParams): bigint {
  const steps = params.startingPrice - params.minimumPrice;
  if (steps <= 0n) {
    return params.startTime;
  }
  return params.startTime + steps * params.decayRate;
}
