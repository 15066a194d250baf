import { Identity, formatIdentity } from "./identity";

export type DataKey =
  | { type: "Admin" }
  | { type: "PaymentAssetId" }
  | { type: "PrizeAssetId" }
  | { type: "StartingPrice" }
  | { type: "MinimumPrice" }
  | { type: "StartTime" }
  | { type: "DecayRate" }
  | { type: "Nonce"; identity: Identity };

export const DataKeys = {
  admin: { type: "Admin" },
  paymentAssetId: { type: "PaymentAssetId" },
  prizeAssetId: { type: "PrizeAssetId" },
  startingPrice: { type: "StartingPrice" },
  minimumPrice: { type: "MinimumPrice" },
  startTime: { type: "StartTime" },
  decayRate: { type: "DecayRate" },
  nonce: (identity: Identity): DataKey => ({ type: "Nonce", identity })
} satisfies Record<string, DataKey | ((identity: Identity) => DataKey)>;

export function encodeDataKey(key: DataKey): string {
  if (key.type === "Nonce") {
    return `Nonce:${formatIdentity(key.identity)}`;
  }
  return key.type;
}
