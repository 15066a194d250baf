import { Identity } from "./identity";

export interface PurchaseReceipt {
  buyer: Identity;
  price: bigint;
  prizeAmount: bigint;
  purchasedAt: bigint;
}
