import { z } from "zod";

// 32-byte asset handle, hex encoded
export type AssetId = string;

export const assetIdSchema = z
  .string()
  .regex(/^[0-9a-f]{64}$/, "Asset id must be 64 lowercase hex characters");

export const amountSchema = z
  .union([z.string().regex(/^\d+$/, "Expected a non-negative integer"), z.number().int().nonnegative().safe()])
  .transform((value) => BigInt(value));

export const signedIntegerSchema = z
  .string()
  .regex(/^-?\d+$/, "Expected an integer")
  .transform((value) => BigInt(value));
