import { z } from "zod";

export type IdentityKind = "account" | "contract";

export interface Identity {
  kind: IdentityKind;
  id: string;
}

const IDENTITY_PATTERN = /^(account|contract):([A-Za-z0-9_-]{1,64})$/;

export function formatIdentity(identity: Identity): string {
  return `${identity.kind}:${identity.id}`;
}

export function sameIdentity(a: Identity, b: Identity): boolean {
  return a.kind === b.kind && a.id === b.id;
}

export const identitySchema = z
  .string()
  .regex(IDENTITY_PATTERN, "Invalid identity")
  .transform((value): Identity => {
    const [, kind, id] = IDENTITY_PATTERN.exec(value) ?? [];
    return { kind: kind === "contract" ? "contract" : "account", id };
  });

export function parseIdentity(value: string): Identity {
  return identitySchema.parse(value);
}
