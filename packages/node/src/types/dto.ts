/**
 * Request DTOs with Zod validation schemas.
 *
 * Byte values travel as hex strings (optional 0x prefix) and amounts as
 * decimal strings, since JSON has no bigint. Route handlers decode them
 * after validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

const hex = (bytes: number) =>
  z
    .string()
    .regex(new RegExp(`^(0[xX])?[0-9a-fA-F]{${bytes * 2}}$`), `Expected ${bytes} bytes of hex`);

export const Hex32Schema = hex(32);
export const SignatureHexSchema = hex(64);

export const AmountSchema = z.string().regex(/^\d{1,20}$/, "Expected a decimal amount");

const MetadataFields = {
  name: z.string(),
  symbol: z.string(),
  uri: z.string(),
};

// =============================================================================
// Content leaf
// =============================================================================

export const TransferPayloadSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("native"),
    amount: AmountSchema,
  }),
  z.object({
    kind: z.literal("fungible"),
    mint: Hex32Schema,
    amount: AmountSchema,
    ...MetadataFields,
    decimals: z.number().int().min(0).max(255),
  }),
  z.object({
    kind: z.literal("non_fungible"),
    mint: Hex32Schema,
    collection: Hex32Schema.nullable(),
    ...MetadataFields,
  }),
]);

export type TransferPayloadDto = z.infer<typeof TransferPayloadSchema>;

export const ContentLeafSchema = z.object({
  origin: Hex32Schema,
  receiver: Hex32Schema,
  /** Defaults to this node's bridge program */
  destinationProgram: Hex32Schema.optional(),
  payload: TransferPayloadSchema,
});

export type ContentLeafDto = z.infer<typeof ContentLeafSchema>;

// =============================================================================
// Preflight
// =============================================================================

export const VerifyWithdrawalSchema = z.object({
  leaf: ContentLeafSchema,
  path: z.array(Hex32Schema).max(64),
  signature: SignatureHexSchema,
  recoveryId: z.number().int().min(0).max(3),
});

export type VerifyWithdrawalDto = z.infer<typeof VerifyWithdrawalSchema>;
