import { z } from "zod";
import { parseFixed } from "../engine/fixed.js";
import type { IncomingOrder } from "../engine/types.js";

/** Decimal string with up to 18 fractional digits, parsed to fixed-point. */
const FixedAmount = z
  .string()
  .min(1)
  .max(80)
  .transform((value, ctx) => {
    try {
      return parseFixed(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
        fatal: true,
      });
      return z.NEVER;
    }
  })
  .refine((value) => value > 0n, { message: "Must be greater than zero" });

// ── Orders ────────────────────────────────────────────────────

export const SubmitOrderSchema = z.object({
  owner: z.string().min(1).max(128),
  side: z.enum(["BUY", "SELL"]),
  price: FixedAmount,
  quantity: FixedAmount,
  timestamp: z.number().int().nonnegative(),
  expiresAt: z.number().int().nonnegative().optional(),
});

export const CancelOrderSchema = z.object({
  orderId: z.string().regex(/^0x[0-9a-f]{64}$/, "Expected a 0x-prefixed sha256 order id"),
  caller: z.string().min(1).max(128),
});

export type CancelOrderInput = z.infer<typeof CancelOrderSchema>;

/** Validate untrusted submit input into an engine order. Throws ZodError. */
export function parseSubmitOrder(input: unknown): IncomingOrder {
  return SubmitOrderSchema.parse(input);
}

export function parseCancelOrder(input: unknown): CancelOrderInput {
  return CancelOrderSchema.parse(input);
}
