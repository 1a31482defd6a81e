import { z } from 'zod';

const integerString = z.string().regex(/^\d+$/, 'expected an integer string');

const numericLike = z.union([z.number(), z.string()]).transform((v, ctx) => {
  const n = typeof v === 'number' ? v : Number(v);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a finite number' });
    return z.NEVER;
  }
  return n;
});

/** Only the fields the engine reads; the rest is kept for the swap request. */
export const jupiterQuoteSchema = z
  .object({
    inputMint: z.string().optional(),
    outputMint: z.string().optional(),
    inAmount: integerString.optional(),
    outAmount: integerString,
    priceImpactPct: numericLike.optional()
  })
  .passthrough();

export type JupiterQuoteResponse = z.infer<typeof jupiterQuoteSchema>;

export const jupiterSwapSchema = z
  .object({
    swapTransaction: z.string().min(1).regex(/^[A-Za-z0-9+/]+={0,2}$/, 'expected base64'),
    lastValidBlockHeight: z.number().int().optional()
  })
  .passthrough();

export type JupiterSwapResponse = z.infer<typeof jupiterSwapSchema>;

export interface JupiterSwapRequest {
  quoteResponse: Record<string, unknown>;
  userPublicKey: string;
  wrapAndUnwrapSol: boolean;
}
