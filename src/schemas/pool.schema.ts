import { z } from "zod";

/** Non-negative decimal string; amounts never travel as JSON numbers. */
export const decimalStringSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string");

const assetIndexSchema = z.number().int().min(0);
const accountSchema = z.string().min(1).max(128);

export const assetSpecSchema = z.object({
  symbol: z.string().trim().min(1).max(32),
  decimals: z.number().int().min(0).max(18),
});

export const kernelPolicySchema = z
  .object({
    expInputLimit: z.number().positive(),
    balancedDeltaMax: z.number().positive(),
    quadraticTauMax: z.number().positive(),
    cubicTauMax: z.number().positive(),
    limitWindow: z.number().positive(),
    cubicDamping: z.number().positive(),
    solverTolerance: z.number().positive(),
    solverMaxIterations: z.number().int().positive(),
    alphaCeiling: z.number().positive(),
  })
  .partial()
  .strict();

export const poolCreateSchema = z.object({
  /** Funds the seed balances and receives the initial shares. */
  account: accountSchema,
  assets: z.array(assetSpecSchema).min(2),
  kappa: decimalStringSchema,
  /** One fee for every asset, or one per asset. */
  fees: z.union([decimalStringSchema, z.array(decimalStringSchema)]),
  protocolFeeShare: decimalStringSchema.optional(),
  protocolFeeReceiver: accountSchema.optional(),
  approximation: z.boolean().optional(),
  policy: kernelPolicySchema.optional(),
  seed: z.array(decimalStringSchema).min(2),
});

export const swapQuoteSchema = z.object({
  inputIndex: assetIndexSchema,
  outputIndex: assetIndexSchema,
  amountIn: decimalStringSchema,
  limitRatio: decimalStringSchema.optional(),
  minOut: decimalStringSchema.optional(),
});

export const swapSchema = swapQuoteSchema.extend({ account: accountSchema });

export const mintSchema = z.object({
  account: accountSchema,
  amount: decimalStringSchema,
  minShares: decimalStringSchema.optional(),
});

export const burnSchema = z.object({
  account: accountSchema,
  shares: decimalStringSchema,
  minAmounts: z.array(decimalStringSchema).optional(),
});

export const swapMintQuoteSchema = z.object({
  inputIndex: assetIndexSchema,
  amountIn: decimalStringSchema,
  minShares: decimalStringSchema.optional(),
});

export const swapMintSchema = swapMintQuoteSchema.extend({ account: accountSchema });

export const burnSwapQuoteSchema = z.object({
  shares: decimalStringSchema,
  targetIndex: assetIndexSchema,
  minOut: decimalStringSchema.optional(),
});

export const burnSwapSchema = burnSwapQuoteSchema.extend({ account: accountSchema });

export const accountCreditSchema = z.object({
  asset: z.string().trim().min(1).max(32),
  amount: decimalStringSchema,
});

export type PoolCreateInput = z.infer<typeof poolCreateSchema>;
export type SwapQuoteInput = z.infer<typeof swapQuoteSchema>;
export type SwapInput = z.infer<typeof swapSchema>;
export type MintInput = z.infer<typeof mintSchema>;
export type BurnInput = z.infer<typeof burnSchema>;
export type SwapMintQuoteInput = z.infer<typeof swapMintQuoteSchema>;
export type SwapMintInput = z.infer<typeof swapMintSchema>;
export type BurnSwapQuoteInput = z.infer<typeof burnSwapQuoteSchema>;
export type BurnSwapInput = z.infer<typeof burnSwapSchema>;
export type AccountCreditInput = z.infer<typeof accountCreditSchema>;
