/**
 * FMP (Financial Modeling Prep) Types
 *
 * Documentation: https://site.financialmodelingprep.com/developer/docs
 */

import { z } from "zod";

/**
 * FMP adapter configuration schema
 */
export const FmpConfigSchema = z.object({
  apiKey: z.string().min(1),

  /** Stable API root, no trailing slash */
  baseUrl: z.string().url().default("https://financialmodelingprep.com/stable"),

  timeoutMs: z.coerce.number().int().positive().default(30_000),

  /** Daily bars kept per symbol when locating a date and its previous trading day */
  lookbackDays: z.coerce.number().int().min(2).default(20),
});

export type FmpConfig = z.infer<typeof FmpConfigSchema>;
export type FmpConfigInput = z.input<typeof FmpConfigSchema>;

/**
 * Rows are validated one at a time; a malformed row is dropped, not fatal.
 */
export const FmpConstituentRowSchema = z.object({
  symbol: z.string().min(1),
});

export const FmpEarningsRowSchema = z.object({
  symbol: z.string().min(1),
  date: z.string().optional(),
});

export const FmpHistoricalRowSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  close: z.union([z.number(), z.string()]).nullish(),
});

export type FmpHistoricalRow = z.infer<typeof FmpHistoricalRowSchema>;

export const FmpRowsSchema = z.array(z.unknown());
