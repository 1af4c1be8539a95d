/**
 * symbols_cache - Last index-constituent snapshot
 *
 * Always replaced as a whole inside one transaction; every row of a snapshot
 * carries the same updated_at.
 */

import { pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const symbolsCache = pgTable("symbols_cache", {
  symbol: text("symbol").primaryKey(),
  updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
});

export type SymbolsCacheRow = typeof symbolsCache.$inferSelect;
export type NewSymbolsCacheRow = typeof symbolsCache.$inferInsert;
