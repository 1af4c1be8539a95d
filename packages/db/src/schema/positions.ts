/**
 * positions - One row per (symbol, entry_date)
 *
 * OPEN rows have all exit columns NULL; CLOSED rows have all three set.
 * The check constraint makes a half-closed row impossible to store.
 */

import { sql } from "drizzle-orm";
import { check, date, index, numeric, pgTable, text, timestamp, unique, uuid } from "drizzle-orm/pg-core";
import { EXIT_REASONS, POSITION_STATUSES } from "@dip-scanner/core";

export const positions = pgTable(
  "positions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    symbol: text("symbol").notNull(),
    entryDate: date("entry_date", { mode: "string" }).notNull(),
    entryPrice: numeric("entry_price", { precision: 18, scale: 6 }).notNull(),
    status: text("status", { enum: POSITION_STATUSES }).notNull().default("OPEN"),
    exitDate: date("exit_date", { mode: "string" }),
    exitPrice: numeric("exit_price", { precision: 18, scale: 6 }),
    exitReason: text("exit_reason", { enum: EXIT_REASONS }),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    unique("uq_positions_symbol_entry_date").on(table.symbol, table.entryDate),
    index("ix_positions_status").on(table.status),
    index("ix_positions_symbol").on(table.symbol),
    check(
      "ck_positions_exit_fields",
      sql`(${table.status} = 'OPEN' AND ${table.exitDate} IS NULL AND ${table.exitPrice} IS NULL AND ${table.exitReason} IS NULL)
        OR (${table.status} = 'CLOSED' AND ${table.exitDate} IS NOT NULL AND ${table.exitPrice} IS NOT NULL AND ${table.exitReason} IS NOT NULL)`,
    ),
  ],
);

export type PositionRow = typeof positions.$inferSelect;
export type NewPositionRow = typeof positions.$inferInsert;
