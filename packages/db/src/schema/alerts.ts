/**
 * alerts - Notification outbox
 *
 * event_key is the dedup handle (see core/event-key). sent_at stays NULL until the
 * external notifier acknowledges delivery and is never cleared afterwards.
 */

import { date, index, pgTable, text, timestamp, unique, uuid } from "drizzle-orm/pg-core";
import { ALERT_TYPES } from "@dip-scanner/core";

export const alerts = pgTable(
  "alerts",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    eventKey: text("event_key").notNull(),
    alertType: text("alert_type", { enum: ALERT_TYPES }).notNull(),
    symbol: text("symbol").notNull(),
    asOf: date("as_of", { mode: "string" }).notNull(),
    message: text("message").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    sentAt: timestamp("sent_at", { withTimezone: true, mode: "date" }),
  },
  table => [
    unique("uq_alerts_event_key").on(table.eventKey),
    index("ix_alerts_sent_at").on(table.sentAt),
    index("ix_alerts_symbol").on(table.symbol),
  ],
);

export type AlertRow = typeof alerts.$inferSelect;
export type NewAlertRow = typeof alerts.$inferInsert;
