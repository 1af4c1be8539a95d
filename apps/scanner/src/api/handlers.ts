/**
 * HTTP handlers
 *
 * Pure functions from parsed request parts to { status, body }; express only
 * does the wiring (see server.ts). Bodies use snake_case field names.
 */

import { z } from "zod";
import { isIsoDate } from "@dip-scanner/core";
import { logger } from "@dip-scanner/utils";

import type { AppServices } from "../context";
import {
  health,
  listPendingAlerts,
  markAlertSent,
  PENDING_LIMIT_DEFAULT,
  PENDING_LIMIT_MAX,
  runDailyJob,
} from "../usecases";

export interface HttpResult {
  status: number;
  body: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Request schemas
// ─────────────────────────────────────────────────────────────────────────────

const isoDate = z.string({ required_error: "as_of is required" }).refine(isIsoDate, "as_of must be a YYYY-MM-DD date");

export const DailyJobQuerySchema = z
  .object({ as_of: z.unknown().optional(), asOf: z.unknown().optional() })
  .transform(q => q.as_of ?? q.asOf)
  .pipe(isoDate);

export const PendingQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(PENDING_LIMIT_MAX).default(PENDING_LIMIT_DEFAULT),
});

export const AlertIdParamsSchema = z.object({
  id: z.string().uuid("id must be a UUID"),
});

function unprocessable(error: z.ZodError): HttpResult {
  return { status: 422, body: { detail: error.issues.map(i => i.message).join("; ") } };
}

function internalError(message: string): HttpResult {
  return { status: 500, body: { detail: message } };
}

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

export function handleHealth(): HttpResult {
  return { status: 200, body: health() };
}

export async function handleRunDailyJob(query: unknown, services: AppServices): Promise<HttpResult> {
  const parsed = DailyJobQuerySchema.safeParse(query);
  if (!parsed.success) return unprocessable(parsed.error);

  const result = await runDailyJob(parsed.data, services.scan);
  const body = {
    as_of: result.asOf,
    new_entry_alerts: result.newEntryAlerts,
    new_exit_alerts: result.newExitAlerts,
  };

  if (result.failedPhases.length > 0) {
    return {
      status: 500,
      body: { ...body, detail: "daily job incomplete", failed_phases: result.failedPhases.map(p => p.phase) },
    };
  }
  return { status: 200, body };
}

export async function handleListPendingAlerts(query: unknown, services: AppServices): Promise<HttpResult> {
  const parsed = PendingQuerySchema.safeParse(query);
  if (!parsed.success) return unprocessable(parsed.error);

  const result = await listPendingAlerts(parsed.data.limit, services);
  return result.match(
    alerts => ({
      status: 200,
      body: alerts.map(a => ({
        id: a.id,
        alert_type: a.alertType,
        symbol: a.symbol,
        as_of: a.asOf,
        message: a.message,
      })),
    }),
    error => {
      if (error.type === "INVALID_LIMIT") return { status: 422, body: { detail: error.message } };
      logger.error("API: listing pending alerts failed", { message: error.message });
      return internalError("failed to list pending alerts");
    },
  );
}

export async function handleMarkAlertSent(params: unknown, services: AppServices): Promise<HttpResult> {
  const parsed = AlertIdParamsSchema.safeParse(params);
  if (!parsed.success) return unprocessable(parsed.error);

  const result = await markAlertSent(parsed.data.id, services);
  return result.match(
    sent => ({
      status: 200,
      body: { success: sent.success, id: sent.id, sent_at: sent.sentAt.toISOString() },
    }),
    error => {
      if (error.type === "NOT_FOUND") return { status: 404, body: { detail: "Alert not found" } };
      logger.error("API: mark-sent failed", { id: parsed.data.id, message: error.message });
      return internalError("failed to mark alert sent");
    },
  );
}
