/**
 * Run the daily job once
 *
 * Usage:
 *   npm run job:daily -- --as-of 2025-03-04
 *   npm run job:daily                      # today's UTC date
 *
 * Environment variables: see .env.example (DATABASE_URL, FMP_API_KEY, ...)
 */

import { config } from "dotenv";
import { resolve } from "path";

import { isIsoDate, toIsoDate } from "@dip-scanner/core";
import { logger } from "@dip-scanner/utils";

// Load .env from project root
config({ path: resolve(process.cwd(), ".env") });

function readAsOf(argv: readonly string[]): string {
  const flagIdx = argv.indexOf("--as-of");
  if (flagIdx !== -1) return argv[flagIdx + 1] ?? "";

  const inline = argv.find(arg => arg.startsWith("--as-of="));
  if (inline) return inline.slice("--as-of=".length);

  return toIsoDate(new Date());
}

async function main(): Promise<void> {
  const asOf = readAsOf(process.argv.slice(2));
  if (!isIsoDate(asOf)) {
    console.error(`Invalid --as-of value: "${asOf}" (expected YYYY-MM-DD)`);
    process.exit(2);
  }

  // env is validated on import, so it must load after dotenv
  const { env } = await import("../apps/scanner/src/env");
  const { appConfigFromEnv, createAppContext } = await import("../apps/scanner/src/context");
  const { runDailyJob } = await import("../apps/scanner/src/usecases");

  const context = createAppContext(appConfigFromEnv(env));

  try {
    const result = await runDailyJob(asOf, context.scan);
    console.log(
      JSON.stringify(
        {
          as_of: result.asOf,
          new_entry_alerts: result.newEntryAlerts,
          new_exit_alerts: result.newExitAlerts,
          entries: result.entries,
          exits: result.exits,
          failed_phases: result.failedPhases,
        },
        null,
        2,
      ),
    );
    process.exitCode = result.failedPhases.length > 0 ? 1 : 0;
  } finally {
    await context.close();
  }
}

main().catch(error => {
  logger.error("Fatal error", error);
  process.exit(1);
});
