/**
 * Liveness probe; touches no dependency.
 */
export function health(): { ok: true } {
  return { ok: true };
}
