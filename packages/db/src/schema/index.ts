/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * positions and alerts are the durable record of signals; symbols_cache is a
 * disposable snapshot of the index universe.
 */

export * from "./positions";
export * from "./alerts";
export * from "./symbols-cache";
