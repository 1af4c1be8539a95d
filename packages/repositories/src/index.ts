/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interfaces in ./interfaces, Postgres implementations in ./postgres
 * - In-memory stand-ins are exported separately from "@dip-scanner/repositories/testing"
 */

export * from "./interfaces";
export * from "./postgres";
