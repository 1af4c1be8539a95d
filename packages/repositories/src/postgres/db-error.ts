export type DbError = { type: "DB_ERROR"; message: string };

export function toDbError(e: unknown): DbError {
  return {
    type: "DB_ERROR" as const,
    message: e instanceof Error ? e.message : "Unknown error",
  };
}
