export * from "./schema";

export { getDb, closeDb } from "./get-db";
export type { Db, DbExecutor, DbOptions, Schema } from "./get-db";
