/**
 * Postgres Repository Implementations
 */

export { createPostgresPositionRepository } from "./position-repository";
export { createPostgresAlertRepository } from "./alert-repository";
export { createPostgresSymbolsCacheRepository } from "./symbols-cache-repository";
export { createPostgresUnitOfWork } from "./unit-of-work";
export { toDbError, type DbError } from "./db-error";
