/**
 * Repository Interfaces
 */

export * from "./position-repository";
export * from "./alert-repository";
export * from "./symbols-cache-repository";
export * from "./unit-of-work";
