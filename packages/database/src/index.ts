export { createDb } from "./client";
export type { Database, DatabaseHandle } from "./client";
export { StorageUnavailable } from "./errors";
export { SqliteNegotiationStore } from "./record-store";
export type { NegotiationFilter, NegotiationRecordStore } from "./record-store";
export { seedDemoNegotiations } from "./seed";

// Re-export schema for convenience
export * from "./schema";
