/**
 * Storage Layer
 *
 * SQLite persistence for patients, providers, payers, reference data,
 * eligibility, scheduling, prior authorization and staff alerts.
 */

// Re-export base utilities
export { generateId, dateReviver, parseDocument } from "./base.js";

// Re-export repository types
export { type Repository, type IndexedRepository } from "./repository.js";

// Re-export SQLite utilities
export {
  getDatabase,
  closeDatabase,
  inTransaction,
  createSqliteRepository,
  isUniqueViolation,
  type FieldMapping,
} from "./sqlite.js";

// Re-export specific storage modules
export * from "./patients.js";
export * from "./providers.js";
export * from "./schedules.js";
export * from "./payers.js";
export * from "./reference.js";
export * from "./eligibility.js";
export * from "./appointments.js";
export * from "./pa-requests.js";
export * from "./packages.js";
export * from "./alerts.js";
export * from "./referrals.js";
export * from "./clinical-documents.js";
export * from "./seed.js";
