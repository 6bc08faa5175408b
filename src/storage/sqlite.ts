/**
 * SQLite Storage Backend
 *
 * Persistence store for the engine using better-sqlite3.
 * Entities live as JSON documents with indexed columns; slots, snapshots
 * and audit logs get dedicated columns for conditional and append-only writes.
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import * as fs from "node:fs";
import type { IndexedRepository } from "./repository.js";
import { parseDocument } from "./base.js";
import { loadConfig } from "../config.js";

let db: Database.Database | null = null;

/**
 * Get or create the SQLite database connection.
 */
export function getDatabase(): Database.Database {
  if (db) return db;

  const dbPath = loadConfig().databasePath;
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  initializeSchema(db);
  return db;
}

/**
 * Close the database connection.
 * With an in-memory database this discards all data.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Run `fn` inside a single transaction.
 */
export function inTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- Patients
    CREATE TABLE IF NOT EXISTS patients (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      full_name TEXT,
      date_of_birth TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_patients_full_name ON patients(full_name);

    -- Providers and network participation
    CREATE TABLE IF NOT EXISTS providers (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      specialty TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_providers_specialty ON providers(specialty);

    CREATE TABLE IF NOT EXISTS network_agreements (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      provider_id TEXT,
      payer_id TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_network_agreements_pair ON network_agreements(provider_id, payer_id);

    -- Schedule slots (compare-and-set booking)
    CREATE TABLE IF NOT EXISTS schedule_slots (
      provider_id TEXT NOT NULL,
      date TEXT NOT NULL,
      time TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('open', 'booked', 'blocked')),
      room_id TEXT,
      capacity_label TEXT,
      held_by_request_id TEXT,
      updated_at TEXT DEFAULT (datetime('now')),
      PRIMARY KEY (provider_id, date, time)
    );

    CREATE INDEX IF NOT EXISTS idx_schedule_slots_status ON schedule_slots(status, date);

    -- Payer reference data
    CREATE TABLE IF NOT EXISTS payers (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      name TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS services (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS authorization_rules (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      payer_id TEXT,
      service_code TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_authorization_rules_pair ON authorization_rules(payer_id, service_code);

    CREATE TABLE IF NOT EXISTS denial_patterns (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      payer_id TEXT,
      service_code TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_denial_patterns_pair ON denial_patterns(payer_id, service_code);

    CREATE TABLE IF NOT EXISTS resolution_strategies (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS cost_catalog (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      service_code TEXT,
      payer_id TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_cost_catalog_service ON cost_catalog(service_code, payer_id);

    CREATE TABLE IF NOT EXISTS outreach_templates (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      missing_info_field TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS optimization_rules (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      kind TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    -- Referrals
    CREATE TABLE IF NOT EXISTS referrals (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      patient_id TEXT,
      payer_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_referrals_patient_id ON referrals(patient_id);

    -- Eligibility snapshots (append-only)
    CREATE TABLE IF NOT EXISTS eligibility_snapshots (
      id TEXT PRIMARY KEY,
      patient_id TEXT NOT NULL,
      payer_id TEXT NOT NULL,
      verified_at TEXT NOT NULL,
      data TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_eligibility_snapshots_pair ON eligibility_snapshots(patient_id, payer_id, verified_at);

    CREATE TRIGGER IF NOT EXISTS eligibility_snapshots_no_update
    BEFORE UPDATE ON eligibility_snapshots
    BEGIN
      SELECT RAISE(ABORT, 'eligibility snapshots are immutable');
    END;

    CREATE TRIGGER IF NOT EXISTS eligibility_snapshots_no_delete
    BEFORE DELETE ON eligibility_snapshots
    BEGIN
      SELECT RAISE(ABORT, 'eligibility snapshots are immutable');
    END;

    -- Verification log (append-only)
    CREATE TABLE IF NOT EXISTS verification_log (
      id TEXT PRIMARY KEY,
      patient_id TEXT NOT NULL,
      payer_id TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('success', 'failed', 'partial')),
      method TEXT NOT NULL,
      attempts INTEGER NOT NULL,
      error_code TEXT,
      error_message TEXT,
      raw_response TEXT,
      snapshot_id TEXT,
      verified_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_verification_log_pair ON verification_log(patient_id, payer_id, verified_at);

    CREATE TRIGGER IF NOT EXISTS verification_log_no_update
    BEFORE UPDATE ON verification_log
    BEGIN
      SELECT RAISE(ABORT, 'verification log is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS verification_log_no_delete
    BEFORE DELETE ON verification_log
    BEGIN
      SELECT RAISE(ABORT, 'verification log is append-only');
    END;

    -- Appointment requests, appointments and waitlist
    CREATE TABLE IF NOT EXISTS appointment_requests (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      patient_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_appointment_requests_patient_id ON appointment_requests(patient_id);

    CREATE TABLE IF NOT EXISTS appointments (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      request_id TEXT,
      provider_id TEXT,
      date TEXT,
      time TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_appointments_request_id ON appointments(request_id);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_appointments_slot ON appointments(provider_id, date, time) WHERE status <> 'canceled';

    CREATE TABLE IF NOT EXISTS waitlist_entries (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      request_id TEXT,
      service_code TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_waitlist_entries_status ON waitlist_entries(status);
    CREATE INDEX IF NOT EXISTS idx_waitlist_entries_request_id ON waitlist_entries(request_id);

    -- Prior authorization
    CREATE TABLE IF NOT EXISTS pa_requests (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      patient_id TEXT,
      appointment_request_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_pa_requests_status ON pa_requests(status);
    CREATE INDEX IF NOT EXISTS idx_pa_requests_appointment_request_id ON pa_requests(appointment_request_id);

    CREATE TABLE IF NOT EXISTS pa_transitions (
      id TEXT PRIMARY KEY,
      pa_request_id TEXT NOT NULL,
      from_status TEXT NOT NULL,
      to_status TEXT NOT NULL,
      reason TEXT,
      occurred_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_pa_transitions_request ON pa_transitions(pa_request_id);

    CREATE TRIGGER IF NOT EXISTS pa_transitions_no_update
    BEFORE UPDATE ON pa_transitions
    BEGIN
      SELECT RAISE(ABORT, 'PA transitions are append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS pa_transitions_no_delete
    BEFORE DELETE ON pa_transitions
    BEGIN
      SELECT RAISE(ABORT, 'PA transitions are append-only');
    END;

    CREATE TABLE IF NOT EXISTS clinical_documents (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      patient_id TEXT,
      kind TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_clinical_documents_patient_id ON clinical_documents(patient_id);

    CREATE TABLE IF NOT EXISTS documentation_packages (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      pa_request_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_documentation_packages_pa ON documentation_packages(pa_request_id);

    -- Staff alerts
    CREATE TABLE IF NOT EXISTS staff_alerts (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      trigger_kind TEXT,
      subject_key TEXT,
      patient_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_staff_alerts_status ON staff_alerts(status);
    CREATE INDEX IF NOT EXISTS idx_staff_alerts_patient_id ON staff_alerts(patient_id);
    CREATE UNIQUE INDEX IF NOT EXISTS idx_staff_alerts_open ON staff_alerts(trigger_kind, subject_key) WHERE status <> 'resolved';
  `);
}

/**
 * Field mapping from entity property to database column.
 */
export interface FieldMapping {
  column: string;
  property: string;
}

/**
 * Create a SQLite repository for a specific table.
 * The connection is resolved per call, so a closed database is reopened.
 *
 * @param tableName - The database table name
 * @param fieldMappings - Array of field mappings from entity properties to database columns
 */
export function createSqliteRepository<T extends { id: string }>(
  tableName: string,
  fieldMappings: FieldMapping[] = []
): IndexedRepository<T> {
  // Extract indexed field value from entity using property name
  const getFieldValue = (entity: T, property: string): string | null => {
    const value: unknown = Object.getOwnPropertyDescriptor(entity, property)?.value;
    if (value === undefined || value === null) return null;
    if (value instanceof Date) return value.toISOString();
    return String(value);
  };

  const toSearchValue = (value: unknown): string | null => {
    if (value === undefined || value === null) return null;
    if (value instanceof Date) return value.toISOString();
    return String(value);
  };

  // Queried properties must be mapped to an indexed column
  const columnFor = (property: PropertyKey): string => {
    const mapping = fieldMappings.find((f) => f.property === String(property));
    if (!mapping) {
      throw new Error(`${tableName}.${String(property)} is not an indexed field`);
    }
    return mapping.column;
  };

  // Build indexed field columns for upsert
  const indexedFieldColumns = fieldMappings.map((f) => f.column);

  return {
    async save(entity: T): Promise<T> {
      const data = JSON.stringify(entity);
      const now = new Date().toISOString();

      // Build column list and values for indexed fields
      const columns = ["id", "data", "updated_at", ...indexedFieldColumns];
      const placeholders = columns.map(() => "?").join(", ");
      const values = [
        entity.id,
        data,
        now,
        ...fieldMappings.map((f) => getFieldValue(entity, f.property)),
      ];

      const sql = `
        INSERT INTO ${tableName} (${columns.join(", ")})
        VALUES (${placeholders})
        ON CONFLICT(id) DO UPDATE SET
          data = excluded.data,
          updated_at = excluded.updated_at
          ${indexedFieldColumns.length > 0 ? ", " + indexedFieldColumns.map((f) => `${f} = excluded.${f}`).join(", ") : ""}
      `;

      getDatabase().prepare(sql).run(...values);
      return entity;
    },

    async get(id: string): Promise<T | null> {
      const row = getDatabase()
        .prepare(`SELECT data FROM ${tableName} WHERE id = ?`)
        .get(id) as { data: string } | undefined;

      if (!row) return null;
      return parseDocument<T>(row.data);
    },

    async getAll(): Promise<T[]> {
      const rows = getDatabase()
        .prepare(`SELECT data FROM ${tableName} ORDER BY rowid`)
        .all() as { data: string }[];

      return rows.map((row) => parseDocument<T>(row.data));
    },

    async delete(id: string): Promise<boolean> {
      const result = getDatabase()
        .prepare(`DELETE FROM ${tableName} WHERE id = ?`)
        .run(id);

      return result.changes > 0;
    },

    async exists(id: string): Promise<boolean> {
      const row = getDatabase()
        .prepare(`SELECT 1 FROM ${tableName} WHERE id = ? LIMIT 1`)
        .get(id);

      return !!row;
    },

    async find(predicate: (entity: T) => boolean): Promise<T[]> {
      const all = await this.getAll();
      return all.filter(predicate);
    },

    async count(): Promise<number> {
      const row = getDatabase()
        .prepare(`SELECT COUNT(*) as count FROM ${tableName}`)
        .get() as { count: number };

      return row.count;
    },

    async findByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T | null> {
      const row = getDatabase()
        .prepare(`SELECT data FROM ${tableName} WHERE ${columnFor(field)} = ? ORDER BY rowid LIMIT 1`)
        .get(toSearchValue(value)) as { data: string } | undefined;

      if (!row) return null;
      return parseDocument<T>(row.data);
    },

    async findAllByIndex<K extends keyof T>(field: K, value: T[K]): Promise<T[]> {
      const rows = getDatabase()
        .prepare(`SELECT data FROM ${tableName} WHERE ${columnFor(field)} = ? ORDER BY rowid`)
        .all(toSearchValue(value)) as { data: string }[];

      return rows.map((row) => parseDocument<T>(row.data));
    },

    async countByIndex<K extends keyof T>(field: K, value: T[K]): Promise<number> {
      const row = getDatabase()
        .prepare(`SELECT COUNT(*) as count FROM ${tableName} WHERE ${columnFor(field)} = ?`)
        .get(toSearchValue(value)) as { count: number };

      return row.count;
    },
  };
}

/**
 * True when `err` is a SQLite unique-constraint violation.
 */
export function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
