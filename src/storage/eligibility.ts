/**
 * Eligibility Storage
 *
 * Append-only eligibility snapshots and verification log.
 * Both tables reject UPDATE and DELETE at the database level.
 * The current snapshot is the most recent by `verifiedAt`; ties go to
 * the later insert.
 */

import type {
  EligibilitySnapshot,
  VerificationLogEntry,
  VerificationMethod,
  VerificationStatus,
  CreateEligibilitySnapshotInput,
  CreateVerificationLogInput,
} from "../types/eligibility.js";
import { generateId, parseDocument } from "./base.js";
import { getDatabase } from "./sqlite.js";

/**
 * Append a new snapshot. Earlier snapshots are kept as history.
 */
export async function appendSnapshot(
  input: CreateEligibilitySnapshotInput
): Promise<EligibilitySnapshot> {
  const snapshot: EligibilitySnapshot = { ...input, id: generateId() };

  getDatabase()
    .prepare(
      `INSERT INTO eligibility_snapshots (id, patient_id, payer_id, verified_at, data)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(
      snapshot.id,
      snapshot.patientId,
      snapshot.payerId,
      snapshot.verifiedAt.toISOString(),
      JSON.stringify(snapshot)
    );

  return snapshot;
}

/**
 * Most recent snapshot for a (patient, payer) pair.
 */
export async function getCurrentSnapshot(
  patientId: string,
  payerId: string
): Promise<EligibilitySnapshot | null> {
  const row = getDatabase()
    .prepare(
      `SELECT data FROM eligibility_snapshots
       WHERE patient_id = ? AND payer_id = ?
       ORDER BY verified_at DESC, rowid DESC
       LIMIT 1`
    )
    .get(patientId, payerId) as { data: string } | undefined;

  return row ? parseDocument<EligibilitySnapshot>(row.data) : null;
}

/**
 * All snapshots for a pair, newest first.
 */
export async function getSnapshotHistory(
  patientId: string,
  payerId: string
): Promise<EligibilitySnapshot[]> {
  const rows = getDatabase()
    .prepare(
      `SELECT data FROM eligibility_snapshots
       WHERE patient_id = ? AND payer_id = ?
       ORDER BY verified_at DESC, rowid DESC`
    )
    .all(patientId, payerId) as { data: string }[];

  return rows.map((row) => parseDocument<EligibilitySnapshot>(row.data));
}

interface VerificationLogRow {
  id: string;
  patient_id: string;
  payer_id: string;
  status: VerificationStatus;
  method: VerificationMethod;
  attempts: number;
  error_code: string | null;
  error_message: string | null;
  raw_response: string | null;
  snapshot_id: string | null;
  verified_at: string;
}

function rowToLogEntry(row: VerificationLogRow): VerificationLogEntry {
  return {
    id: row.id,
    patientId: row.patient_id,
    payerId: row.payer_id,
    status: row.status,
    method: row.method,
    attempts: row.attempts,
    ...(row.error_code !== null && { errorCode: row.error_code }),
    ...(row.error_message !== null && { errorMessage: row.error_message }),
    ...(row.raw_response !== null && { rawResponse: row.raw_response }),
    ...(row.snapshot_id !== null && { snapshotId: row.snapshot_id }),
    verifiedAt: new Date(row.verified_at),
  };
}

/**
 * Append a verification log entry.
 */
export async function appendVerificationLog(
  input: CreateVerificationLogInput
): Promise<VerificationLogEntry> {
  const entry: VerificationLogEntry = { ...input, id: generateId() };

  getDatabase()
    .prepare(
      `INSERT INTO verification_log
         (id, patient_id, payer_id, status, method, attempts, error_code, error_message, raw_response, snapshot_id, verified_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      entry.id,
      entry.patientId,
      entry.payerId,
      entry.status,
      entry.method,
      entry.attempts,
      entry.errorCode ?? null,
      entry.errorMessage ?? null,
      entry.rawResponse ?? null,
      entry.snapshotId ?? null,
      entry.verifiedAt.toISOString()
    );

  return entry;
}

/**
 * Verification log for a pair, newest first.
 */
export async function getVerificationLog(
  patientId: string,
  payerId: string
): Promise<VerificationLogEntry[]> {
  const rows = getDatabase()
    .prepare(
      `SELECT * FROM verification_log
       WHERE patient_id = ? AND payer_id = ?
       ORDER BY verified_at DESC, rowid DESC`
    )
    .all(patientId, payerId) as VerificationLogRow[];

  return rows.map(rowToLogEntry);
}

/**
 * Number of failed or partial verifications for a pair since its last success.
 */
export async function countConsecutiveFailures(
  patientId: string,
  payerId: string
): Promise<number> {
  const log = await getVerificationLog(patientId, payerId);
  let count = 0;
  for (const entry of log) {
    if (entry.status === "success") break;
    count++;
  }
  return count;
}
