/**
 * Staff Alert Storage
 *
 * At most one unresolved alert per (trigger, subject). Raising an alert
 * that is already open updates it in place.
 */

import type { AlertDraft, AlertStatus, StaffAlert } from "../types/alert.js";
import { generateId, parseDocument } from "./base.js";
import { createSqliteRepository, getDatabase, inTransaction } from "./sqlite.js";

/**
 * Storage operations for staff alerts.
 */
export const alertsStorage = createSqliteRepository<StaffAlert>("staff_alerts", [
  { column: "trigger_kind", property: "trigger" },
  { column: "subject_key", property: "subjectKey" },
  { column: "patient_id", property: "patientId" },
  { column: "status", property: "status" },
]);

function findOpenAlertRow(trigger: string, subjectKey: string): StaffAlert | null {
  const row = getDatabase()
    .prepare(
      `SELECT data FROM staff_alerts
       WHERE trigger_kind = ? AND subject_key = ? AND status <> 'resolved'
       LIMIT 1`
    )
    .get(trigger, subjectKey) as { data: string } | undefined;

  return row ? parseDocument<StaffAlert>(row.data) : null;
}

function writeAlert(alert: StaffAlert): void {
  getDatabase()
    .prepare(
      `INSERT INTO staff_alerts (id, data, trigger_kind, subject_key, patient_id, status, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         data = excluded.data,
         status = excluded.status,
         updated_at = excluded.updated_at`
    )
    .run(
      alert.id,
      JSON.stringify(alert),
      alert.trigger,
      alert.subjectKey,
      alert.patientId,
      alert.status,
      alert.updatedAt.toISOString()
    );
}

/**
 * Insert a new alert, or refresh the open one for the same (trigger, subject).
 * Refreshing keeps the alert's id, status and creation time.
 */
export async function upsertOpenAlert(
  draft: AlertDraft,
  now: Date = new Date()
): Promise<{ alert: StaffAlert; created: boolean }> {
  return inTransaction(() => {
    const existing = findOpenAlertRow(draft.trigger, draft.subjectKey);

    if (existing) {
      const refreshed: StaffAlert = {
        ...existing,
        ...draft,
        id: existing.id,
        status: existing.status,
        occurrences: existing.occurrences + 1,
        createdAt: existing.createdAt,
        updatedAt: now,
      };
      writeAlert(refreshed);
      return { alert: refreshed, created: false };
    }

    const alert: StaffAlert = {
      ...draft,
      id: generateId(),
      status: "new",
      occurrences: 1,
      createdAt: now,
      updatedAt: now,
    };
    writeAlert(alert);
    return { alert, created: true };
  });
}

/**
 * Alerts filtered by status and/or patient, newest first.
 */
export async function listAlerts(filter: {
  status?: AlertStatus;
  patientId?: string;
} = {}): Promise<StaffAlert[]> {
  const alerts = await alertsStorage.find(
    (a) =>
      (filter.status === undefined || a.status === filter.status) &&
      (filter.patientId === undefined || a.patientId === filter.patientId)
  );
  return alerts.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}
