/**
 * PA Request Storage
 *
 * PA requests (JSON documents) and their append-only transition history.
 * Only the PA state machine writes here.
 */

import type {
  PaRequest,
  PaStatus,
  PaTransition,
} from "../types/pa-request.js";
import { generateId } from "./base.js";
import { createSqliteRepository, getDatabase } from "./sqlite.js";

/**
 * Storage operations for PA requests.
 */
export const paRequestsStorage = createSqliteRepository<PaRequest>("pa_requests", [
  { column: "patient_id", property: "patientId" },
  { column: "appointment_request_id", property: "appointmentRequestId" },
  { column: "status", property: "status" },
]);

/**
 * PA request opened for an appointment request, if any.
 */
export async function findPaRequestByAppointmentRequest(
  appointmentRequestId: string
): Promise<PaRequest | null> {
  return paRequestsStorage.findByIndex("appointmentRequestId", appointmentRequestId);
}

/**
 * Append a transition row.
 */
export async function appendTransition(
  input: Omit<PaTransition, "id">
): Promise<PaTransition> {
  const transition: PaTransition = { ...input, id: generateId() };

  getDatabase()
    .prepare(
      `INSERT INTO pa_transitions (id, pa_request_id, from_status, to_status, reason, occurred_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    )
    .run(
      transition.id,
      transition.paRequestId,
      transition.fromStatus,
      transition.toStatus,
      transition.reason ?? null,
      transition.occurredAt.toISOString()
    );

  return transition;
}

/**
 * Transition history for a PA request, oldest first.
 */
export async function getTransitions(paRequestId: string): Promise<PaTransition[]> {
  const rows = getDatabase()
    .prepare(
      `SELECT id, pa_request_id, from_status, to_status, reason, occurred_at
       FROM pa_transitions
       WHERE pa_request_id = ?
       ORDER BY rowid`
    )
    .all(paRequestId) as Array<{
      id: string;
      pa_request_id: string;
      from_status: PaStatus;
      to_status: PaStatus;
      reason: string | null;
      occurred_at: string;
    }>;

  return rows.map((row) => ({
    id: row.id,
    paRequestId: row.pa_request_id,
    fromStatus: row.from_status,
    toStatus: row.to_status,
    ...(row.reason !== null && { reason: row.reason }),
    occurredAt: new Date(row.occurred_at),
  }));
}
