/**
 * Appointment Storage
 *
 * Appointment requests and what they resolve into: appointments or
 * waitlist entries. A non-canceled appointment per slot is enforced by
 * a partial unique index.
 */

import type {
  AppointmentRequest,
  CreateAppointmentRequestInput,
  Appointment,
  WaitlistEntry,
  WaitlistStatus,
} from "../types/appointment.js";
import { generateId } from "./base.js";
import { createSqliteRepository, getDatabase } from "./sqlite.js";

/**
 * Storage operations for appointment requests.
 */
export const appointmentRequestsStorage = createSqliteRepository<AppointmentRequest>(
  "appointment_requests",
  [
    { column: "patient_id", property: "patientId" },
    { column: "status", property: "status" },
  ]
);

/**
 * Storage operations for appointments.
 */
export const appointmentsStorage = createSqliteRepository<Appointment>("appointments", [
  { column: "request_id", property: "requestId" },
  { column: "provider_id", property: "providerId" },
  { column: "date", property: "date" },
  { column: "time", property: "time" },
  { column: "status", property: "status" },
]);

/**
 * Storage operations for waitlist entries.
 */
export const waitlistStorage = createSqliteRepository<WaitlistEntry>("waitlist_entries", [
  { column: "request_id", property: "requestId" },
  { column: "service_code", property: "serviceCode" },
  { column: "status", property: "status" },
]);

/**
 * Create a new pending appointment request.
 */
export async function createAppointmentRequest(
  input: CreateAppointmentRequestInput
): Promise<AppointmentRequest> {
  const now = new Date();
  const request: AppointmentRequest = {
    ...input,
    id: generateId(),
    status: "pending",
    createdAt: now,
    updatedAt: now,
  };
  return appointmentRequestsStorage.save(request);
}

/**
 * Update an existing appointment request.
 */
export async function updateAppointmentRequest(
  id: string,
  updates: Partial<Omit<AppointmentRequest, "id" | "createdAt">>
): Promise<AppointmentRequest | null> {
  const existing = await appointmentRequestsStorage.get(id);
  if (!existing) return null;

  const updated: AppointmentRequest = {
    ...existing,
    ...updates,
    updatedAt: new Date(),
  };
  return appointmentRequestsStorage.save(updated);
}

/**
 * Update an existing waitlist entry.
 */
export async function updateWaitlistEntry(
  id: string,
  updates: Partial<Omit<WaitlistEntry, "id" | "addedAt">>
): Promise<WaitlistEntry | null> {
  const existing = await waitlistStorage.get(id);
  if (!existing) return null;

  const updated: WaitlistEntry = {
    ...existing,
    ...updates,
    updatedAt: new Date(),
  };
  return waitlistStorage.save(updated);
}

/**
 * Atomically move a waitlist entry from one status to another.
 * Returns null when the entry was not in `from` (someone else moved it).
 */
export async function transitionWaitlistEntry(
  id: string,
  from: WaitlistStatus,
  to: WaitlistStatus
): Promise<WaitlistEntry | null> {
  const result = getDatabase()
    .prepare(
      `UPDATE waitlist_entries
       SET status = ?,
           data = json_set(data, '$.status', ?, '$.updatedAt', ?),
           updated_at = datetime('now')
       WHERE id = ? AND status = ?`
    )
    .run(to, to, new Date().toISOString(), id, from);

  if (result.changes !== 1) return null;
  return waitlistStorage.get(id);
}

/**
 * Active waitlist entries, oldest first.
 */
export async function getActiveWaitlist(): Promise<WaitlistEntry[]> {
  const entries = await waitlistStorage.findAllByIndex("status", "active");
  return entries.sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime());
}
