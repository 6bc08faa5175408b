/**
 * Patient Storage
 *
 * SQLite storage for patient entities. No engine operation deletes a patient.
 */

import type {
  Patient,
  PatientCoverage,
  CreatePatientInput,
  UpdatePatientInput,
} from "../types/patient.js";
import { generateId } from "./base.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for patients.
 */
export const patientsStorage = createSqliteRepository<Patient>("patients", [
  { column: "full_name", property: "fullName" },
  { column: "date_of_birth", property: "dateOfBirth" },
]);

/**
 * Create a new patient record.
 */
export async function createPatient(
  input: CreatePatientInput
): Promise<Patient> {
  const now = new Date();
  const patient: Patient = {
    ...input,
    id: input.id ?? generateId(),
    createdAt: now,
    updatedAt: now,
  };
  return patientsStorage.save(patient);
}

/**
 * Update an existing patient.
 */
export async function updatePatient(
  id: string,
  updates: UpdatePatientInput
): Promise<Patient | null> {
  const existing = await patientsStorage.get(id);
  if (!existing) return null;

  const updated: Patient = {
    ...existing,
    ...updates,
    updatedAt: new Date(),
  };
  return patientsStorage.save(updated);
}

/**
 * The patient's enrollment with a payer, if any.
 */
export function findCoverage(
  patient: Patient,
  payerId: string
): PatientCoverage | null {
  return patient.coverages.find((c) => c.payerId === payerId) ?? null;
}
