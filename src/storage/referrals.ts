/**
 * Referral Storage
 */

import type { Referral } from "../types/referral.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for referrals.
 */
export const referralsStorage = createSqliteRepository<Referral>("referrals", [
  { column: "patient_id", property: "patientId" },
  { column: "payer_id", property: "payerId" },
  { column: "status", property: "status" },
]);

export async function saveReferral(referral: Referral): Promise<Referral> {
  return referralsStorage.save({ ...referral });
}

export async function findReferralsForPatient(patientId: string): Promise<Referral[]> {
  return referralsStorage.findAllByIndex("patientId", patientId);
}
