/**
 * Referral Registry
 *
 * Answers whether a patient has a usable referral to a provider.
 * A referral counts when it is approved, names the provider and payer,
 * and its approval has not expired on the visit date.
 */

import type { Referral } from "../types/referral.js";
import { findReferralsForPatient, saveReferral } from "../storage/index.js";

export function isReferralValid(referral: Referral, payerId: string, providerId: string, onDate: string): boolean {
  return (
    referral.status === "approved" &&
    referral.payerId === payerId &&
    referral.referredToProviderId === providerId &&
    (referral.approvalExpirationDate === undefined || referral.approvalExpirationDate >= onDate)
  );
}

export type RecordReferralInput = Omit<Referral, "lastUpdatedAt">;

export class ReferralRegistry {
  constructor(private now: () => Date = () => new Date()) {}

  async hasReferralOnFile(patientId: string, payerId: string, providerId: string, onDate: string): Promise<boolean> {
    const referrals = await findReferralsForPatient(patientId);
    return referrals.some((r) => isReferralValid(r, payerId, providerId, onDate));
  }

  async list(patientId: string): Promise<Referral[]> {
    return findReferralsForPatient(patientId);
  }

  /** Insert or replace a referral as the payer last reported it */
  async record(input: RecordReferralInput): Promise<Referral> {
    const saved = await saveReferral({ ...input, lastUpdatedAt: this.now() });
    console.log(`[referrals] ${saved.id} for patient ${saved.patientId} is ${saved.status}`);
    return saved;
  }
}
