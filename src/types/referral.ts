/**
 * Referral and outreach reference types.
 */

import type { CommunicationChannel } from "./patient.js";

/** Referral status as tracked with the payer */
export type ReferralStatus = "pending_request" | "sent_to_payer" | "approved" | "denied";

/** All referral statuses for iteration */
export const REFERRAL_STATUSES: readonly ReferralStatus[] = [
  "pending_request",
  "sent_to_payer",
  "approved",
  "denied",
] as const;

/**
 * A referral from one provider to another for a patient.
 * Referring and referred-to provider may be the same.
 */
export interface Referral {
  /** Referral identifier (e.g., "REF-JS102-BW202") */
  id: string;
  patientId: string;
  referringProviderId?: string;
  referredToProviderId: string;
  payerId: string;
  serviceType?: string;
  status: ReferralStatus;

  /** Last day the approval is valid, "YYYY-MM-DD" */
  approvalExpirationDate?: string;

  lastUpdatedAt: Date;
}

/**
 * Patient outreach template for collecting missing information.
 * Placeholders look like `[Patient Name]`.
 */
export interface OutreachTemplate {
  id: string;
  missingInfoField: string;
  channel: CommunicationChannel;
  templateText: string;
  secureSubmissionText?: string;
}
