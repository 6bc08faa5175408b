/**
 * Eligibility snapshot and verification log types.
 *
 * Snapshots are append-only: each successful verification writes a new
 * one, and the most recent by `verifiedAt` is the current one.
 */

/** Coverage status reported by the payer */
export type CoverageStatus = "Active" | "Inactive" | "Pending";

/** All coverage statuses for iteration */
export const COVERAGE_STATUSES: readonly CoverageStatus[] = [
  "Active",
  "Inactive",
  "Pending",
] as const;

/**
 * Channel used to verify eligibility.
 */
export type VerificationMethod = "edi" | "portal";

/** All verification methods for iteration */
export const VERIFICATION_METHODS: readonly VerificationMethod[] = [
  "edi",
  "portal",
] as const;

/**
 * Outcome of one verification against the payer.
 */
export type VerificationStatus = "success" | "failed" | "partial";

/** All verification statuses for iteration */
export const VERIFICATION_STATUSES: readonly VerificationStatus[] = [
  "success",
  "failed",
  "partial",
] as const;

/**
 * A service-specific limitation on the plan (e.g., DME limited to $500/year).
 */
export interface ServiceLimitation {
  category: string;
  limitation: string;
}

/**
 * Coverage terms as returned by a payer connector.
 */
export interface CoverageData {
  memberId: string;
  groupNumber?: string;
  planName?: string;
  coverageStatus: CoverageStatus;

  /** "YYYY-MM-DD" */
  effectiveDate?: string;
  terminationDate?: string;

  deductibleAmount: number;
  deductibleMetYtd: number;

  /** Percentage, 0..100 */
  coinsurancePercentage: number;

  copaySpecialist?: number;
  copayPcp?: number;
  outOfPocketMax: number;
  outOfPocketMetYtd: number;
  referralRequired: boolean;
  pcpDesignation?: string;
  serviceLimitations: ServiceLimitation[];
}

/**
 * Immutable point-in-time coverage fact for a (patient, payer) pair.
 */
export interface EligibilitySnapshot extends CoverageData {
  id: string;
  patientId: string;
  payerId: string;

  /** When the payer confirmed these terms */
  verifiedAt: Date;

  method: VerificationMethod;
}

/**
 * Append-only audit entry for a verification against a payer.
 */
export interface VerificationLogEntry {
  id: string;
  patientId: string;
  payerId: string;
  status: VerificationStatus;
  method: VerificationMethod;

  /** Connector calls made, including retries */
  attempts: number;

  /** Stable error code (e.g., "MISSING_MEMBER_ID", "TIMEOUT") */
  errorCode?: string;
  errorMessage?: string;

  /** Raw payload of the last connector response, for audit */
  rawResponse?: string;

  /** Snapshot written on success */
  snapshotId?: string;

  verifiedAt: Date;
}

export type CreateVerificationLogInput = Omit<VerificationLogEntry, "id">;

export type CreateEligibilitySnapshotInput = Omit<EligibilitySnapshot, "id">;
