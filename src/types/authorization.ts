/**
 * Authorization rule and requirement types.
 */

/**
 * Kind of clinical document a payer may require with a PA submission.
 */
export type DocumentKind =
  | "physician_progress_notes"
  | "imaging_reports"
  | "pcp_referral"
  | "specialist_notes"
  | "lab_results"
  | "letter_of_medical_necessity";

/** All document kinds, in the order they are presented to reviewers */
export const DOCUMENT_KINDS: readonly DocumentKind[] = [
  "physician_progress_notes",
  "imaging_reports",
  "pcp_referral",
  "specialist_notes",
  "lab_results",
  "letter_of_medical_necessity",
] as const;

/** Human-readable labels used on rendered packages */
export const DOCUMENT_KIND_LABELS: Readonly<Record<DocumentKind, string>> = {
  physician_progress_notes: "Physician Progress Notes",
  imaging_reports: "Imaging Reports",
  pcp_referral: "PCP Referral",
  specialist_notes: "Specialist Notes",
  lab_results: "Lab Results",
  letter_of_medical_necessity: "Letter of Medical Necessity",
};

/**
 * Prior authorization rule for a (payer, service) pair.
 * Static reference data; the engine never writes these.
 */
export interface AuthorizationRule {
  id: string;
  payerId: string;
  serviceCode: string;
  paRequired: boolean;
  referralRequired: boolean;

  /** Documents the payer expects, in submission order */
  requiredDocs: DocumentKind[];

  /** Phrases that establish medical necessity for this payer */
  necessityKeywords: string[];

  payerPortalUrl?: string;
  payerAuthPhone?: string;
}

/**
 * Resolved authorization requirement for a request.
 */
export interface AuthRequirement {
  payerId: string;
  serviceCode: string;
  paRequired: boolean;
  referralRequired: boolean;
  requiredDocs: DocumentKind[];
  necessityKeywords: string[];

  /** False when no rule exists and the fail-open default was used */
  ruleFound: boolean;

  payerAuthPhone?: string;
  payerPortalUrl?: string;
}

/**
 * Reference-data gap recorded when no rule exists for a pair.
 */
export interface UnknownAuthorizationRule {
  payerId: string;
  serviceCode: string;
  firstSeenAt: Date;
  occurrences: number;
}
