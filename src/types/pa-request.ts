/**
 * Prior authorization request types.
 */

import type { RiskAssessment } from "./denial.js";

/**
 * Lifecycle state of a PA request.
 */
export type PaStatus =
  | "initiated"          // Opened, package being assembled
  | "submitted"          // Sent to the payer
  | "pending_review"     // Payer acknowledged and is reviewing
  | "requires_more_info" // Payer asked for more documentation
  | "approved"           // Payer authorized the service
  | "denied"             // Payer denied, or info requests exhausted
  | "withdrawn";         // Appointment request withdrawn

/** All PA statuses for iteration */
export const PA_STATUSES: readonly PaStatus[] = [
  "initiated",
  "submitted",
  "pending_review",
  "requires_more_info",
  "approved",
  "denied",
  "withdrawn",
] as const;

/** States no transition leaves */
export const TERMINAL_PA_STATUSES: readonly PaStatus[] = [
  "approved",
  "denied",
  "withdrawn",
] as const;

/**
 * Permitted transitions, keyed by source state.
 */
export const PA_TRANSITIONS: Readonly<Record<PaStatus, readonly PaStatus[]>> = {
  initiated: ["submitted", "withdrawn"],
  submitted: ["pending_review", "withdrawn"],
  pending_review: ["approved", "denied", "requires_more_info", "withdrawn"],
  requires_more_info: ["submitted", "denied", "withdrawn"],
  approved: [],
  denied: [],
  withdrawn: [],
};

/** Denial reason recorded when info requests are exhausted */
export const MAX_INFO_REQUESTS_EXCEEDED = "MaxInfoRequestsExceeded";

/**
 * Channel a PA request was submitted through.
 */
export type SubmissionMethod = "electronic" | "fax" | "phone";

/** All submission methods, in the order they are attempted */
export const SUBMISSION_METHODS: readonly SubmissionMethod[] = [
  "electronic",
  "fax",
  "phone",
] as const;

/**
 * One prior-authorization lifecycle.
 */
export interface PaRequest {
  id: string;
  patientId: string;
  providerId: string;
  serviceCode: string;
  payerId: string;

  /** Appointment waiting on this authorization */
  appointmentId?: string;

  /** Appointment request that opened this PA */
  appointmentRequestId?: string;

  status: PaStatus;
  submissionMethod?: SubmissionMethod;

  /** Payer tracking number returned on submission */
  payerTrackingNumber?: string;

  /** Payer authorization number, written on approval */
  authorizationNumber?: string;

  denialReasonCode?: string;

  /** Times the payer asked for more information */
  infoRequestCount: number;

  documentationPackageId?: string;

  /** Most recent denial risk assessment */
  lastAssessment?: RiskAssessment;

  initiatedAt: Date;
  lastUpdatedAt: Date;
}

/**
 * Append-only audit row for a PA transition.
 */
export interface PaTransition {
  id: string;
  paRequestId: string;
  fromStatus: PaStatus;
  toStatus: PaStatus;
  reason?: string;
  occurredAt: Date;
}

/**
 * Decision outcome reported by a payer.
 */
export type DecisionOutcome =
  | "received"
  | "pending_review"
  | "approved"
  | "denied"
  | "requires_more_info";

/** All decision outcomes for iteration */
export const DECISION_OUTCOMES: readonly DecisionOutcome[] = [
  "received",
  "pending_review",
  "approved",
  "denied",
  "requires_more_info",
] as const;

/**
 * Payer response to a PA submission or a later status update.
 */
export interface AuthDecision {
  outcome: DecisionOutcome;
  trackingNumber?: string;
  authorizationNumber?: string;
  denialReasonCode?: string;
  message?: string;
}

export type CreatePaRequestInput = Pick<
  PaRequest,
  "patientId" | "providerId" | "serviceCode" | "payerId"
> &
  Partial<Pick<PaRequest, "appointmentId" | "appointmentRequestId">>;
