/**
 * Staff alert types.
 */

import type { RiskLevel } from "./denial.js";

/** Alert category shown in the staff work queue */
export type AlertType =
  | "Denial Risk"
  | "PA Needs Review"
  | "Missing Info"
  | "PA Denied"
  | "Network Mismatch";

/** All alert types for iteration */
export const ALERT_TYPES: readonly AlertType[] = [
  "Denial Risk",
  "PA Needs Review",
  "Missing Info",
  "PA Denied",
  "Network Mismatch",
] as const;

/**
 * Condition that raised an alert.
 * Alerts are unique per (trigger, subject) while unresolved.
 */
export type AlertTrigger =
  | "pa_denied"
  | "max_info_requests_exceeded"
  | "eligibility_failed_repeatedly"
  | "high_risk_before_submission"
  | "out_of_network_referral_booking"
  | "pa_submission_blocked";

/** All alert triggers for iteration */
export const ALERT_TRIGGERS: readonly AlertTrigger[] = [
  "pa_denied",
  "max_info_requests_exceeded",
  "eligibility_failed_repeatedly",
  "high_risk_before_submission",
  "out_of_network_referral_booking",
  "pa_submission_blocked",
] as const;

/**
 * Alert status. `resolved` is terminal.
 */
export type AlertStatus = "new" | "acknowledged" | "resolved";

/** All alert statuses for iteration */
export const ALERT_STATUSES: readonly AlertStatus[] = [
  "new",
  "acknowledged",
  "resolved",
] as const;

/**
 * An actionable item in the staff queue.
 */
export interface StaffAlert {
  id: string;
  trigger: AlertTrigger;

  /**
   * What the alert is about, e.g. "pa:<id>", "appointment:<id>",
   * "eligibility:<patientId>:<payerId>".
   */
  subjectKey: string;

  alertType: AlertType;
  patientId: string;
  appointmentId?: string;
  paRequestId?: string;
  riskLevel?: RiskLevel;
  predictedReason: string;
  recommendedAction: string;
  responsibleRole?: string;

  /** Patient-facing message staff can send, for missing-info alerts */
  outreachMessage?: string;

  status: AlertStatus;

  /** Times the trigger fired while this alert was open */
  occurrences: number;

  createdAt: Date;
  updatedAt: Date;
  acknowledgedAt?: Date;
  resolvedAt?: Date;
}

/**
 * Alert content produced by a trigger, before idempotent upsert.
 */
export type AlertDraft = Omit<
  StaffAlert,
  "id" | "status" | "occurrences" | "createdAt" | "updatedAt" | "acknowledgedAt" | "resolvedAt"
>;
