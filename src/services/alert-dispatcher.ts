/**
 * Staff Alert Dispatcher
 *
 * Turns engine events into actionable alerts in the staff work queue.
 * One unresolved alert per (trigger, subject): a trigger that fires again
 * refreshes the open alert instead of adding another.
 */

import type { AlertDraft, AlertStatus, StaffAlert } from "../types/alert.js";
import type { EngineEvent } from "../types/events.js";
import type { EngineConfig } from "../config.js";
import { MAX_INFO_REQUESTS_EXCEEDED } from "../types/pa-request.js";
import {
  alertsStorage,
  listAlerts,
  patientsStorage,
  payersStorage,
  providersStorage,
  upsertOpenAlert,
} from "../storage/index.js";
import { BusinessRuleError, NotFoundError } from "./errors.js";
import { BUILT_IN_STRATEGIES } from "./denial-risk-predictor.js";
import { missingFieldForError, type OutreachComposer } from "./outreach.js";

/** Consecutive failed verifications for a pair before staff are alerted */
export const ELIGIBILITY_FAILURE_THRESHOLD = 2;

export interface AlertDispatcherDeps {
  config: Pick<EngineConfig, "clinicName" | "patientPortalUrl">;
  outreach: OutreachComposer;
  now?: () => Date;
}

export class AlertDispatcher {
  private now: () => Date;

  constructor(private deps: AlertDispatcherDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Event listener. Returns the raised or refreshed alert, if any.
   */
  observe = async (event: EngineEvent): Promise<StaffAlert | null> => {
    const draft = await this.draftFor(event);
    if (!draft) return null;

    const { alert, created } = await upsertOpenAlert(draft, this.now());
    console.log(
      created
        ? `[alerts] Raised ${alert.alertType} for ${alert.subjectKey}`
        : `[alerts] Refreshed ${alert.alertType} for ${alert.subjectKey} (${alert.occurrences} occurrences)`
    );
    return alert;
  };

  private async draftFor(event: EngineEvent): Promise<AlertDraft | null> {
    switch (event.type) {
      case "eligibility.failed":
        if (event.consecutiveFailures < ELIGIBILITY_FAILURE_THRESHOLD) return null;
        return this.missingInfo(event);

      case "risk.assessed": {
        if (event.assessment.level !== "high" || !event.beforeSubmission) return null;
        const { assessment } = event;
        return {
          trigger: "high_risk_before_submission",
          subjectKey: event.paRequestId ? `pa:${event.paRequestId}` : `request:${event.requestId ?? event.patientId}`,
          alertType: "Denial Risk",
          patientId: event.patientId,
          ...(event.paRequestId && { paRequestId: event.paRequestId }),
          ...(event.appointmentId && { appointmentId: event.appointmentId }),
          riskLevel: assessment.level,
          predictedReason: assessment.predictedReason,
          recommendedAction: assessment.recommendedAction ?? "Review the request with the payer before submission",
          ...(assessment.responsibleRole && { responsibleRole: assessment.responsibleRole }),
        };
      }

      case "pa.transitioned": {
        if (event.to !== "denied") return null;
        const exhausted = event.denialReasonCode === MAX_INFO_REQUESTS_EXCEEDED;
        const assessment = event.lastAssessment;
        return {
          trigger: exhausted ? "max_info_requests_exceeded" : "pa_denied",
          subjectKey: `pa:${event.paRequestId}`,
          alertType: "PA Denied",
          patientId: event.patientId,
          paRequestId: event.paRequestId,
          ...(event.appointmentId && { appointmentId: event.appointmentId }),
          ...(assessment && { riskLevel: assessment.level }),
          predictedReason: (exhausted ? event.reason : event.denialReasonCode ?? event.reason) ?? "Denied by payer",
          recommendedAction: exhausted
            ? "Call the payer to resolve the outstanding information request, then appeal"
            : assessment?.recommendedAction ?? "Review the denial and file an appeal",
          responsibleRole: assessment?.responsibleRole ?? "Auth Specialist",
        };
      }

      case "pa.submission_blocked":
        return {
          trigger: "pa_submission_blocked",
          subjectKey: `pa:${event.paRequestId}`,
          alertType: "PA Needs Review",
          patientId: event.patientId,
          paRequestId: event.paRequestId,
          ...(event.appointmentId && { appointmentId: event.appointmentId }),
          predictedReason: event.problems.join("; "),
          recommendedAction: event.recommendedAction,
          responsibleRole: "Auth Specialist",
        };

      case "appointment.booked": {
        if (event.networkStatus !== "out_of_network" || !event.referralRequired) return null;
        const provider = await providersStorage.get(event.providerId);
        const payer = await payersStorage.get(event.payerId);
        const strategy = BUILT_IN_STRATEGIES.outOfNetwork;
        return {
          trigger: "out_of_network_referral_booking",
          subjectKey: `appointment:${event.appointmentId}`,
          alertType: "Network Mismatch",
          patientId: event.patientId,
          appointmentId: event.appointmentId,
          riskLevel: "high",
          predictedReason: `${provider?.name ?? event.providerId} is out-of-network for ${payer?.name ?? event.payerId}, which requires a referral`,
          recommendedAction: strategy.description,
          responsibleRole: strategy.responsibleRole,
        };
      }

      case "eligibility.verified":
        return null;
    }
  }

  private async missingInfo(event: Extract<EngineEvent, { type: "eligibility.failed" }>): Promise<AlertDraft> {
    const field = missingFieldForError(event.errorCode);
    const patient = await patientsStorage.get(event.patientId);
    const payer = await payersStorage.get(event.payerId);

    const outreachMessage = patient
      ? this.deps.outreach.compose({
          patient,
          ...(payer && { payer }),
          missingInfoField: field,
          clinicName: this.deps.config.clinicName,
          portalUrl: this.deps.config.patientPortalUrl,
        })
      : null;

    return {
      trigger: "eligibility_failed_repeatedly",
      subjectKey: `eligibility:${event.patientId}:${event.payerId}`,
      alertType: "Missing Info",
      patientId: event.patientId,
      predictedReason: `Eligibility check failed ${event.consecutiveFailures} times in a row: ${event.errorMessage}`,
      recommendedAction: `Collect the patient's ${field} and verify eligibility again`,
      responsibleRole: "Front Desk",
      ...(outreachMessage && { outreachMessage }),
    };
  }

  async get(alertId: string): Promise<StaffAlert> {
    const alert = await alertsStorage.get(alertId);
    if (!alert) throw new NotFoundError("Alert", alertId);
    return alert;
  }

  async acknowledge(alertId: string): Promise<StaffAlert> {
    const alert = await this.get(alertId);
    if (alert.status === "resolved") {
      throw new BusinessRuleError(`Alert ${alertId} is already resolved`);
    }
    if (alert.status === "acknowledged") return alert;

    const now = this.now();
    const acknowledged: StaffAlert = { ...alert, status: "acknowledged", acknowledgedAt: now, updatedAt: now };
    await alertsStorage.save(acknowledged);
    return acknowledged;
  }

  async resolve(alertId: string): Promise<StaffAlert> {
    const alert = await this.get(alertId);
    if (alert.status === "resolved") return alert;

    const now = this.now();
    const resolved: StaffAlert = { ...alert, status: "resolved", resolvedAt: now, updatedAt: now };
    await alertsStorage.save(resolved);
    console.log(`[alerts] Resolved ${alert.alertType} for ${alert.subjectKey}`);
    return resolved;
  }

  async list(filter: { status?: AlertStatus; patientId?: string } = {}): Promise<StaffAlert[]> {
    return listAlerts(filter);
  }
}
