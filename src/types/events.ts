/**
 * Engine events observed by the staff alert dispatcher.
 */

import type { RiskAssessment } from "./denial.js";
import type { PaStatus } from "./pa-request.js";
import type { NetworkStatus } from "./provider.js";
import type { VerificationStatus } from "./eligibility.js";

export type EngineEvent =
  | {
      type: "eligibility.verified";
      patientId: string;
      payerId: string;
      snapshotId: string;
      at: Date;
    }
  | {
      type: "eligibility.failed";
      patientId: string;
      payerId: string;
      status: Exclude<VerificationStatus, "success">;
      errorCode: string;
      errorMessage: string;
      /** Failures for the pair since its last success, this one included */
      consecutiveFailures: number;
      at: Date;
    }
  | {
      type: "risk.assessed";
      patientId: string;
      /** Set when the assessment belongs to a PA request */
      paRequestId?: string;
      /** Appointment request scored when no PA is involved */
      requestId?: string;
      appointmentId?: string;
      assessment: RiskAssessment;
      /** False once the request has been submitted */
      beforeSubmission: boolean;
      at: Date;
    }
  | {
      type: "pa.transitioned";
      patientId: string;
      paRequestId: string;
      appointmentId?: string;
      from: PaStatus;
      to: PaStatus;
      reason?: string;
      denialReasonCode?: string;
      lastAssessment?: RiskAssessment;
      at: Date;
    }
  | {
      type: "pa.submission_blocked";
      patientId: string;
      paRequestId: string;
      appointmentId?: string;
      problems: string[];
      recommendedAction: string;
      at: Date;
    }
  | {
      type: "appointment.booked";
      patientId: string;
      appointmentId: string;
      providerId: string;
      payerId: string;
      networkStatus: NetworkStatus;
      referralRequired: boolean;
      at: Date;
    };

export type EngineEventType = EngineEvent["type"];

/**
 * Receives engine events. Components publish; the dispatcher subscribes.
 */
export type EventListener = (event: EngineEvent) => Promise<void> | void;
