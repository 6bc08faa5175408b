/**
 * Appointment Orchestrator
 *
 * Drives an appointment request through the engine: eligibility, the
 * payer's authorization rule, slot allocation (tentative while a PA is
 * pending), denial risk and, when the payer requires it, a PA request
 * with its documentation package.
 */

import type { AuthRequirement } from "../types/authorization.js";
import type {
  Appointment,
  AppointmentRequest,
  CreateAppointmentRequestInput,
  WaitlistEntry,
} from "../types/appointment.js";
import type { RiskAssessment } from "../types/denial.js";
import type { DocumentationPackage } from "../types/documentation.js";
import type { PaRequest } from "../types/pa-request.js";
import {
  appointmentRequestsStorage,
  createAppointmentRequest,
  getNetworkStatus,
  patientsStorage,
  payersStorage,
  updateAppointmentRequest,
} from "../storage/index.js";
import {
  EligibilityUnavailableError,
  NotFoundError,
  ValidationError,
} from "./errors.js";
import type { AuthRuleResolver } from "./auth-rule-resolver.js";
import type { DenialRiskPredictor } from "./denial-risk-predictor.js";
import type { EligibilityResult, EligibilityVerifier } from "./eligibility-verifier.js";
import type { ReferralRegistry } from "./referral-registry.js";
import type { Allocation, SchedulingAllocator } from "./scheduling-allocator.js";
import type { CostEstimate, CostEstimator } from "./cost-estimator.js";
import { isTerminal, type PaStateMachine } from "./pa-state-machine.js";
import type { Publish } from "./event-bus.js";

export interface OrchestratorDeps {
  verifier: EligibilityVerifier;
  resolver: AuthRuleResolver;
  predictor: DenialRiskPredictor;
  referrals: ReferralRegistry;
  allocator: SchedulingAllocator;
  paStateMachine: PaStateMachine;
  costs: CostEstimator;
  publish: Publish;
  now?: () => Date;
}

export interface AppointmentOutcome {
  request: AppointmentRequest;

  /** Null when no coverage could be presented */
  eligibility: EligibilityResult | null;
  eligibilityError?: string;

  requirement: AuthRequirement;
  allocation: Allocation;

  /** Absent while the request waits for a provider to be chosen */
  assessment?: RiskAssessment;
  paRequest?: PaRequest;
  documentationPackage?: DocumentationPackage;
  costEstimate?: CostEstimate | null;
}

/** Urgency is scored 1 (routine) to 5 (urgent) */
const URGENCY_MIN = 1;
const URGENCY_MAX = 5;

export class Orchestrator {
  private now: () => Date;

  constructor(private deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private today(): string {
    return this.now().toISOString().slice(0, 10);
  }

  private validate(input: CreateAppointmentRequestInput): void {
    if (!Number.isInteger(input.urgencyScore) || input.urgencyScore < URGENCY_MIN || input.urgencyScore > URGENCY_MAX) {
      throw new ValidationError(`urgencyScore must be an integer from ${URGENCY_MIN} to ${URGENCY_MAX}`);
    }
    if (!input.serviceCode.trim()) {
      throw new ValidationError("serviceCode is required");
    }
  }

  /**
   * Open a PA request for the provider the patient will see, and build
   * its documentation package. Staff review and submit from there.
   */
  private async openPriorAuth(
    request: AppointmentRequest,
    requirement: AuthRequirement,
    providerId: string,
    appointment?: Appointment
  ): Promise<{ paRequest: PaRequest; documentationPackage: DocumentationPackage }> {
    const { paStateMachine } = this.deps;
    const pa = await paStateMachine.initiate({
      patientId: request.patientId,
      providerId,
      serviceCode: request.serviceCode,
      payerId: request.payerId,
      appointmentRequestId: request.id,
      ...(appointment && { appointmentId: appointment.id }),
      requirement,
    });
    await updateAppointmentRequest(request.id, { paRequestId: pa.id });

    const documentationPackage = await paStateMachine.preparePackage(pa.id);
    return { paRequest: await paStateMachine.get(pa.id), documentationPackage };
  }

  /**
   * Score a request that needs no PA, so high-risk bookings still reach staff.
   */
  private async assess(
    request: AppointmentRequest,
    requirement: AuthRequirement,
    providerId: string,
    appointment?: Appointment
  ): Promise<RiskAssessment> {
    const serviceDate = appointment?.date ?? this.today();
    const payer = await payersStorage.get(request.payerId);
    const referralOnFile = await this.deps.referrals.hasReferralOnFile(
      request.patientId,
      request.payerId,
      providerId,
      serviceDate
    );
    const networkStatus = (await getNetworkStatus(providerId, request.payerId, serviceDate)) ?? "out_of_network";

    const assessment = this.deps.predictor.score({
      payerId: request.payerId,
      ...(payer && { payerName: payer.name }),
      serviceCode: request.serviceCode,
      requirement,
      referralOnFile,
      networkStatus,
    });

    await this.deps.publish({
      type: "risk.assessed",
      patientId: request.patientId,
      requestId: request.id,
      ...(appointment && { appointmentId: appointment.id }),
      assessment,
      beforeSubmission: true,
      at: this.now(),
    });
    return assessment;
  }

  async requestAppointment(input: CreateAppointmentRequestInput): Promise<AppointmentOutcome> {
    this.validate(input);
    const patient = await patientsStorage.get(input.patientId);
    if (!patient) throw new NotFoundError("Patient", input.patientId);
    const payer = await payersStorage.get(input.payerId);
    if (!payer) throw new NotFoundError("Payer", input.payerId);

    const created = await createAppointmentRequest(input);
    console.log(`[orchestrator] Request ${created.id}: ${patient.id} ${input.serviceCode} with ${payer.name}`);

    let eligibility: EligibilityResult | null = null;
    let eligibilityError: string | undefined;
    try {
      eligibility = await this.deps.verifier.verify(patient.id, payer.id);
    } catch (err) {
      if (!(err instanceof EligibilityUnavailableError)) throw err;
      eligibilityError = err.message;
      console.warn(`[orchestrator] Request ${created.id}: continuing without coverage (${err.message})`);
    }
    if (eligibility && eligibility.snapshot.coverageStatus !== "Active") {
      console.warn(`[orchestrator] Request ${created.id}: coverage is ${eligibility.snapshot.coverageStatus}`);
    }

    const requirement = this.deps.resolver.resolve(payer.id, input.serviceCode);
    const allocation = await this.deps.allocator.allocate(created, {
      contingentOnAuthorization: requirement.paRequired,
    });

    const appointment: Appointment | undefined = allocation.kind === "appointment" ? allocation.appointment : undefined;
    const providerId = appointment?.providerId ?? created.requestedProviderId;

    let assessment: RiskAssessment | undefined;
    let paRequest: PaRequest | undefined;
    let documentationPackage: DocumentationPackage | undefined;

    if (providerId && requirement.paRequired) {
      const opened = await this.openPriorAuth(created, requirement, providerId, appointment);
      paRequest = opened.paRequest;
      documentationPackage = opened.documentationPackage;
      assessment = paRequest.lastAssessment;
    } else if (providerId) {
      assessment = await this.assess(created, requirement, providerId, appointment);
    }

    const costEstimate =
      eligibility && providerId
        ? this.deps.costs.estimate(eligibility.snapshot, input.serviceCode, providerId)
        : undefined;

    const request = (await appointmentRequestsStorage.get(created.id)) ?? created;
    return {
      request,
      eligibility,
      ...(eligibilityError && { eligibilityError }),
      requirement,
      allocation,
      ...(assessment && { assessment }),
      ...(paRequest && { paRequest }),
      ...(documentationPackage && { documentationPackage }),
      ...(costEstimate !== undefined && { costEstimate }),
    };
  }

  /**
   * A freed slot was given to a waitlisted request. Link it to the
   * request's PA, or open the PA now that the provider is known.
   */
  handleWaitlistFulfilled = async (entry: WaitlistEntry, appointment: Appointment): Promise<void> => {
    const request = await appointmentRequestsStorage.get(entry.requestId);
    if (!request) return;

    if (request.paRequestId) {
      await this.deps.paStateMachine.attachAppointment(request.paRequestId, appointment.id);
      return;
    }

    const requirement = this.deps.resolver.resolve(request.payerId, request.serviceCode);
    if (requirement.paRequired) {
      await this.openPriorAuth(request, requirement, appointment.providerId, appointment);
    } else {
      await this.assess(request, requirement, appointment.providerId, appointment);
    }
  };

  /**
   * Withdraw a request and everything it holds: its waitlist entry, its
   * open PA request and its appointment, whose slot goes back to the
   * waitlist.
   */
  async withdrawRequest(requestId: string): Promise<AppointmentRequest> {
    const request = await appointmentRequestsStorage.get(requestId);
    if (!request) throw new NotFoundError("Appointment request", requestId);
    if (request.status === "withdrawn") return request;

    // Marked first so an in-flight PA submission sees it
    const withdrawn = (await updateAppointmentRequest(requestId, {
      status: "withdrawn",
      withdrawnAt: this.now(),
    })) ?? request;
    console.log(`[orchestrator] Request ${requestId} withdrawn`);

    if (request.waitlistEntryId) {
      await this.deps.allocator.withdrawWaitlistEntry(request.waitlistEntryId);
    }

    const pa = await this.deps.paStateMachine.findByAppointmentRequest(requestId);
    if (pa && !isTerminal(pa.status)) {
      await this.deps.paStateMachine.withdraw(pa.id, "Appointment request withdrawn");
    }

    const latest = (await appointmentRequestsStorage.get(requestId)) ?? withdrawn;
    if (latest.appointmentId) {
      await this.deps.allocator.cancelAppointment(latest.appointmentId);
    }
    return latest;
  }
}
