/**
 * PA Request State Machine
 *
 * Lifecycle controller for prior authorization requests:
 *
 *   initiated -> submitted -> pending_review -> approved | denied | requires_more_info
 *   requires_more_info -> submitted (bounded by maxInfoRequests, then denied)
 *   any non-terminal -> withdrawn
 *
 * All writes for one request run under a per-request lock. Every
 * transition is appended to the audit history and published.
 */

import type { AuthRequirement } from "../types/authorization.js";
import type { ClinicalDocument, DocumentationPackage } from "../types/documentation.js";
import type { NetworkStatus } from "../types/provider.js";
import type { RiskAssessment } from "../types/denial.js";
import type {
  AuthDecision,
  CreatePaRequestInput,
  PaRequest,
  PaStatus,
  PaTransition,
  SubmissionMethod,
} from "../types/pa-request.js";
import {
  MAX_INFO_REQUESTS_EXCEEDED,
  PA_TRANSITIONS,
  TERMINAL_PA_STATUSES,
} from "../types/pa-request.js";
import type { EngineConfig } from "../config.js";
import {
  appendTransition,
  appointmentRequestsStorage,
  appointmentsStorage,
  findCoverage,
  findPackageByPaRequest,
  findPaRequestByAppointmentRequest,
  generateId,
  getNetworkStatus,
  getTransitions,
  paRequestsStorage,
  patientsStorage,
  payersStorage,
  providersStorage,
} from "../storage/index.js";
import {
  BusinessRuleError,
  InvalidTransitionError,
  MaxInfoRequestsExceededError,
  NotFoundError,
  PackageNotReadyError,
  SubmissionFailedError,
} from "./errors.js";
import { KeyedLock } from "./concurrency.js";
import { withRetry, withTimeout, sleep as defaultSleep } from "./retry.js";
import { renderPackagePdf, type PackagePdfInput, type RenderedPdf } from "./package-pdf.js";
import type { AuthRuleResolver } from "./auth-rule-resolver.js";
import type { DenialRiskPredictor } from "./denial-risk-predictor.js";
import type { DocumentationBuilder } from "./documentation-builder.js";
import type { ConnectorRegistry, PriorAuthSubmission } from "./payer-connector.js";
import type { FaxGateway } from "./fax-gateway.js";
import type { ReferralRegistry } from "./referral-registry.js";
import type { Publish } from "./event-bus.js";

export interface PaStateMachineDeps {
  config: Pick<EngineConfig, "maxInfoRequests" | "outboxDir" | "payer">;
  resolver: AuthRuleResolver;
  predictor: DenialRiskPredictor;
  builder: DocumentationBuilder;
  connectors: ConnectorRegistry;
  fax: FaxGateway;
  referrals: ReferralRegistry;
  publish: Publish;

  /** Moves the contingent appointment from tentative to confirmed */
  confirmAppointment?: (appointmentId: string) => Promise<unknown>;

  renderPdf?: (input: PackagePdfInput, outDir: string) => Promise<RenderedPdf>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface InitiateInput extends CreatePaRequestInput {
  /** Resolved requirement; looked up when omitted */
  requirement?: AuthRequirement;
  referralOnFile?: boolean;
  networkStatus?: NetworkStatus;
}

export function isTerminal(status: PaStatus): boolean {
  return TERMINAL_PA_STATUSES.includes(status);
}

export function canTransition(from: PaStatus, to: PaStatus): boolean {
  return PA_TRANSITIONS[from].includes(to);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PaStateMachine {
  private locks = new KeyedLock();
  private renderPdf: (input: PackagePdfInput, outDir: string) => Promise<RenderedPdf>;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(private deps: PaStateMachineDeps) {
    this.renderPdf = deps.renderPdf ?? renderPackagePdf;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  private today(): string {
    return this.now().toISOString().slice(0, 10);
  }

  async get(paRequestId: string): Promise<PaRequest> {
    const pa = await paRequestsStorage.get(paRequestId);
    if (!pa) throw new NotFoundError("PA request", paRequestId);
    return pa;
  }

  async transitions(paRequestId: string): Promise<PaTransition[]> {
    return getTransitions(paRequestId);
  }

  async findByAppointmentRequest(appointmentRequestId: string): Promise<PaRequest | null> {
    return findPaRequestByAppointmentRequest(appointmentRequestId);
  }

  /**
   * Apply one transition: validate, persist, audit, publish.
   */
  private async transition(
    pa: PaRequest,
    to: PaStatus,
    reason: string | undefined,
    changes: Partial<PaRequest> = {}
  ): Promise<PaRequest> {
    if (!canTransition(pa.status, to)) {
      throw new InvalidTransitionError(pa.id, pa.status, to);
    }

    const at = this.now();
    const updated: PaRequest = { ...pa, ...changes, status: to, lastUpdatedAt: at };
    await paRequestsStorage.save(updated);
    await appendTransition({
      paRequestId: pa.id,
      fromStatus: pa.status,
      toStatus: to,
      ...(reason && { reason }),
      occurredAt: at,
    });
    console.log(`[pa] ${pa.id}: ${pa.status} -> ${to}${reason ? ` (${reason})` : ""}`);

    await this.deps.publish({
      type: "pa.transitioned",
      patientId: updated.patientId,
      paRequestId: updated.id,
      ...(updated.appointmentId && { appointmentId: updated.appointmentId }),
      from: pa.status,
      to,
      ...(reason && { reason }),
      ...(updated.denialReasonCode && { denialReasonCode: updated.denialReasonCode }),
      ...(updated.lastAssessment && { lastAssessment: updated.lastAssessment }),
      at,
    });
    return updated;
  }

  /**
   * Withdraw the request if its appointment request was withdrawn
   * while we were suspended. Returns the withdrawn request, or null.
   */
  private async withdrawIfRequestWithdrawn(pa: PaRequest): Promise<PaRequest | null> {
    if (!pa.appointmentRequestId || isTerminal(pa.status)) return null;
    const request = await appointmentRequestsStorage.get(pa.appointmentRequestId);
    if (request?.status !== "withdrawn") return null;
    return this.transition(pa, "withdrawn", "Appointment request withdrawn");
  }

  /**
   * Open a PA request. The requirement must call for prior authorization.
   */
  async initiate(input: InitiateInput): Promise<PaRequest> {
    const requirement = input.requirement ?? this.deps.resolver.resolve(input.payerId, input.serviceCode);
    if (!requirement.paRequired) {
      throw new BusinessRuleError(
        `Prior authorization is not required for ${input.serviceCode} with payer ${input.payerId}`
      );
    }

    const patient = await patientsStorage.get(input.patientId);
    if (!patient) throw new NotFoundError("Patient", input.patientId);
    const provider = await providersStorage.get(input.providerId);
    if (!provider) throw new NotFoundError("Provider", input.providerId);
    const payer = await payersStorage.get(input.payerId);
    if (!payer) throw new NotFoundError("Payer", input.payerId);

    // Referral and network are judged on the visit day once one is booked
    const appointment = input.appointmentId ? await appointmentsStorage.get(input.appointmentId) : null;
    const serviceDate = appointment?.date ?? this.today();
    const referralOnFile =
      input.referralOnFile ??
      (await this.deps.referrals.hasReferralOnFile(patient.id, payer.id, provider.id, serviceDate));
    // No agreement on file counts as out of network
    const networkStatus =
      input.networkStatus ?? (await getNetworkStatus(provider.id, payer.id, serviceDate)) ?? "out_of_network";

    const assessment: RiskAssessment = this.deps.predictor.score({
      payerId: payer.id,
      payerName: payer.name,
      serviceCode: input.serviceCode,
      requirement,
      referralOnFile,
      networkStatus,
    });

    const now = this.now();
    const pa: PaRequest = {
      id: generateId(),
      patientId: patient.id,
      providerId: provider.id,
      serviceCode: input.serviceCode,
      payerId: payer.id,
      ...(input.appointmentId && { appointmentId: input.appointmentId }),
      ...(input.appointmentRequestId && { appointmentRequestId: input.appointmentRequestId }),
      status: "initiated",
      infoRequestCount: 0,
      lastAssessment: assessment,
      initiatedAt: now,
      lastUpdatedAt: now,
    };
    await paRequestsStorage.save(pa);
    console.log(`[pa] Initiated ${pa.id} for ${patient.id} ${input.serviceCode} (${assessment.level} risk)`);

    await this.deps.publish({
      type: "risk.assessed",
      patientId: pa.patientId,
      paRequestId: pa.id,
      ...(pa.appointmentId && { appointmentId: pa.appointmentId }),
      assessment,
      beforeSubmission: true,
      at: now,
    });
    return pa;
  }

  /**
   * Build (or refresh) the request's documentation package.
   */
  async preparePackage(paRequestId: string, options: { reviewRequired?: boolean } = {}): Promise<DocumentationPackage> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (pa.status !== "initiated") {
        throw new BusinessRuleError(`PA request ${paRequestId} is ${pa.status}; packages are built before submission`);
      }
      const pkg = await this.deps.builder.build(paRequestId, options);
      if (pa.documentationPackageId !== pkg.id) {
        await paRequestsStorage.save({ ...pa, documentationPackageId: pkg.id, lastUpdatedAt: this.now() });
      }
      return pkg;
    });
  }

  private async loadSubmission(pa: PaRequest, pkg: DocumentationPackage): Promise<PriorAuthSubmission> {
    const patient = await patientsStorage.get(pa.patientId);
    if (!patient) throw new NotFoundError("Patient", pa.patientId);
    const provider = await providersStorage.get(pa.providerId);
    if (!provider) throw new NotFoundError("Provider", pa.providerId);
    const payer = await payersStorage.get(pa.payerId);
    if (!payer) throw new NotFoundError("Payer", pa.payerId);

    return {
      paRequest: pa,
      documentationPackage: pkg,
      patient,
      provider,
      payer,
      memberId: findCoverage(patient, payer.id)?.memberId ?? "",
    };
  }

  private async sendByFax(submission: PriorAuthSubmission): Promise<AuthDecision> {
    const { payer, paRequest } = submission;
    if (!payer.access.faxNumber) {
      throw new Error(`No fax number on file for ${payer.name}`);
    }

    const documents: ClinicalDocument[] = await this.deps.builder.documentsFor(submission.documentationPackage);
    const pdf = await this.renderPdf(
      {
        documentationPackage: submission.documentationPackage,
        documents,
        patient: submission.patient,
        provider: submission.provider,
        payer,
        memberId: submission.memberId,
        generatedAt: this.now(),
      },
      this.deps.config.outboxDir
    );
    const receipt = await this.deps.fax.send({ to: payer.access.faxNumber, filePath: pdf.filePath, reference: paRequest.id });
    console.log(`[pa] ${paRequest.id}: faxed to ${payer.name} as ${receipt.faxId}`);
    return { outcome: "received" };
  }

  /**
   * Electronic first, then fax. When both fail, staff are told to phone
   * the payer and SubmissionFailedError is thrown.
   */
  private async send(pa: PaRequest, pkg: DocumentationPackage): Promise<{ method: SubmissionMethod; decision: AuthDecision }> {
    const submission = await this.loadSubmission(pa, pkg);
    const { payer } = submission;
    const { payer: payerConfig } = this.deps.config;
    const reasons: string[] = [];

    const electronic = await withRetry(
      async () => {
        const connector = this.deps.connectors.forPayer(payer);
        return withTimeout((signal) => connector.submitPriorAuth(submission, signal), payerConfig.timeoutMs);
      },
      { attempts: payerConfig.retryAttempts, baseDelayMs: payerConfig.retryBaseDelayMs, sleep: this.sleep }
    );
    if (electronic.ok) {
      return { method: "electronic", decision: electronic.value };
    }
    reasons.push(`Electronic submission failed: ${electronic.error.message}`);
    console.log(`[pa] ${pa.id}: electronic submission failed (${electronic.error.code}), falling back to fax`);

    try {
      return { method: "fax", decision: await this.sendByFax(submission) };
    } catch (err) {
      reasons.push(`Fax submission failed: ${errorMessage(err)}`);
    }

    const phone = payer.access.authPhone ?? this.deps.resolver.resolve(pa.payerId, pa.serviceCode).payerAuthPhone;
    const recommendedAction = phone
      ? `Submit by phone to the ${payer.name} authorization line at ${phone}`
      : `Submit by phone to ${payer.name}; no authorization line is on file`;
    console.error(`[pa] ${pa.id}: all submission channels failed`);

    await this.deps.publish({
      type: "pa.submission_blocked",
      patientId: pa.patientId,
      paRequestId: pa.id,
      ...(pa.appointmentId && { appointmentId: pa.appointmentId }),
      problems: reasons,
      recommendedAction,
      at: this.now(),
    });
    throw new SubmissionFailedError(pa.id, reasons);
  }

  /**
   * Apply a payer decision to a submitted or under-review request.
   */
  private async applyDecision(pa: PaRequest, decision: AuthDecision): Promise<PaRequest> {
    const { outcome } = decision;
    const tracking: Partial<PaRequest> = decision.trackingNumber ? { payerTrackingNumber: decision.trackingNumber } : {};
    if (outcome === "received") {
      if (!decision.trackingNumber) return pa;
      const updated: PaRequest = { ...pa, ...tracking, lastUpdatedAt: this.now() };
      await paRequestsStorage.save(updated);
      return updated;
    }

    let current = pa;
    if (current.status === "submitted") {
      current = await this.transition(current, "pending_review", "Payer review started", tracking);
    }

    switch (outcome) {
      case "pending_review":
        return current;

      case "approved": {
        const approved = await this.transition(current, "approved", decision.message ?? "Approved by payer", {
          ...(decision.authorizationNumber && { authorizationNumber: decision.authorizationNumber }),
        });
        if (approved.appointmentId && this.deps.confirmAppointment) {
          await this.deps.confirmAppointment(approved.appointmentId);
        }
        return approved;
      }

      case "denied":
        return this.transition(current, "denied", decision.message ?? "Denied by payer", {
          ...(decision.denialReasonCode && { denialReasonCode: decision.denialReasonCode }),
        });

      case "requires_more_info": {
        const max = this.deps.config.maxInfoRequests;
        if (current.infoRequestCount >= max) {
          return this.transition(current, "denied", new MaxInfoRequestsExceededError(current.id, max).message, {
            denialReasonCode: MAX_INFO_REQUESTS_EXCEEDED,
          });
        }
        return this.transition(current, "requires_more_info", decision.message ?? "Payer requested more information", {
          infoRequestCount: current.infoRequestCount + 1,
        });
      }
    }
  }

  /**
   * Submit the request with its documentation package.
   */
  async submit(paRequestId: string): Promise<PaRequest> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (pa.status !== "initiated") {
        throw new InvalidTransitionError(pa.id, pa.status, "submitted");
      }
      const withdrawn = await this.withdrawIfRequestWithdrawn(pa);
      if (withdrawn) return withdrawn;

      const pkg = await findPackageByPaRequest(pa.id);
      const problems = pkg ? this.deps.builder.checkReadiness(pkg) : ["No documentation package has been built"];
      if (!pkg || problems.length > 0) {
        await this.deps.publish({
          type: "pa.submission_blocked",
          patientId: pa.patientId,
          paRequestId: pa.id,
          ...(pa.appointmentId && { appointmentId: pa.appointmentId }),
          problems,
          recommendedAction: "Complete the documentation package and record a reviewer sign-off",
          at: this.now(),
        });
        throw new PackageNotReadyError(pkg?.id ?? "(none)", problems);
      }

      const { method, decision } = await this.send(pa, pkg);

      // The appointment request may have been withdrawn while we waited on the payer
      const latest = await this.get(pa.id);
      const withdrawnMeanwhile = await this.withdrawIfRequestWithdrawn(latest);
      if (withdrawnMeanwhile) return withdrawnMeanwhile;

      await this.deps.builder.submit(pkg.id);
      const submitted = await this.transition(latest, "submitted", `Submitted by ${method}`, {
        submissionMethod: method,
        documentationPackageId: pkg.id,
        ...(decision.trackingNumber && { payerTrackingNumber: decision.trackingNumber }),
      });
      return this.applyDecision(submitted, decision);
    });
  }

  /**
   * Record a decision the payer reported after submission.
   */
  async recordDecision(paRequestId: string, decision: AuthDecision): Promise<PaRequest> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (isTerminal(pa.status)) {
        throw new InvalidTransitionError(pa.id, pa.status, decision.outcome);
      }
      const withdrawn = await this.withdrawIfRequestWithdrawn(pa);
      if (withdrawn) return withdrawn;

      if (pa.status !== "submitted" && pa.status !== "pending_review") {
        throw new InvalidTransitionError(pa.id, pa.status, decision.outcome);
      }
      return this.applyDecision(pa, decision);
    });
  }

  /**
   * Answer a request for more information, optionally with new documents.
   */
  async resubmit(paRequestId: string, documents: ClinicalDocument[] = []): Promise<PaRequest> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (pa.status !== "requires_more_info") {
        throw new InvalidTransitionError(pa.id, pa.status, "submitted");
      }
      const withdrawn = await this.withdrawIfRequestWithdrawn(pa);
      if (withdrawn) return withdrawn;

      const existing = await findPackageByPaRequest(pa.id);
      if (!existing) throw new NotFoundError("Documentation package for PA request", pa.id);
      const pkg = documents.length > 0 ? await this.deps.builder.supplement(existing.id, documents) : existing;

      const { method, decision } = await this.send(pa, pkg);

      const latest = await this.get(pa.id);
      const withdrawnMeanwhile = await this.withdrawIfRequestWithdrawn(latest);
      if (withdrawnMeanwhile) return withdrawnMeanwhile;

      const submitted = await this.transition(latest, "submitted", `Resubmitted by ${method}`, {
        submissionMethod: method,
        ...(decision.trackingNumber && { payerTrackingNumber: decision.trackingNumber }),
      });
      return this.applyDecision(submitted, decision);
    });
  }

  async withdraw(paRequestId: string, reason: string): Promise<PaRequest> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (pa.status === "withdrawn") return pa;
      return this.transition(pa, "withdrawn", reason);
    });
  }

  /**
   * Link the appointment that waits on this authorization.
   * An already approved request confirms it straight away.
   */
  async attachAppointment(paRequestId: string, appointmentId: string): Promise<PaRequest> {
    return this.locks.run(paRequestId, async () => {
      const pa = await this.get(paRequestId);
      if (pa.appointmentId && pa.appointmentId !== appointmentId) {
        throw new BusinessRuleError(`PA request ${paRequestId} already covers appointment ${pa.appointmentId}`);
      }

      const updated: PaRequest = { ...pa, appointmentId, lastUpdatedAt: this.now() };
      await paRequestsStorage.save(updated);
      if (updated.status === "approved" && this.deps.confirmAppointment) {
        await this.deps.confirmAppointment(appointmentId);
      }
      return updated;
    });
  }
}
