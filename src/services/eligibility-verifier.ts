/**
 * Eligibility Verifier
 *
 * Resolves a (patient, payer) pair to current coverage terms. Fresh
 * snapshots are served from the store; otherwise the payer is queried
 * through its connector with timeout and retry, and the outcome of every
 * verification is written to the verification log.
 */

import type {
  CoverageData,
  EligibilitySnapshot,
  VerificationLogEntry,
  VerificationMethod,
} from "../types/eligibility.js";
import type { Payer } from "../types/payer.js";
import type { EngineConfig } from "../config.js";
import {
  appendSnapshot,
  appendVerificationLog,
  countConsecutiveFailures,
  findCoverage,
  getCurrentSnapshot,
  getSnapshotHistory,
  getVerificationLog,
  patientsStorage,
  payersStorage,
} from "../storage/index.js";
import { EligibilityUnavailableError, NotFoundError, PayerConnectorError } from "./errors.js";
import { withRetry, withTimeout, sleep as defaultSleep } from "./retry.js";
import { mapWithConcurrency } from "./concurrency.js";
import { requireMemberId, type ConnectorRegistry, type EligibilityQuery } from "./payer-connector.js";
import type { Publish } from "./event-bus.js";

/** Coverage fields a payer response must carry to count as complete */
export const REQUIRED_COVERAGE_FIELDS = [
  "coverageStatus",
  "deductibleAmount",
  "deductibleMetYtd",
  "coinsurancePercentage",
  "outOfPocketMax",
  "outOfPocketMetYtd",
] as const satisfies readonly (keyof CoverageData)[];

export type EligibilitySource = "cache" | "payer" | "stale";

export interface EligibilityResult {
  snapshot: EligibilitySnapshot;
  source: EligibilitySource;

  /** Set when a stale snapshot is presented because the payer failed */
  warning?: string;
}

export interface VerifyOptions {
  /** Query the payer even when a fresh snapshot exists */
  forceRefresh?: boolean;
}

export interface EligibilityVerifierDeps {
  config: Pick<EngineConfig, "eligibilityFreshnessHours" | "payer">;
  connectors: ConnectorRegistry;
  publish: Publish;

  /** Backoff sleep, injectable for tests */
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface BatchVerification {
  patientId: string;
  payerId: string;
  result?: EligibilityResult;
  error?: string;
}

/**
 * Missing required fields of a connector response, in declaration order.
 */
export function missingCoverageFields(fields: Partial<CoverageData>): string[] {
  return REQUIRED_COVERAGE_FIELDS.filter((field) => fields[field] === undefined);
}

/**
 * Complete a connector response into coverage data, or null when a
 * required field is missing.
 */
function toCoverage(fields: Partial<CoverageData>, memberId: string): CoverageData | null {
  const {
    coverageStatus,
    deductibleAmount,
    deductibleMetYtd,
    coinsurancePercentage,
    outOfPocketMax,
    outOfPocketMetYtd,
  } = fields;
  if (
    coverageStatus === undefined ||
    deductibleAmount === undefined ||
    deductibleMetYtd === undefined ||
    coinsurancePercentage === undefined ||
    outOfPocketMax === undefined ||
    outOfPocketMetYtd === undefined
  ) {
    return null;
  }

  return {
    ...fields,
    memberId: fields.memberId ?? memberId,
    coverageStatus,
    deductibleAmount,
    deductibleMetYtd,
    coinsurancePercentage,
    outOfPocketMax,
    outOfPocketMetYtd,
    referralRequired: fields.referralRequired ?? false,
    serviceLimitations: fields.serviceLimitations ?? [],
  };
}

function channelFor(payer: Payer): VerificationMethod {
  return payer.access.ediEndpoint ? "edi" : "portal";
}

export class EligibilityVerifier {
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;

  constructor(private deps: EligibilityVerifierDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  private isFresh(snapshot: EligibilitySnapshot): boolean {
    const ageMs = this.now().getTime() - snapshot.verifiedAt.getTime();
    return ageMs < this.deps.config.eligibilityFreshnessHours * 60 * 60 * 1000;
  }

  /**
   * Current coverage for a pair.
   * Throws EligibilityUnavailableError when the payer fails and there is
   * no earlier snapshot to present.
   */
  async verify(patientId: string, payerId: string, options: VerifyOptions = {}): Promise<EligibilityResult> {
    const patient = await patientsStorage.get(patientId);
    if (!patient) throw new NotFoundError("Patient", patientId);
    const payer = await payersStorage.get(payerId);
    if (!payer) throw new NotFoundError("Payer", payerId);

    const current = await getCurrentSnapshot(patientId, payerId);
    if (current && !options.forceRefresh && this.isFresh(current)) {
      return { snapshot: current, source: "cache" };
    }

    const coverage = findCoverage(patient, payerId);
    const query: EligibilityQuery = {
      memberId: coverage?.memberId ?? "",
      patientName: patient.fullName,
      dateOfBirth: patient.dateOfBirth,
    };

    // Written by the attempt closure, read when logging
    const seen: { method: VerificationMethod; raw?: string } = { method: channelFor(payer) };
    const { payer: payerConfig } = this.deps.config;

    const outcome = await withRetry(
      async () => {
        const memberId = requireMemberId(query);
        const connector = this.deps.connectors.forPayer(payer);
        seen.method = connector.channel;
        const response = await withTimeout(
          (signal) => connector.checkEligibility(query, payer, signal),
          payerConfig.timeoutMs
        );
        seen.raw = response.raw;

        const data = toCoverage(response.fields, memberId);
        if (!data) {
          throw new PayerConnectorError(
            `Incomplete coverage data: missing ${missingCoverageFields(response.fields).join(", ")}`,
            "INCOMPLETE_COVERAGE",
            false,
            response.raw
          );
        }
        return data;
      },
      {
        attempts: payerConfig.retryAttempts,
        baseDelayMs: payerConfig.retryBaseDelayMs,
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          console.log(`[eligibility] ${payer.name} attempt ${attempt} failed (${error.code}), retrying in ${delayMs}ms`);
        },
      }
    );

    const verifiedAt = this.now();
    const { method, raw: rawResponse } = seen;

    if (outcome.ok) {
      const snapshot = await appendSnapshot({
        ...outcome.value,
        patientId,
        payerId,
        verifiedAt,
        method,
      });
      await appendVerificationLog({
        patientId,
        payerId,
        status: "success",
        method,
        attempts: outcome.attempts,
        ...(rawResponse !== undefined && { rawResponse }),
        snapshotId: snapshot.id,
        verifiedAt,
      });
      console.log(`[eligibility] Verified ${patientId} with ${payer.name} via ${method}`);
      await this.deps.publish({
        type: "eligibility.verified",
        patientId,
        payerId,
        snapshotId: snapshot.id,
        at: verifiedAt,
      });
      return { snapshot, source: "payer" };
    }

    const { error } = outcome;
    const status = error.code === "INCOMPLETE_COVERAGE" ? "partial" : "failed";
    const failureRaw = error.rawResponse ?? rawResponse;
    await appendVerificationLog({
      patientId,
      payerId,
      status,
      method,
      attempts: outcome.attempts,
      errorCode: error.code,
      errorMessage: error.message,
      ...(failureRaw !== undefined && { rawResponse: failureRaw }),
      verifiedAt,
    });
    console.error(`[eligibility] ${status} for ${patientId} with ${payer.name}: ${error.message}`);

    await this.deps.publish({
      type: "eligibility.failed",
      patientId,
      payerId,
      status,
      errorCode: error.code,
      errorMessage: error.message,
      consecutiveFailures: await countConsecutiveFailures(patientId, payerId),
      at: verifiedAt,
    });

    if (current) {
      const warning = `Payer unavailable (${error.message}); showing coverage verified ${current.verifiedAt.toISOString()}`;
      console.warn(`[eligibility] ${warning}`);
      return { snapshot: current, source: "stale", warning };
    }

    throw new EligibilityUnavailableError(patientId, payerId, error.message);
  }

  /**
   * Verify many pairs with bounded concurrency. Failures are reported per pair.
   */
  async verifyBatch(
    pairs: Array<{ patientId: string; payerId: string }>,
    concurrency = 4,
    options: VerifyOptions = {}
  ): Promise<BatchVerification[]> {
    return mapWithConcurrency(pairs, concurrency, async ({ patientId, payerId }) => {
      try {
        return { patientId, payerId, result: await this.verify(patientId, payerId, options) };
      } catch (err) {
        return { patientId, payerId, error: err instanceof Error ? err.message : String(err) };
      }
    });
  }

  async current(patientId: string, payerId: string): Promise<EligibilitySnapshot | null> {
    return getCurrentSnapshot(patientId, payerId);
  }

  async history(patientId: string, payerId: string): Promise<EligibilitySnapshot[]> {
    return getSnapshotHistory(patientId, payerId);
  }

  async log(patientId: string, payerId: string): Promise<VerificationLogEntry[]> {
    return getVerificationLog(patientId, payerId);
  }
}
