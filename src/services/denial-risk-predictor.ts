/**
 * Denial Risk Predictor
 *
 * Scores a pending request against historical denial patterns, then
 * raises the level for a missing referral or an out-of-network provider.
 * Elevations only raise the level. Pure: same inputs, same assessment.
 */

import type { AuthRequirement } from "../types/authorization.js";
import type {
  DenialPattern,
  ResolutionStrategy,
  RiskAssessment,
  RiskLevel,
} from "../types/denial.js";
import type { NetworkStatus } from "../types/provider.js";
import { RISK_LEVELS, RISK_THRESHOLDS } from "../types/denial.js";

export interface RiskInput {
  payerId: string;
  payerName?: string;
  serviceCode: string;
  requirement: Pick<AuthRequirement, "referralRequired">;
  referralOnFile: boolean;
  networkStatus: NetworkStatus;
}

export interface RiskReferenceData {
  denialPatterns: DenialPattern[];
  resolutionStrategies: ResolutionStrategy[];
}

/** Follow-ups for elevations that have no historical pattern behind them */
export const BUILT_IN_STRATEGIES = {
  missingReferral: {
    id: "BUILTIN_OBTAIN_REFERRAL",
    description: "Obtain the PCP referral before the visit or reschedule.",
    responsibleRole: "Scheduling Staff",
  },
  outOfNetwork: {
    id: "BUILTIN_NETWORK_REVIEW",
    description: "Confirm out-of-network benefits with the patient or rebook with an in-network provider.",
    responsibleRole: "Front Desk",
  },
} as const satisfies Record<string, ResolutionStrategy>;

export const MISSING_REFERRAL_REASON = "Referral required but not on file";

export function outOfNetworkReason(payer: string): string {
  return `Provider is out-of-network for ${payer}`;
}

/**
 * Risk level for a historical frequency score.
 * The medium band includes both of its bounds.
 */
export function levelForFrequency(score: number): RiskLevel {
  if (score > RISK_THRESHOLDS.high) return "high";
  if (score >= RISK_THRESHOLDS.medium) return "medium";
  return "low";
}

function rank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

function raiseOne(level: RiskLevel): RiskLevel {
  return RISK_LEVELS[Math.min(rank(level) + 1, RISK_LEVELS.length - 1)] ?? "high";
}

function maxLevel(a: RiskLevel, b: RiskLevel): RiskLevel {
  return rank(a) >= rank(b) ? a : b;
}

/**
 * Highest-frequency pattern for the pair; ties go to the lowest id.
 */
export function topPattern(patterns: DenialPattern[], payerId: string, serviceCode: string): DenialPattern | undefined {
  return patterns
    .filter((p) => p.payerId === payerId && p.serviceCode === serviceCode)
    .sort((a, b) => b.frequencyScore - a.frequencyScore || a.id.localeCompare(b.id))[0];
}

export function scoreDenialRisk(input: RiskInput, reference: RiskReferenceData): RiskAssessment {
  const pattern = topPattern(reference.denialPatterns, input.payerId, input.serviceCode);
  const base: RiskLevel = pattern ? levelForFrequency(pattern.frequencyScore) : "low";

  let level = base;
  const reasons: string[] = pattern ? [pattern.denialReasonCode] : [];
  const factors: string[] = pattern?.contributingFactor ? [pattern.contributingFactor] : [];

  const missingReferral = input.requirement.referralRequired && !input.referralOnFile;
  if (missingReferral) {
    level = maxLevel(level, raiseOne(base));
    reasons.push(MISSING_REFERRAL_REASON);
    factors.push(MISSING_REFERRAL_REASON);
  }

  const outOfNetwork = input.networkStatus === "out_of_network";
  if (outOfNetwork) {
    level = "high";
    const reason = outOfNetworkReason(input.payerName ?? input.payerId);
    reasons.push(reason);
    factors.push(reason);
  }

  const strategy =
    (pattern?.resolutionStrategyId
      ? reference.resolutionStrategies.find((s) => s.id === pattern.resolutionStrategyId)
      : undefined) ??
    (outOfNetwork
      ? BUILT_IN_STRATEGIES.outOfNetwork
      : missingReferral
        ? BUILT_IN_STRATEGIES.missingReferral
        : undefined);

  return {
    level,
    predictedReason: reasons.length > 0 ? reasons.join("; ") : "No known denial pattern",
    contributingFactors: factors,
    ...(pattern && { matchedPatternId: pattern.id }),
    ...(strategy && {
      recommendedAction: strategy.description,
      responsibleRole: strategy.responsibleRole,
    }),
  };
}

/**
 * Predictor bound to a reference-data table.
 */
export class DenialRiskPredictor {
  constructor(private reference: RiskReferenceData) {}

  load(reference: RiskReferenceData): void {
    this.reference = reference;
  }

  score(input: RiskInput): RiskAssessment {
    return scoreDenialRisk(input, this.reference);
  }
}
