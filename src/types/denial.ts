/**
 * Denial pattern and risk assessment types.
 */

/** Predicted denial risk */
export type RiskLevel = "low" | "medium" | "high";

/** All risk levels, lowest first; the index is the level's rank */
export const RISK_LEVELS: readonly RiskLevel[] = ["low", "medium", "high"] as const;

/** Frequency-score boundaries for risk levels */
export const RISK_THRESHOLDS = {
  /** Scores below this are low */
  medium: 0.3,
  /** Scores above this are high */
  high: 0.7,
} as const;

/**
 * Historical denial statistic for a (payer, service, reason) triple.
 */
export interface DenialPattern {
  id: string;
  payerId: string;
  serviceCode: string;

  /** Payer denial reason (e.g., "Missing Referral") */
  denialReasonCode: string;

  /** What typically caused it (e.g., "PCP Not On File") */
  contributingFactor?: string;

  /** Share of requests denied for this reason, 0..1 */
  frequencyScore: number;

  resolutionStrategyId?: string;
}

/**
 * How staff typically resolve a class of denials.
 */
export interface ResolutionStrategy {
  id: string;
  description: string;

  /** Role that owns the follow-up (e.g., "Auth Specialist") */
  responsibleRole: string;
}

/**
 * Output of the denial risk predictor.
 */
export interface RiskAssessment {
  level: RiskLevel;
  predictedReason: string;
  contributingFactors: string[];
  matchedPatternId?: string;
  recommendedAction?: string;
  responsibleRole?: string;
}
