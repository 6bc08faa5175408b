/**
 * fast-check Arbitraries for domain types.
 *
 * Values respect the domain's own constraints: amounts met never exceed
 * their limits, and PA walks follow permitted transitions.
 */

import fc from "fast-check";
import type {
  AuthRequirement,
  CoverageData,
  DenialPattern,
  NetworkStatus,
  PaStatus,
  ResolutionStrategy,
} from "../../../src/types/index.js";
import {
  NETWORK_STATUSES,
  PA_STATUSES,
  PA_TRANSITIONS,
} from "../../../src/types/index.js";
import type { RiskInput, RiskReferenceData } from "../../../src/services/denial-risk-predictor.js";

// =============================================================================
// Primitive Generators
// =============================================================================

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "HH:MM" on the quarter hour */
export const arbClockTime = fc
  .tuple(fc.integer({ min: 0, max: 23 }), fc.constantFrom(0, 15, 30, 45))
  .map(([h, m]) => `${pad(h)}:${pad(m)}`);

/** "YYYY-MM-DD" in July 2025 */
export const arbJulyDate = fc.integer({ min: 1, max: 31 }).map((d) => `2025-07-${pad(d)}`);

/** Whole-dollar amounts */
export const arbAmount = fc.integer({ min: 0, max: 20000 });

export const arbFrequencyScore = fc.double({ min: 0, max: 1, noNaN: true });

// =============================================================================
// Domain Enum Generators
// =============================================================================

export const arbNetworkStatus: fc.Arbitrary<NetworkStatus> = fc.constantFrom(...NETWORK_STATUSES);

// =============================================================================
// Entity Generators
// =============================================================================

type CoverageTerms = Pick<
  CoverageData,
  "deductibleAmount" | "deductibleMetYtd" | "coinsurancePercentage" | "outOfPocketMax" | "outOfPocketMetYtd"
> & { payerId: string };

/** Coverage position; amounts met never exceed their limits */
export const arbCoverageTerms: fc.Arbitrary<CoverageTerms> = fc
  .record({
    deductibleAmount: arbAmount,
    deductibleShare: fc.double({ min: 0, max: 1, noNaN: true }),
    coinsurancePercentage: fc.integer({ min: 0, max: 100 }),
    outOfPocketMax: arbAmount,
    outOfPocketShare: fc.double({ min: 0, max: 1, noNaN: true }),
  })
  .map(({ deductibleShare, outOfPocketShare, ...terms }) => ({
    payerId: "payer-a",
    deductibleAmount: terms.deductibleAmount,
    deductibleMetYtd: Math.floor(terms.deductibleAmount * deductibleShare),
    coinsurancePercentage: terms.coinsurancePercentage,
    outOfPocketMax: terms.outOfPocketMax,
    outOfPocketMetYtd: Math.floor(terms.outOfPocketMax * outOfPocketShare),
  }));

const STRATEGY: ResolutionStrategy = {
  id: "STRAT-1",
  description: "Follow up with the payer",
  responsibleRole: "Auth Specialist",
};

/** Zero to three patterns for payer-a / SVC-1 plus one for another service */
export const arbRiskReference: fc.Arbitrary<RiskReferenceData> = fc
  .array(fc.tuple(arbFrequencyScore, fc.boolean()), { maxLength: 3 })
  .map((scores) => {
    const patterns: DenialPattern[] = scores.map(([frequencyScore, withStrategy], i) => ({
      id: `DP-${i}`,
      payerId: "payer-a",
      serviceCode: "SVC-1",
      denialReasonCode: `Reason ${i}`,
      frequencyScore,
      ...(withStrategy && { resolutionStrategyId: STRATEGY.id }),
    }));
    patterns.push({
      id: "DP-OTHER",
      payerId: "payer-a",
      serviceCode: "SVC-2",
      denialReasonCode: "Other service",
      frequencyScore: 1,
    });
    return { denialPatterns: patterns, resolutionStrategies: [STRATEGY] };
  });

export const arbRiskInput: fc.Arbitrary<RiskInput> = fc
  .record({
    referralRequired: fc.boolean(),
    referralOnFile: fc.boolean(),
    networkStatus: arbNetworkStatus,
  })
  .map(({ referralRequired, referralOnFile, networkStatus }) => {
    const requirement: Pick<AuthRequirement, "referralRequired"> = { referralRequired };
    return {
      payerId: "payer-a",
      payerName: "Payer A",
      serviceCode: "SVC-1",
      requirement,
      referralOnFile,
      networkStatus,
    };
  });

// =============================================================================
// PA Lifecycle Generators
// =============================================================================

/** A permitted (from, to) pair */
export const arbValidTransition: fc.Arbitrary<[PaStatus, PaStatus]> = fc.constantFrom(
  ...PA_STATUSES.flatMap((from) => PA_TRANSITIONS[from].map((to): [PaStatus, PaStatus] => [from, to]))
);

/**
 * A walk from "initiated" along permitted transitions.
 * Each step picks by index among the current state's successors.
 */
export const arbPaWalk: fc.Arbitrary<PaStatus[]> = fc
  .array(fc.nat(), { maxLength: 12 })
  .map((choices) => {
    const walk: PaStatus[] = ["initiated"];
    for (const choice of choices) {
      const current = walk[walk.length - 1] ?? "initiated";
      const next = PA_TRANSITIONS[current];
      if (next.length === 0) break;
      const picked = next[choice % next.length];
      if (picked) walk.push(picked);
    }
    return walk;
  });
