/**
 * Property-based tests for domain invariants.
 *
 * Risk levels only ever go up, cost shares stay inside the plan's
 * limits, and PA lifecycles never leave a terminal state.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  PA_TRANSITIONS,
  RISK_LEVELS,
  TERMINAL_PA_STATUSES,
} from "../../../src/types/index.js";
import type { CostCatalogEntry, Provider, RiskLevel } from "../../../src/types/index.js";
import {
  levelForFrequency,
  scoreDenialRisk,
  topPattern,
} from "../../../src/services/denial-risk-predictor.js";
import { estimateCost } from "../../../src/services/cost-estimator.js";
import { compareCandidates, type SlotCandidate } from "../../../src/services/scheduling-allocator.js";
import { parseClockTime } from "../../../src/services/schedule-parsing.js";
import {
  arbClockTime,
  arbCoverageTerms,
  arbFrequencyScore,
  arbJulyDate,
  arbPaWalk,
  arbRiskInput,
  arbRiskReference,
  arbValidTransition,
} from "./generators.js";

function rank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

// =============================================================================
// 1. DENIAL RISK
// =============================================================================

describe("Denial risk invariants", () => {
  it("levelForFrequency is monotonic", () => {
    fc.assert(
      fc.property(arbFrequencyScore, arbFrequencyScore, (a, b) => {
        const [lo, hi] = a <= b ? [a, b] : [b, a];
        expect(rank(levelForFrequency(lo))).toBeLessThanOrEqual(rank(levelForFrequency(hi)));
      })
    );
  });

  it("elevations never lower the historical level", () => {
    fc.assert(
      fc.property(arbRiskInput, arbRiskReference, (input, reference) => {
        const pattern = topPattern(reference.denialPatterns, input.payerId, input.serviceCode);
        const base = pattern ? levelForFrequency(pattern.frequencyScore) : "low";

        expect(rank(scoreDenialRisk(input, reference).level)).toBeGreaterThanOrEqual(rank(base));
      })
    );
  });

  it("an out-of-network provider is always high risk", () => {
    fc.assert(
      fc.property(arbRiskInput, arbRiskReference, (input, reference) => {
        const assessment = scoreDenialRisk({ ...input, networkStatus: "out_of_network" }, reference);
        expect(assessment.level).toBe("high");
        expect(assessment.predictedReason).toContain("Provider is out-of-network for Payer A");
      })
    );
  });

  it("a missing referral raises an in-network request by one level", () => {
    fc.assert(
      fc.property(arbRiskInput, arbRiskReference, (input, reference) => {
        const inNetwork = { ...input, networkStatus: "in_network" as const };
        const withReferral = scoreDenialRisk(
          { ...inNetwork, requirement: { referralRequired: true }, referralOnFile: true },
          reference
        );
        const without = scoreDenialRisk(
          { ...inNetwork, requirement: { referralRequired: true }, referralOnFile: false },
          reference
        );

        expect(rank(without.level)).toBe(Math.min(rank(withReferral.level) + 1, RISK_LEVELS.length - 1));
      })
    );
  });

  it("patterns for other services do not count", () => {
    fc.assert(
      fc.property(arbRiskInput, arbRiskReference, (input, reference) => {
        const assessment = scoreDenialRisk(input, reference);
        expect(assessment.matchedPatternId).not.toBe("DP-OTHER");
      })
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(arbRiskInput, arbRiskReference, (input, reference) => {
        expect(scoreDenialRisk(input, reference)).toEqual(scoreDenialRisk(input, reference));
      })
    );
  });
});

// =============================================================================
// 2. COST ESTIMATES
// =============================================================================

describe("Cost estimate invariants", () => {
  const catalogFor = (negotiatedRate: number): CostCatalogEntry[] => [
    { id: "RATE-1", serviceCode: "SVC-1", payerId: "payer-a", negotiatedRate },
  ];

  it("splits the allowed amount between patient and payer", () => {
    fc.assert(
      fc.property(arbCoverageTerms, fc.integer({ min: 1, max: 5000 }), (terms, rate) => {
        const estimate = estimateCost(catalogFor(rate), terms, "SVC-1");
        if (!estimate) throw new Error("expected an estimate");

        expect(estimate.allowedAmount).toBe(rate);
        expect(Math.abs(estimate.patientResponsibility + estimate.payerResponsibility - rate)).toBeLessThanOrEqual(0.011);
        expect(estimate.payerResponsibility).toBeGreaterThanOrEqual(0);
      })
    );
  });

  it("keeps the patient's share inside the deductible and out-of-pocket limits", () => {
    fc.assert(
      fc.property(arbCoverageTerms, fc.integer({ min: 1, max: 5000 }), (terms, rate) => {
        const estimate = estimateCost(catalogFor(rate), terms, "SVC-1");
        if (!estimate) throw new Error("expected an estimate");

        expect(estimate.deductibleApplied).toBeLessThanOrEqual(terms.deductibleAmount - terms.deductibleMetYtd);
        expect(estimate.patientResponsibility).toBeLessThanOrEqual(
          terms.outOfPocketMax - terms.outOfPocketMetYtd + 0.005
        );
        expect(estimate.patientResponsibility).toBeGreaterThanOrEqual(0);
      })
    );
  });
});

// =============================================================================
// 3. PA LIFECYCLE
// =============================================================================

describe("PA lifecycle invariants", () => {
  it("terminal states have no way out", () => {
    fc.assert(
      fc.property(arbValidTransition, ([from]) => {
        expect(TERMINAL_PA_STATUSES).not.toContain(from);
      })
    );
  });

  it("a walk ends at the first terminal state it reaches", () => {
    fc.assert(
      fc.property(arbPaWalk, (walk) => {
        const firstTerminal = walk.findIndex((s) => TERMINAL_PA_STATUSES.includes(s));
        if (firstTerminal !== -1) {
          expect(firstTerminal).toBe(walk.length - 1);
        }
        for (let i = 1; i < walk.length; i++) {
          const from = walk[i - 1] ?? "initiated";
          const to = walk[i] ?? "initiated";
          expect(PA_TRANSITIONS[from]).toContain(to);
        }
      })
    );
  });

  it("no transition returns to initiated", () => {
    fc.assert(
      fc.property(arbValidTransition, ([, to]) => {
        expect(to).not.toBe("initiated");
      })
    );
  });
});

// =============================================================================
// 4. SCHEDULING
// =============================================================================

describe("Scheduling invariants", () => {
  const arbCandidate: fc.Arbitrary<SlotCandidate> = fc
    .record({
      date: arbJulyDate,
      time: arbClockTime,
      preference: fc.constantFrom(-1, 0, 1),
      rating: fc.integer({ min: 0, max: 50 }).map((r) => r / 10),
      providerId: fc.constantFrom("201", "202", "203"),
    })
    .map(({ date, time, preference, rating, providerId }) => {
      const provider: Provider = { id: providerId, name: providerId, specialty: "Dermatology", rating, isPcp: false };
      return { slot: { providerId, date, time, status: "open" as const }, provider, preference };
    });

  it("candidate ordering is antisymmetric", () => {
    fc.assert(
      fc.property(arbCandidate, arbCandidate, (a, b) => {
        expect(Math.sign(compareCandidates(a, b)) + Math.sign(compareCandidates(b, a))).toBe(0);
      })
    );
  });

  it("an earlier slot always sorts first", () => {
    fc.assert(
      fc.property(arbCandidate, arbCandidate, (a, b) => {
        fc.pre(a.slot.date !== b.slot.date);
        const earlier = a.slot.date < b.slot.date ? a : b;
        const later = earlier === a ? b : a;
        expect(compareCandidates(earlier, later)).toBeLessThan(0);
      })
    );
  });

  it("reads a 12-hour clock time back to the same HH:MM", () => {
    fc.assert(
      fc.property(arbClockTime, (time) => {
        const [h = 0, m = 0] = time.split(":").map((p) => parseInt(p, 10));
        const twelve = `${h % 12 === 0 ? 12 : h % 12}:${String(m).padStart(2, "0")} ${h < 12 ? "AM" : "PM"}`;
        expect(parseClockTime(twelve)).toBe(time);
        expect(parseClockTime(time)).toBe(time);
      })
    );
  });
});
