/**
 * Cost Estimator
 *
 * Patient responsibility for a service, from the negotiated rate and the
 * deductible, coinsurance and out-of-pocket position on the current
 * eligibility snapshot.
 */

import type { CoverageData } from "../types/eligibility.js";
import type { CostCatalogEntry } from "../types/payer.js";

export interface CostEstimate {
  allowedAmount: number;
  deductibleApplied: number;
  coinsuranceApplied: number;
  patientResponsibility: number;
  payerResponsibility: number;
}

type CoverageTerms = Pick<
  CoverageData,
  "deductibleAmount" | "deductibleMetYtd" | "coinsurancePercentage" | "outOfPocketMax" | "outOfPocketMetYtd"
> & { payerId: string };

function cents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Provider-specific rate if there is one, else the payer-wide rate.
 */
export function findRate(
  catalog: CostCatalogEntry[],
  payerId: string,
  serviceCode: string,
  providerId?: string
): CostCatalogEntry | undefined {
  const forService = catalog.filter((e) => e.payerId === payerId && e.serviceCode === serviceCode);
  return (
    (providerId ? forService.find((e) => e.providerId === providerId) : undefined) ??
    forService.find((e) => e.providerId === undefined)
  );
}

export function estimateCost(
  catalog: CostCatalogEntry[],
  coverage: CoverageTerms,
  serviceCode: string,
  providerId?: string
): CostEstimate | null {
  const rate = findRate(catalog, coverage.payerId, serviceCode, providerId);
  if (!rate) return null;

  const allowedAmount = rate.negotiatedRate;
  const deductibleRemaining = Math.max(0, coverage.deductibleAmount - coverage.deductibleMetYtd);
  const deductibleApplied = Math.min(allowedAmount, deductibleRemaining);
  const coinsuranceApplied = ((allowedAmount - deductibleApplied) * coverage.coinsurancePercentage) / 100;

  const outOfPocketRemaining = Math.max(0, coverage.outOfPocketMax - coverage.outOfPocketMetYtd);
  const patientResponsibility = Math.min(deductibleApplied + coinsuranceApplied, outOfPocketRemaining);

  return {
    allowedAmount: cents(allowedAmount),
    deductibleApplied: cents(deductibleApplied),
    coinsuranceApplied: cents(coinsuranceApplied),
    patientResponsibility: cents(patientResponsibility),
    payerResponsibility: cents(allowedAmount - patientResponsibility),
  };
}

export class CostEstimator {
  constructor(private catalog: CostCatalogEntry[]) {}

  load(catalog: CostCatalogEntry[]): void {
    this.catalog = catalog;
  }

  estimate(snapshot: CoverageTerms, serviceCode: string, providerId?: string): CostEstimate | null {
    return estimateCost(this.catalog, snapshot, serviceCode, providerId);
  }
}
