/**
 * Payer Connector boundary.
 *
 * Every payer channel (EDI, portal) implements the same contract, so the
 * engine never branches on how a payer is reached. Channel selection
 * lives in the registry below.
 */

import type { CoverageData, CoverageStatus, VerificationMethod } from "../types/eligibility.js";
import type { CoverageField, Payer } from "../types/payer.js";
import type { AuthDecision, PaRequest } from "../types/pa-request.js";
import type { DocumentationPackage } from "../types/documentation.js";
import type { Patient } from "../types/patient.js";
import type { Provider } from "../types/provider.js";
import { PayerConnectorError } from "./errors.js";

/**
 * Who to look up.
 */
export interface EligibilityQuery {
  memberId: string;
  patientName?: string;
  dateOfBirth?: string;
}

/**
 * What a channel extracted. Completeness is checked by the verifier.
 */
export interface CoverageResponse {
  fields: Partial<CoverageData>;

  /** Raw payload (X12 text, page extract) kept for audit */
  raw: string;
}

/**
 * Everything a channel needs to submit a prior authorization.
 */
export interface PriorAuthSubmission {
  paRequest: PaRequest;
  documentationPackage: DocumentationPackage;
  patient: Patient;
  provider: Provider;
  payer: Payer;
  memberId: string;
}

/**
 * A channel to a payer. `signal` is aborted when the caller stops
 * waiting; the channel should release its session then.
 */
export interface PayerConnector {
  readonly channel: VerificationMethod;

  checkEligibility(query: EligibilityQuery, payer: Payer, signal?: AbortSignal): Promise<CoverageResponse>;

  submitPriorAuth(submission: PriorAuthSubmission, signal?: AbortSignal): Promise<AuthDecision>;
}

/**
 * Picks the connector for a payer.
 */
export interface ConnectorRegistry {
  forPayer(payer: Payer): PayerConnector;
}

/**
 * Registry that prefers EDI when the payer has an endpoint, and falls
 * back to the portal when it has a navigation map.
 */
export function createConnectorRegistry(connectors: {
  edi?: PayerConnector;
  portal?: PayerConnector;
}): ConnectorRegistry {
  return {
    forPayer(payer: Payer): PayerConnector {
      if (payer.access.ediEndpoint && connectors.edi) return connectors.edi;
      if (payer.portalMap && connectors.portal) return connectors.portal;
      throw new PayerConnectorError(
        `No connector channel configured for payer ${payer.name}`,
        "NO_CHANNEL",
        false
      );
    },
  };
}

/**
 * Reject queries without a member ID before touching the payer.
 */
export function requireMemberId(query: EligibilityQuery): string {
  const memberId = query.memberId.trim();
  if (!memberId) {
    throw new PayerConnectorError("Missing Member ID in query.", "MISSING_MEMBER_ID", false);
  }
  return memberId;
}

/**
 * Parse a money or percentage string ("$1,000.00", "20%", "1000").
 */
export function parseAmount(amountStr: string): number | undefined {
  const cleaned = amountStr.trim().replace(/^\$/, "").replace(/%$/, "").replace(/,/g, "");
  if (cleaned === "") return undefined;

  const value = parseFloat(cleaned);
  if (isNaN(value) || value < 0) return undefined;
  return value;
}

/**
 * Normalize a payer coverage status. Accepts X12 EB01 codes
 * ("1" active, "6" inactive) and portal text.
 */
export function parseCoverageStatus(text: string): CoverageStatus {
  const normalized = text.trim().toLowerCase();
  if (normalized === "1" || normalized.startsWith("active")) return "Active";
  if (normalized === "6" || normalized.startsWith("inactive") || normalized.includes("terminated")) {
    return "Inactive";
  }
  return "Pending";
}

/**
 * Normalize a date to "YYYY-MM-DD". Accepts X12 D8 ("20240101"),
 * ISO dates and US dates ("01/31/2024").
 */
export function parseCoverageDate(text: string): string | undefined {
  const trimmed = text.trim();
  const d8 = trimmed.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (d8) return `${d8[1]}-${d8[2]}-${d8[3]}`;

  const iso = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;

  const us = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) {
    const [, month = "", day = "", year = ""] = us;
    return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
  }

  return undefined;
}

function parseFlag(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  return normalized === "y" || normalized === "yes" || normalized === "true" || normalized === "required";
}

/**
 * Convert one extracted value into its coverage field.
 * Unparseable values yield an empty object so the field counts as missing.
 */
export function coerceCoverageField(field: CoverageField, value: string): Partial<CoverageData> {
  const text = value.trim();
  const amount = parseAmount(value);
  const date = parseCoverageDate(value);

  switch (field) {
    case "coverageStatus":
      return { coverageStatus: parseCoverageStatus(value) };
    case "referralRequired":
      return { referralRequired: parseFlag(value) };
    case "planName":
      return text ? { planName: text } : {};
    case "groupNumber":
      return text ? { groupNumber: text } : {};
    case "pcpDesignation":
      return text ? { pcpDesignation: text } : {};
    case "effectiveDate":
      return date ? { effectiveDate: date } : {};
    case "terminationDate":
      return date ? { terminationDate: date } : {};
    case "deductibleAmount":
      return amount === undefined ? {} : { deductibleAmount: amount };
    case "deductibleMetYtd":
      return amount === undefined ? {} : { deductibleMetYtd: amount };
    case "coinsurancePercentage":
      return amount === undefined ? {} : { coinsurancePercentage: amount };
    case "copaySpecialist":
      return amount === undefined ? {} : { copaySpecialist: amount };
    case "copayPcp":
      return amount === undefined ? {} : { copayPcp: amount };
    case "outOfPocketMax":
      return amount === undefined ? {} : { outOfPocketMax: amount };
    case "outOfPocketMetYtd":
      return amount === undefined ? {} : { outOfPocketMetYtd: amount };
  }
}
