/**
 * EDI Payer Connector
 *
 * X12 270/271 eligibility exchange over HTTPS. Where each coverage field
 * sits in the 271 is driven by the payer's EDI mapping rules.
 * Electronic prior authorization goes to the payer's prior-auth endpoint
 * as JSON.
 */

import type { CoverageData } from "../types/eligibility.js";
import type { CoverageField, EdiMappingRules, EdiSegmentRule, Payer } from "../types/payer.js";
import type { AuthDecision, DecisionOutcome } from "../types/pa-request.js";
import { DECISION_OUTCOMES } from "../types/pa-request.js";
import { COVERAGE_FIELDS } from "../types/payer.js";
import { DOCUMENT_KIND_LABELS } from "../types/authorization.js";
import { loadPayerCredentials } from "../config.js";
import { PayerConnectorError } from "./errors.js";
import {
  coerceCoverageField,
  requireMemberId,
  type CoverageResponse,
  type EligibilityQuery,
  type PayerConnector,
  type PriorAuthSubmission,
} from "./payer-connector.js";

const SEGMENT_TERMINATOR = "~";
const ELEMENT_SEPARATOR = "*";

/** AAA03 reject reasons that will not change on retry */
const PERMANENT_REJECT_CODES: Record<string, string> = {
  "15": "REQUIRED_APPLICATION_DATA_MISSING",
  "72": "INVALID_MEMBER_ID",
  "73": "INVALID_NAME",
  "75": "SUBSCRIBER_NOT_FOUND",
};

export interface EdiConnectorOptions {
  /** Environment to read `<PREFIX>_EDI_API_KEY` from */
  env?: Record<string, string | undefined>;

  /** Clock for envelope timestamps */
  now?: () => Date;
}

/** One parsed X12 segment: `elements[0]` is the segment id */
type Segment = string[];

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function x12Date(date: Date): { ccyymmdd: string; yymmdd: string; hhmm: string } {
  const ccyymmdd = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}`;
  return {
    ccyymmdd,
    yymmdd: ccyymmdd.slice(2),
    hhmm: `${pad(date.getUTCHours(), 2)}${pad(date.getUTCMinutes(), 2)}`,
  };
}

/**
 * Build an X12 270 eligibility inquiry for one subscriber.
 */
export function build270(
  query: EligibilityQuery,
  rules: Pick<EdiMappingRules, "senderId" | "receiverId">,
  payerName: string,
  controlNumber: number,
  now: Date
): string {
  const memberId = requireMemberId(query);
  const { ccyymmdd, yymmdd, hhmm } = x12Date(now);
  const control = pad(controlNumber, 9);
  const [firstName = "", ...rest] = (query.patientName ?? "").trim().split(/\s+/);
  const lastName = rest.join(" ");

  const body: string[] = [
    `ST*270*0001*005010X279A1`,
    `BHT*0022*13*${control}*${ccyymmdd}*${hhmm}`,
    `HL*1**20*1`,
    `NM1*PR*2*${payerName}*****PI*${rules.receiverId}`,
    `HL*2*1*21*1`,
    `NM1*1P*2*${rules.senderId}*****XX*${rules.senderId}`,
    `HL*3*2*22*0`,
    `NM1*IL*1*${lastName}*${firstName}****MI*${memberId}`,
    `REF*0F*${memberId}`,
    ...(query.dateOfBirth ? [`DMG*D8*${query.dateOfBirth.replace(/-/g, "")}`] : []),
    `EQ*30`,
  ];

  const segments = [
    `ISA*00*          *00*          *ZZ*${rules.senderId.padEnd(15)}*ZZ*${rules.receiverId.padEnd(15)}*${yymmdd}*${hhmm}*^*00501*${control}*0*P*:`,
    `GS*HS*${rules.senderId}*${rules.receiverId}*${ccyymmdd}*${hhmm}*${controlNumber}*X*005010X279A1`,
    ...body,
    `SE*${body.length + 1}*0001`,
    `GE*1*${controlNumber}`,
    `IEA*1*${control}`,
  ];

  return segments.map((s) => s + SEGMENT_TERMINATOR).join("\n");
}

/**
 * Split an X12 document into segments of elements.
 */
export function splitSegments(raw: string): Segment[] {
  return raw
    .split(SEGMENT_TERMINATOR)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => s.split(ELEMENT_SEPARATOR));
}

function findValue(segments: Segment[], rule: EdiSegmentRule): string | undefined {
  for (const segment of segments) {
    if (segment[0] !== rule.segment) continue;
    if (rule.qualifier !== undefined && segment[1] !== rule.qualifier) continue;
    const value = segment[rule.element];
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

/**
 * Extract coverage fields from a 271 response.
 * Throws PayerConnectorError when the payer rejected the inquiry (AAA).
 */
export function parse271(
  raw: string,
  rules: EdiMappingRules,
  memberId: string
): Partial<CoverageData> {
  const segments = splitSegments(raw);

  const reject = segments.find((s) => s[0] === "AAA" && s[1] === "N");
  if (reject) {
    const reason = reject[3] ?? "";
    const permanent = PERMANENT_REJECT_CODES[reason];
    throw new PayerConnectorError(
      `Payer rejected eligibility inquiry (AAA reason ${reason || "unspecified"})`,
      permanent ?? "PAYER_REJECTED",
      permanent === undefined,
      raw
    );
  }

  let fields: Partial<CoverageData> = { memberId, serviceLimitations: [] };
  for (const field of COVERAGE_FIELDS) {
    const rule = rules.response[field];
    if (!rule) continue;
    const value = findValue(segments, rule);
    if (value !== undefined) {
      fields = { ...fields, ...coerceCoverageField(field, value) };
    }
  }

  // MSG segments after an EB carry free-text limitations
  const limitations = segments
    .filter((s) => s[0] === "MSG" && s[1])
    .map((s) => {
      const [category = "", ...text] = (s[1] ?? "").split(":");
      return text.length > 0
        ? { category: category.trim(), limitation: text.join(":").trim() }
        : { category: "General", limitation: category.trim() };
    });

  return { ...fields, serviceLimitations: limitations };
}

function isDecisionOutcome(value: unknown): value is DecisionOutcome {
  return typeof value === "string" && DECISION_OUTCOMES.some((o) => o === value);
}

/**
 * Read an authorization decision from a prior-auth endpoint response body.
 */
export function parseAuthDecision(body: unknown): AuthDecision {
  if (typeof body !== "object" || body === null) {
    throw new PayerConnectorError("Malformed prior authorization response", "MALFORMED_RESPONSE", false);
  }

  const record: Record<string, unknown> = { ...body };
  const outcome = record.outcome ?? record.status;
  if (!isDecisionOutcome(outcome)) {
    throw new PayerConnectorError(
      `Unknown prior authorization outcome: ${String(outcome)}`,
      "MALFORMED_RESPONSE",
      false,
      JSON.stringify(body)
    );
  }

  const text = (key: string): string | undefined =>
    typeof record[key] === "string" ? String(record[key]) : undefined;
  const trackingNumber = text("trackingNumber");
  const authorizationNumber = text("authorizationNumber");
  const denialReasonCode = text("denialReasonCode");
  const message = text("message");

  return {
    outcome,
    ...(trackingNumber && { trackingNumber }),
    ...(authorizationNumber && { authorizationNumber }),
    ...(denialReasonCode && { denialReasonCode }),
    ...(message && { message }),
  };
}

function httpError(status: number, raw: string): PayerConnectorError {
  return new PayerConnectorError(
    `Payer responded with HTTP ${status}`,
    `HTTP_${status}`,
    status >= 500 || status === 429,
    raw
  );
}

/**
 * X12 over HTTPS connector.
 */
export class EdiConnector implements PayerConnector {
  readonly channel = "edi" as const;
  private controlNumber = 0;
  private env: Record<string, string | undefined>;
  private now: () => Date;

  constructor(options: EdiConnectorOptions = {}) {
    this.env = options.env ?? process.env;
    this.now = options.now ?? (() => new Date());
  }

  private headers(payer: Payer, contentType: string): Record<string, string> {
    const { ediApiKey } = loadPayerCredentials(payer.access.credentialsEnvPrefix, this.env);
    return {
      "Content-Type": contentType,
      ...(ediApiKey && { Authorization: `Bearer ${ediApiKey}` }),
    };
  }

  private async post(
    url: string,
    payer: Payer,
    contentType: string,
    body: string,
    signal?: AbortSignal
  ): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: this.headers(payer, contentType),
        body,
        ...(signal && { signal }),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PayerConnectorError(`EDI request failed: ${message}`, "NETWORK_ERROR", true);
    }

    const raw = await response.text();
    if (!response.ok) throw httpError(response.status, raw);
    return raw;
  }

  async checkEligibility(query: EligibilityQuery, payer: Payer, signal?: AbortSignal): Promise<CoverageResponse> {
    const memberId = requireMemberId(query);
    if (!payer.access.ediEndpoint || !payer.ediRules) {
      throw new PayerConnectorError(`Payer ${payer.name} has no EDI configuration`, "NO_CHANNEL", false);
    }

    const request = build270(query, payer.ediRules, payer.name, ++this.controlNumber, this.now());
    console.log(`[edi] 270 -> ${payer.name} (member ${memberId})`);

    const raw = await this.post(payer.access.ediEndpoint, payer, "application/edi-x12", request, signal);
    const fields = parse271(raw, payer.ediRules, memberId);

    const found = COVERAGE_FIELDS.filter((f: CoverageField) => fields[f] !== undefined).length;
    console.log(`[edi] 271 <- ${payer.name}: ${found} coverage fields`);
    return { fields, raw };
  }

  async submitPriorAuth(submission: PriorAuthSubmission, signal?: AbortSignal): Promise<AuthDecision> {
    const { payer, paRequest, documentationPackage: pkg } = submission;
    if (!payer.access.priorAuthEndpoint) {
      throw new PayerConnectorError(
        `Payer ${payer.name} does not accept electronic prior authorization`,
        "ELECTRONIC_PA_UNSUPPORTED",
        false
      );
    }

    const body = JSON.stringify({
      paRequestId: paRequest.id,
      memberId: submission.memberId,
      patient: { name: submission.patient.fullName, dateOfBirth: submission.patient.dateOfBirth },
      provider: { name: submission.provider.name, npi: submission.provider.npi },
      serviceCode: paRequest.serviceCode,
      rationale: pkg.rationale,
      keywords: pkg.flaggedKeywords,
      documents: pkg.attachedDocuments.map((d) => ({
        id: d.documentId,
        kind: DOCUMENT_KIND_LABELS[d.kind],
        title: d.title,
      })),
    });

    console.log(`[edi] prior auth ${paRequest.id} -> ${payer.name}`);
    const raw = await this.post(payer.access.priorAuthEndpoint, payer, "application/json", body, signal);

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new PayerConnectorError("Prior authorization response is not JSON", "MALFORMED_RESPONSE", false, raw);
    }
    return parseAuthDecision(parsed);
  }
}
