/**
 * Shared fixtures for engine tests.
 *
 * Every test gets a fresh in-memory database: closing the connection
 * discards it and the next storage call opens an empty one.
 */

import { vi, type Mock } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadConfig, type EngineConfig } from "../../src/config.js";
import { closeDatabase, readSeedFile, seedDatabase } from "../../src/storage/index.js";
import type { CoverageData } from "../../src/types/eligibility.js";
import type { EngineEvent } from "../../src/types/events.js";
import type { AuthDecision } from "../../src/types/pa-request.js";
import type {
  ConnectorRegistry,
  CoverageResponse,
  EligibilityQuery,
  PayerConnector,
  PriorAuthSubmission,
} from "../../src/services/payer-connector.js";
import type { Payer } from "../../src/types/payer.js";
import type { FaxGateway, FaxRequest } from "../../src/services/fax-gateway.js";
import type { Publish } from "../../src/services/event-bus.js";

/** Day the sample clinic's snapshots were verified, plus three hours */
export const SAMPLE_NOW = new Date("2025-06-30T12:00:00.000Z");

export function resetDatabase(): void {
  closeDatabase();
}

export async function seedSampleClinic(options: { includeSnapshots?: boolean } = {}): Promise<void> {
  await seedDatabase(readSeedFile(), options);
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(overrides: Record<string, string> = {}): EngineConfig {
  return loadConfig({
    DATABASE_PATH: ":memory:",
    PAYER_RETRY_BASE_DELAY_MS: "0",
    PAYER_TIMEOUT_MS: "1000",
    OUTBOX_DIR: path.join(os.tmpdir(), "engine-test-outbox"),
    CLINIC_NAME: "Test Clinic",
    PATIENT_PORTAL_URL: "https://portal.test",
    ...overrides,
  });
}

/** Coverage a payer returns for a member with an active plan */
export function activeCoverage(memberId: string, overrides: Partial<CoverageData> = {}): Partial<CoverageData> {
  return {
    memberId,
    planName: "Test Gold",
    coverageStatus: "Active",
    deductibleAmount: 1000,
    deductibleMetYtd: 1000,
    coinsurancePercentage: 20,
    outOfPocketMax: 5000,
    outOfPocketMetYtd: 1200,
    referralRequired: false,
    ...overrides,
  };
}

export interface FakeConnector extends PayerConnector {
  checkEligibility: Mock<(query: EligibilityQuery, payer: Payer) => Promise<CoverageResponse>>;
  submitPriorAuth: Mock<(submission: PriorAuthSubmission) => Promise<AuthDecision>>;
}

/**
 * Connector whose calls are vi.fn fakes. Eligibility answers with an
 * active plan for the queried member; PA submissions are received.
 */
export function fakeConnector(): FakeConnector {
  return {
    channel: "edi",
    checkEligibility: vi.fn<(query: EligibilityQuery, payer: Payer) => Promise<CoverageResponse>>(async (query) => ({
      fields: activeCoverage(query.memberId),
      raw: `271 for ${query.memberId}`,
    })),
    submitPriorAuth: vi.fn<(submission: PriorAuthSubmission) => Promise<AuthDecision>>(async () => ({
      outcome: "received",
      trackingNumber: "TRK-1",
    })),
  };
}

export function registryOf(connector: PayerConnector): ConnectorRegistry {
  return { forPayer: () => connector };
}

export interface RecordingFax extends FaxGateway {
  sent: FaxRequest[];
}

export function recordingFax(): RecordingFax {
  const sent: FaxRequest[] = [];
  return {
    sent,
    send: async (request) => {
      sent.push(request);
      return { faxId: `FAX-${sent.length}` };
    },
  };
}

/** Publish function that keeps every event */
export function eventLog(): { events: EngineEvent[]; publish: Publish } {
  const events: EngineEvent[] = [];
  return {
    events,
    publish: async (event) => {
      events.push(event);
    },
  };
}

/** Clock that returns the same instant until moved */
export function fixedClock(start: Date = SAMPLE_NOW): { now: () => Date; set: (d: Date) => void } {
  let current = start;
  return {
    now: () => current,
    set: (d) => {
      current = d;
    },
  };
}

export const noSleep = async (): Promise<void> => {};
