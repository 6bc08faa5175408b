import { beforeEach, describe, expect, it } from "vitest";
import {
  EligibilityVerifier,
  missingCoverageFields,
} from "../../../src/services/eligibility-verifier.js";
import { EligibilityUnavailableError, PayerConnectorError } from "../../../src/services/errors.js";
import { updatePatient } from "../../../src/storage/index.js";
import type { CoverageResponse } from "../../../src/services/payer-connector.js";
import {
  SAMPLE_NOW,
  activeCoverage,
  eventLog,
  fakeConnector,
  fixedClock,
  noSleep,
  registryOf,
  resetDatabase,
  seedSampleClinic,
  testConfig,
  type FakeConnector,
} from "../helpers.js";

describe("EligibilityVerifier", () => {
  let connector: FakeConnector;
  let log: ReturnType<typeof eventLog>;
  let clock: ReturnType<typeof fixedClock>;

  function verifier(env: Record<string, string> = {}): EligibilityVerifier {
    return new EligibilityVerifier({
      config: testConfig(env),
      connectors: registryOf(connector),
      publish: log.publish,
      sleep: noSleep,
      now: clock.now,
    });
  }

  beforeEach(() => {
    resetDatabase();
    connector = fakeConnector();
    log = eventLog();
    clock = fixedClock();
  });

  it("serves a fresh snapshot without calling the payer", async () => {
    await seedSampleClinic();

    const result = await verifier().verify("103", "aetna-ppo");

    expect(result.source).toBe("cache");
    expect(result.snapshot.outOfPocketMetYtd).toBe(4500);
    expect(connector.checkEligibility).not.toHaveBeenCalled();
  });

  it("queries the payer once the snapshot is older than the freshness window", async () => {
    await seedSampleClinic();
    clock.set(new Date("2025-07-01T09:00:00.000Z"));

    const result = await verifier().verify("103", "aetna-ppo");

    expect(result.source).toBe("payer");
    expect(connector.checkEligibility).toHaveBeenCalledTimes(1);
  });

  it("appends a snapshot and a log entry on a forced refresh", async () => {
    await seedSampleClinic();
    const v = verifier();

    const result = await v.verify("103", "aetna-ppo", { forceRefresh: true });

    expect(result.source).toBe("payer");
    expect(result.snapshot).toMatchObject({
      patientId: "103",
      payerId: "aetna-ppo",
      memberId: "AETNA54321",
      planName: "Test Gold",
      outOfPocketMetYtd: 1200,
      method: "edi",
      verifiedAt: SAMPLE_NOW,
    });
    expect(connector.checkEligibility.mock.calls[0]?.[0]).toEqual({
      memberId: "AETNA54321",
      patientName: "Alice Brown",
      dateOfBirth: "1970-11-01",
    });

    const history = await v.history("103", "aetna-ppo");
    expect(history.map((s) => s.outOfPocketMetYtd)).toEqual([1200, 4500]);
    expect((await v.current("103", "aetna-ppo"))?.id).toBe(result.snapshot.id);

    const entries = await v.log("103", "aetna-ppo");
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      status: "success",
      method: "edi",
      attempts: 1,
      rawResponse: "271 for AETNA54321",
      snapshotId: result.snapshot.id,
    });
    expect(log.events.map((e) => e.type)).toEqual(["eligibility.verified"]);
  });

  it("retries transient failures with backoff", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility
      .mockRejectedValueOnce(new PayerConnectorError("busy", "HTTP_503", true))
      .mockRejectedValueOnce(new Error("socket hang up"));

    const delays: number[] = [];
    const v = new EligibilityVerifier({
      config: testConfig({ PAYER_RETRY_BASE_DELAY_MS: "100" }),
      connectors: registryOf(connector),
      publish: log.publish,
      sleep: async (ms) => {
        delays.push(ms);
      },
      now: clock.now,
    });

    const result = await v.verify("101", "aetna-ppo");

    expect(result.source).toBe("payer");
    expect(delays).toEqual([100, 200]);
    expect((await v.log("101", "aetna-ppo"))[0]?.attempts).toBe(3);
  });

  it("presents the previous snapshot with a warning when the payer is down", async () => {
    await seedSampleClinic();
    connector.checkEligibility.mockRejectedValue(new PayerConnectorError("busy", "HTTP_503", true));
    const v = verifier();

    const result = await v.verify("101", "aetna-ppo", { forceRefresh: true });

    expect(result.source).toBe("stale");
    expect(result.warning).toBe("Payer unavailable (busy); showing coverage verified 2025-06-30T09:00:00.000Z");
    expect(connector.checkEligibility).toHaveBeenCalledTimes(3);

    const [entry] = await v.log("101", "aetna-ppo");
    expect(entry).toMatchObject({ status: "failed", errorCode: "HTTP_503", attempts: 3 });
  });

  it("throws EligibilityUnavailableError with no snapshot to fall back on", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility.mockRejectedValue(new PayerConnectorError("busy", "HTTP_503", true));

    await expect(verifier().verify("101", "aetna-ppo")).rejects.toBeInstanceOf(EligibilityUnavailableError);
  });

  it("gives up on a slow payer after the timeout", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility.mockImplementation(() => new Promise<CoverageResponse>(() => {}));
    const v = verifier({ PAYER_TIMEOUT_MS: "20", PAYER_RETRY_ATTEMPTS: "1" });

    await expect(v.verify("101", "aetna-ppo")).rejects.toThrow("Payer did not respond within 20ms");
    expect((await v.log("101", "aetna-ppo"))[0]?.errorCode).toBe("TIMEOUT");
  });

  it("records incomplete coverage as partial without retrying", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility.mockResolvedValue({
      fields: { memberId: "AETNA12345", coverageStatus: "Active", coinsurancePercentage: 20 },
      raw: "partial 271",
    });
    const v = verifier();

    await expect(v.verify("101", "aetna-ppo")).rejects.toBeInstanceOf(EligibilityUnavailableError);

    const [entry] = await v.log("101", "aetna-ppo");
    expect(entry).toMatchObject({
      status: "partial",
      attempts: 1,
      errorCode: "INCOMPLETE_COVERAGE",
      errorMessage:
        "Incomplete coverage data: missing deductibleAmount, deductibleMetYtd, outOfPocketMax, outOfPocketMetYtd",
      rawResponse: "partial 271",
    });
  });

  it("fails a blank member ID before contacting the payer and counts consecutive failures", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    await updatePatient("101", { coverages: [{ payerId: "aetna-ppo", memberId: "" }] });
    const v = verifier();

    await expect(v.verify("101", "aetna-ppo")).rejects.toBeInstanceOf(EligibilityUnavailableError);
    await expect(v.verify("101", "aetna-ppo")).rejects.toBeInstanceOf(EligibilityUnavailableError);

    expect(connector.checkEligibility).not.toHaveBeenCalled();
    const failures = log.events.flatMap((e) => (e.type === "eligibility.failed" ? [e] : []));
    expect(failures.map((e) => [e.errorCode, e.consecutiveFailures])).toEqual([
      ["MISSING_MEMBER_ID", 1],
      ["MISSING_MEMBER_ID", 2],
    ]);
  });

  it("resets the failure count after a success", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility.mockRejectedValueOnce(new PayerConnectorError("no", "INVALID_MEMBER_ID", false));
    const v = verifier();

    await expect(v.verify("101", "aetna-ppo")).rejects.toBeInstanceOf(EligibilityUnavailableError);
    await v.verify("101", "aetna-ppo");
    connector.checkEligibility.mockRejectedValueOnce(new PayerConnectorError("no", "INVALID_MEMBER_ID", false));
    await v.verify("101", "aetna-ppo", { forceRefresh: true });

    const failures = log.events.flatMap((e) => (e.type === "eligibility.failed" ? [e.consecutiveFailures] : []));
    expect(failures).toEqual([1, 1]);
  });

  it("reports batch failures per pair", async () => {
    await seedSampleClinic({ includeSnapshots: false });
    connector.checkEligibility.mockImplementation(async (query) => {
      if (query.memberId === "BCBS67890") throw new PayerConnectorError("no", "SUBSCRIBER_NOT_FOUND", false);
      return { fields: activeCoverage(query.memberId), raw: "ok" };
    });

    const results = await verifier().verifyBatch(
      [
        { patientId: "101", payerId: "aetna-ppo" },
        { patientId: "102", payerId: "bcbs-basic" },
      ],
      2
    );

    expect(results[0]?.result?.source).toBe("payer");
    expect(results[1]?.error).toBe("Eligibility unavailable for patient 102 with payer bcbs-basic: no");
  });
});

describe("missingCoverageFields", () => {
  it("lists required fields in declaration order", () => {
    expect(missingCoverageFields({ deductibleAmount: 0, outOfPocketMax: 0 })).toEqual([
      "coverageStatus",
      "deductibleMetYtd",
      "coinsurancePercentage",
      "outOfPocketMetYtd",
    ]);
  });
});
