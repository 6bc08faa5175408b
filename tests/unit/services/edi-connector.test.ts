import { afterEach, describe, expect, it, vi } from "vitest";
import {
  EdiConnector,
  build270,
  parse271,
  parseAuthDecision,
} from "../../../src/services/edi-connector.js";
import { PayerConnectorError } from "../../../src/services/errors.js";
import type { EdiMappingRules, Payer } from "../../../src/types/payer.js";

const rules: EdiMappingRules = {
  senderId: "CLINICA",
  receiverId: "PAYERA",
  response: {
    coverageStatus: { segment: "EB", element: 1 },
    planName: { segment: "EB", element: 5 },
    groupNumber: { segment: "REF", qualifier: "6P", element: 2 },
    effectiveDate: { segment: "DTP", qualifier: "346", element: 3 },
    deductibleAmount: { segment: "AMT", qualifier: "D", element: 2 },
    deductibleMetYtd: { segment: "AMT", qualifier: "DY", element: 2 },
    coinsurancePercentage: { segment: "AMT", qualifier: "CI", element: 2 },
    outOfPocketMax: { segment: "AMT", qualifier: "OM", element: 2 },
    outOfPocketMetYtd: { segment: "AMT", qualifier: "OY", element: 2 },
    referralRequired: { segment: "REF", qualifier: "RR", element: 2 },
  },
};

const payer: Payer = {
  id: "payer-a",
  name: "Payer A",
  access: {
    ediEndpoint: "https://edi.payer-a.test/270",
    credentialsEnvPrefix: "PAYERA",
  },
  ediRules: rules,
};

const RESPONSE_271 = [
  "ISA*00*          *00*          *ZZ*PAYERA         *ZZ*CLINICA        *250630*1200*^*00501*000000001*0*P*:~",
  "ST*271*0001*005010X279A1~",
  "EB*1**30**Test Gold~",
  "REF*6P*GRP-1~",
  "DTP*346*D8*20240101~",
  "AMT*D*1,000.00~",
  "AMT*DY*250~",
  "AMT*CI*20~",
  "AMT*OM*5000~",
  "AMT*OY*400~",
  "REF*RR*Y~",
  "MSG*DME: Limited to $500/year~",
  "SE*12*0001~",
].join("\n");

describe("build270", () => {
  const now = new Date("2025-06-30T12:00:00.000Z");

  it("addresses the subscriber by name, member ID and birth date", () => {
    const lines = build270(
      { memberId: "M1", patientName: "John Doe", dateOfBirth: "1985-03-15" },
      rules,
      "Payer A",
      7,
      now
    ).split("\n");

    expect(lines).toContain("BHT*0022*13*000000007*20250630*1200~");
    expect(lines).toContain("NM1*PR*2*Payer A*****PI*PAYERA~");
    expect(lines).toContain("NM1*IL*1*Doe*John****MI*M1~");
    expect(lines).toContain("DMG*D8*19850315~");
    expect(lines).toContain("SE*12*0001~");
    expect(lines.at(-1)).toBe("IEA*1*000000007~");
  });

  it("leaves out the DMG segment without a birth date", () => {
    const lines = build270({ memberId: "M1", patientName: "John Doe" }, rules, "Payer A", 1, now).split("\n");

    expect(lines.some((l) => l.startsWith("DMG"))).toBe(false);
    expect(lines).toContain("SE*11*0001~");
  });

  it("refuses a blank member ID", () => {
    expect(() => build270({ memberId: "  " }, rules, "Payer A", 1, now)).toThrow(PayerConnectorError);
  });
});

describe("parse271", () => {
  it("reads each mapped field", () => {
    expect(parse271(RESPONSE_271, rules, "M1")).toEqual({
      memberId: "M1",
      coverageStatus: "Active",
      planName: "Test Gold",
      groupNumber: "GRP-1",
      effectiveDate: "2024-01-01",
      deductibleAmount: 1000,
      deductibleMetYtd: 250,
      coinsurancePercentage: 20,
      outOfPocketMax: 5000,
      outOfPocketMetYtd: 400,
      referralRequired: true,
      serviceLimitations: [{ category: "DME", limitation: "Limited to $500/year" }],
    });
  });

  it("treats known AAA reject reasons as permanent", () => {
    try {
      parse271("AAA*N**72*C~", rules, "M1");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PayerConnectorError);
      expect(err).toMatchObject({ code: "INVALID_MEMBER_ID", transient: false });
    }
  });

  it("retries unknown AAA reject reasons", () => {
    try {
      parse271("AAA*N**42*R~", rules, "M1");
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ code: "PAYER_REJECTED", transient: true });
    }
  });
});

describe("parseAuthDecision", () => {
  it("accepts `status` as the outcome and keeps known fields", () => {
    expect(parseAuthDecision({ status: "approved", authorizationNumber: "AUTH-1", extra: 1 })).toEqual({
      outcome: "approved",
      authorizationNumber: "AUTH-1",
    });
  });

  it("rejects unknown outcomes", () => {
    expect(() => parseAuthDecision({ outcome: "maybe" })).toThrow("Unknown prior authorization outcome: maybe");
  });
});

describe("EdiConnector", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the 270 with the payer's API key and parses the 271", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) => new Response(RESPONSE_271, { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const connector = new EdiConnector({
      env: { PAYERA_EDI_API_KEY: "test-secret" },
      now: () => new Date("2025-06-30T12:00:00.000Z"),
    });
    const response = await connector.checkEligibility({ memberId: "M1", patientName: "John Doe" }, payer);

    expect(response.fields.coverageStatus).toBe("Active");
    expect(response.raw).toBe(RESPONSE_271);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://edi.payer-a.test/270");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/edi-x12",
      Authorization: "Bearer test-secret",
    });
  });

  it("reports 5xx responses as transient", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("busy", { status: 503 })));

    const connector = new EdiConnector({ env: {} });
    await expect(connector.checkEligibility({ memberId: "M1" }, payer)).rejects.toMatchObject({
      code: "HTTP_503",
      transient: true,
      rawResponse: "busy",
    });
  });

  it("reports network failures as transient", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("socket hang up");
      })
    );

    const connector = new EdiConnector({ env: {} });
    await expect(connector.checkEligibility({ memberId: "M1" }, payer)).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      transient: true,
    });
  });

  it("refuses payers without EDI configuration", async () => {
    const connector = new EdiConnector({ env: {} });
    const portalOnly: Payer = { id: "payer-b", name: "Payer B", access: { credentialsEnvPrefix: "PAYERB" } };

    await expect(connector.checkEligibility({ memberId: "M1" }, portalOnly)).rejects.toMatchObject({
      code: "NO_CHANNEL",
    });
  });
});
