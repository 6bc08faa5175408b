import { beforeEach, describe, expect, it } from "vitest";
import {
  DocumentationBuilder,
  ExtractiveSummarizer,
  findKeywords,
  splitSentences,
  type ClinicalDocumentSource,
} from "../../../src/services/documentation-builder.js";
import { AuthRuleResolver } from "../../../src/services/auth-rule-resolver.js";
import { BusinessRuleError, PackageNotReadyError, ValidationError } from "../../../src/services/errors.js";
import { paRequestsStorage, readSeedFile } from "../../../src/storage/index.js";
import type { ClinicalDocument } from "../../../src/types/documentation.js";
import type { PaRequest } from "../../../src/types/pa-request.js";
import { SAMPLE_NOW, fixedClock, resetDatabase, seedSampleClinic } from "../helpers.js";

function paRequest(overrides: Partial<PaRequest> = {}): PaRequest {
  return {
    id: "PA-1",
    patientId: "103",
    providerId: "201",
    serviceCode: "CPT70551",
    payerId: "aetna-ppo",
    status: "initiated",
    infoRequestCount: 0,
    initiatedAt: SAMPLE_NOW,
    lastUpdatedAt: SAMPLE_NOW,
    ...overrides,
  };
}

const imagingFor101: ClinicalDocument = {
  id: "DOC-IMG-101",
  patientId: "101",
  kind: "imaging_reports",
  title: "X-ray forearm",
  text: "No fracture. Soft tissue swelling noted.",
};

describe("DocumentationBuilder", () => {
  let builder: DocumentationBuilder;

  beforeEach(async () => {
    resetDatabase();
    await seedSampleClinic();
    builder = new DocumentationBuilder({
      resolver: new AuthRuleResolver(readSeedFile().authorizationRules),
      now: fixedClock().now,
    });
  });

  it("attaches the required documents and summarizes the flagged sentences", async () => {
    await paRequestsStorage.save(paRequest());

    const pkg = await builder.build("PA-1");

    expect(pkg.status).toBe("ready_for_review");
    expect(pkg.attachedDocuments.map((d) => d.documentId)).toEqual(["EHR-DOC-001", "EHR-DOC-002"]);
    expect(pkg.missingDocs).toEqual([]);
    expect(pkg.flaggedKeywords).toEqual(["failed conservative therapy", "neurological deficits"]);
    expect(pkg.rationale).toBe(
      "Exam shows neurological deficits in the left hand. Patient has failed conservative therapy with NSAIDs and physical therapy."
    );
    expect(pkg.reviewRequired).toBe(true);
    expect(builder.checkReadiness(pkg)).toEqual(["Reviewer comments required before submission"]);
  });

  it("keeps a package with missing documents as a draft", async () => {
    await paRequestsStorage.save(paRequest({ patientId: "101" }));

    const pkg = await builder.build("PA-1");

    expect(pkg.status).toBe("draft");
    expect(pkg.missingDocs).toEqual(["imaging_reports"]);
    expect(pkg.flaggedKeywords).toEqual([]);
    expect(pkg.rationale).toBe("New rash on both forearms for two weeks.");
    expect(builder.checkReadiness(pkg)).toEqual([
      "Missing required document: Imaging Reports",
      "Reviewer comments required before submission",
      "Package is still a draft",
    ]);
    await expect(builder.submit(pkg.id)).rejects.toBeInstanceOf(PackageNotReadyError);
  });

  it("requires a reviewer and comments to sign off", async () => {
    await paRequestsStorage.save(paRequest());
    const pkg = await builder.build("PA-1");

    await expect(builder.recordReview(pkg.id, { reviewer: "Dana", comments: "  " })).rejects.toBeInstanceOf(
      ValidationError
    );

    const reviewed = await builder.recordReview(pkg.id, { reviewer: " Dana ", comments: "Rationale is complete." });
    expect(reviewed.reviewedBy).toBe("Dana");
    expect(reviewed.reviewedAt).toEqual(SAMPLE_NOW);
    expect(builder.checkReadiness(reviewed)).toEqual([]);
  });

  it("skips sign-off when review is turned off", async () => {
    await paRequestsStorage.save(paRequest());

    const pkg = await builder.build("PA-1", { reviewRequired: false });

    expect(builder.checkReadiness(pkg)).toEqual([]);
    expect((await builder.build("PA-1")).reviewRequired).toBe(false);
  });

  it("freezes a package once submitted", async () => {
    await paRequestsStorage.save(paRequest());
    const pkg = await builder.build("PA-1", { reviewRequired: false });

    const submitted = await builder.submit(pkg.id);
    expect(submitted.status).toBe("submitted");
    expect(submitted.submittedAt).toEqual(SAMPLE_NOW);

    expect(await builder.submit(pkg.id)).toEqual(submitted);
    await expect(builder.build("PA-1")).rejects.toBeInstanceOf(BusinessRuleError);
    await expect(builder.recordReview(pkg.id, { reviewer: "Dana", comments: "Late" })).rejects.toBeInstanceOf(
      BusinessRuleError
    );
  });

  it("never moves a rebuilt package back to draft", async () => {
    let documents: ClinicalDocument[] = readSeedFile().clinicalDocuments.filter((d) => d.patientId === "103");
    const source: ClinicalDocumentSource = { listForPatient: async () => documents };
    const withSource = new DocumentationBuilder({
      resolver: new AuthRuleResolver(readSeedFile().authorizationRules),
      source,
    });
    await paRequestsStorage.save(paRequest());

    const first = await withSource.build("PA-1");
    documents = documents.filter((d) => d.kind !== "imaging_reports");
    const second = await withSource.build("PA-1");

    expect(first.status).toBe("ready_for_review");
    expect(second.id).toBe(first.id);
    expect(second.missingDocs).toEqual(["imaging_reports"]);
    expect(second.status).toBe("ready_for_review");
  });

  it("supplements with the patient's documents only", async () => {
    await paRequestsStorage.save(paRequest({ patientId: "101" }));
    const pkg = await builder.build("PA-1");

    await expect(
      builder.supplement(pkg.id, [{ ...imagingFor101, id: "DOC-OTHER", patientId: "103" }])
    ).rejects.toBeInstanceOf(ValidationError);

    const supplemented = await builder.supplement(pkg.id, [imagingFor101]);
    expect(supplemented.missingDocs).toEqual([]);
    expect(supplemented.attachedDocuments.at(-1)).toEqual({
      documentId: "DOC-IMG-101",
      kind: "imaging_reports",
      title: "X-ray forearm",
      supplemental: true,
    });
    expect(supplemented.status).toBe("draft");

    const again = await builder.supplement(pkg.id, [imagingFor101]);
    expect(again.attachedDocuments).toHaveLength(2);
  });

  it("returns the source documents behind the attachments", async () => {
    await paRequestsStorage.save(paRequest());
    const pkg = await builder.build("PA-1");

    const documents = await builder.documentsFor(pkg);

    expect(documents.map((d) => d.title)).toEqual(["Progress note: persistent headaches", "CT head without contrast"]);
  });
});

describe("rationale helpers", () => {
  it("splits sentences on terminal punctuation", () => {
    expect(splitSentences("One. Two?  Three!")).toEqual(["One.", "Two?", "Three!"]);
  });

  it("matches keywords case-insensitively in rule order", () => {
    expect(findKeywords(["b keyword", "a keyword"], ["Has A Keyword and B KEYWORD"])).toEqual(["b keyword", "a keyword"]);
  });

  it("falls back to the first sentence without keyword hits", async () => {
    const summary = await new ExtractiveSummarizer().summarize({
      documents: [{ ...imagingFor101 }],
      keywords: ["fracture of the skull"],
    });
    expect(summary).toBe("No fracture.");
  });
});
