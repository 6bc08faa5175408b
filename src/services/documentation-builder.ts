/**
 * Documentation Package Builder
 *
 * Assembles the clinical documents, necessity keywords and rationale a
 * payer expects with a prior authorization, and gates submission on
 * completeness and reviewer sign-off.
 *
 * Package status only moves forward: draft -> ready_for_review -> submitted.
 */

import type { DocumentKind } from "../types/authorization.js";
import type {
  AttachedDocument,
  ClinicalDocument,
  DocumentationPackage,
  PackageReview,
  PackageStatus,
} from "../types/documentation.js";
import { DOCUMENT_KIND_LABELS } from "../types/authorization.js";
import { PACKAGE_STATUSES } from "../types/documentation.js";
import {
  findClinicalDocumentsForPatient,
  findPackageByPaRequest,
  generateId,
  packagesStorage,
  paRequestsStorage,
} from "../storage/index.js";
import {
  BusinessRuleError,
  NotFoundError,
  PackageNotReadyError,
  ValidationError,
} from "./errors.js";
import type { AuthRuleResolver } from "./auth-rule-resolver.js";

/**
 * Where the builder finds a patient's clinical documents.
 */
export interface ClinicalDocumentSource {
  listForPatient(patientId: string): Promise<ClinicalDocument[]>;
}

/**
 * Turns clinical documents into a medical necessity rationale.
 */
export interface RationaleSummarizer {
  summarize(input: { documents: ClinicalDocument[]; keywords: string[] }): Promise<string>;
}

/**
 * Documents from the local clinical document store.
 */
export const storedClinicalDocuments: ClinicalDocumentSource = {
  listForPatient: findClinicalDocumentsForPatient,
};

/**
 * Split text into sentences on terminal punctuation.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Keeps the sentences that mention a flagged keyword, in document order.
 * With no keyword hits, falls back to the first sentence of the first document.
 */
export class ExtractiveSummarizer implements RationaleSummarizer {
  async summarize(input: { documents: ClinicalDocument[]; keywords: string[] }): Promise<string> {
    const needles = input.keywords.map((k) => k.toLowerCase());
    const sentences = input.documents.flatMap((d) => splitSentences(d.text));
    const hits = sentences.filter((s) => needles.some((n) => s.toLowerCase().includes(n)));
    if (hits.length > 0) return hits.join(" ");
    return sentences[0] ?? "";
  }
}

/**
 * Necessity keywords present in any of the texts, case-insensitive, in rule order.
 */
export function findKeywords(keywords: string[], texts: string[]): string[] {
  const haystack = texts.map((t) => t.toLowerCase());
  return keywords.filter((k) => haystack.some((t) => t.includes(k.toLowerCase())));
}

function laterStatus(a: PackageStatus, b: PackageStatus): PackageStatus {
  return PACKAGE_STATUSES.indexOf(a) >= PACKAGE_STATUSES.indexOf(b) ? a : b;
}

export interface DocumentationBuilderDeps {
  resolver: AuthRuleResolver;
  source?: ClinicalDocumentSource;
  summarizer?: RationaleSummarizer;
  now?: () => Date;
}

export interface BuildOptions {
  /** Whether a reviewer must sign off; on unless turned off */
  reviewRequired?: boolean;
}

export class DocumentationBuilder {
  private source: ClinicalDocumentSource;
  private summarizer: RationaleSummarizer;
  private now: () => Date;

  constructor(private deps: DocumentationBuilderDeps) {
    this.source = deps.source ?? storedClinicalDocuments;
    this.summarizer = deps.summarizer ?? new ExtractiveSummarizer();
    this.now = deps.now ?? (() => new Date());
  }

  async get(packageId: string): Promise<DocumentationPackage> {
    const pkg = await packagesStorage.get(packageId);
    if (!pkg) throw new NotFoundError("Documentation package", packageId);
    return pkg;
  }

  /**
   * Source documents behind a package's attachments, in attachment order.
   */
  async documentsFor(pkg: DocumentationPackage): Promise<ClinicalDocument[]> {
    const available = await this.source.listForPatient(pkg.patientId);
    return pkg.attachedDocuments.flatMap((attached) => available.filter((d) => d.id === attached.documentId));
  }

  /**
   * Build or refresh the package for a PA request.
   */
  async build(paRequestId: string, options: BuildOptions = {}): Promise<DocumentationPackage> {
    const pa = await paRequestsStorage.get(paRequestId);
    if (!pa) throw new NotFoundError("PA request", paRequestId);

    const existing = await findPackageByPaRequest(paRequestId);
    if (existing?.status === "submitted") {
      throw new BusinessRuleError(`Package ${existing.id} was already submitted; use supplement to add documents`);
    }

    const requirement = this.deps.resolver.resolve(pa.payerId, pa.serviceCode);
    const available = await this.source.listForPatient(pa.patientId);

    const selected = requirement.requiredDocs.flatMap((kind) => available.filter((d) => d.kind === kind));
    const missingDocs = requirement.requiredDocs.filter((kind) => !selected.some((d) => d.kind === kind));
    const flaggedKeywords = findKeywords(requirement.necessityKeywords, selected.map((d) => d.text));
    const rationale = await this.summarizer.summarize({ documents: selected, keywords: flaggedKeywords });

    const built: PackageStatus = missingDocs.length === 0 ? "ready_for_review" : "draft";
    const now = this.now();

    const pkg: DocumentationPackage = {
      ...existing,
      id: existing?.id ?? generateId(),
      paRequestId,
      patientId: pa.patientId,
      serviceCode: pa.serviceCode,
      payerId: pa.payerId,
      status: existing ? laterStatus(existing.status, built) : built,
      requiredDocs: [...requirement.requiredDocs],
      attachedDocuments: selected.map((d) => ({ documentId: d.id, kind: d.kind, title: d.title })),
      missingDocs,
      rationale,
      flaggedKeywords,
      reviewRequired: options.reviewRequired ?? existing?.reviewRequired ?? true,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    await packagesStorage.save(pkg);
    console.log(
      `[docs] Package ${pkg.id} for ${paRequestId}: ${pkg.status}, ${selected.length} documents, ${missingDocs.length} missing`
    );
    return pkg;
  }

  async recordReview(packageId: string, review: PackageReview): Promise<DocumentationPackage> {
    const pkg = await this.get(packageId);
    if (pkg.status === "submitted") {
      throw new BusinessRuleError(`Package ${packageId} was already submitted`);
    }
    if (!review.reviewer.trim() || !review.comments.trim()) {
      throw new ValidationError("Reviewer and comments are required");
    }

    const now = this.now();
    const updated: DocumentationPackage = {
      ...pkg,
      reviewedBy: review.reviewer.trim(),
      reviewerComments: review.comments.trim(),
      reviewedAt: now,
      updatedAt: now,
    };
    await packagesStorage.save(updated);
    return updated;
  }

  /**
   * What must be fixed before the package can be submitted. Empty when ready.
   */
  checkReadiness(pkg: DocumentationPackage): string[] {
    const problems = pkg.missingDocs.map((kind: DocumentKind) => `Missing required document: ${DOCUMENT_KIND_LABELS[kind]}`);
    if (pkg.reviewRequired && !pkg.reviewerComments?.trim()) {
      problems.push("Reviewer comments required before submission");
    }
    if (pkg.status === "draft") {
      problems.push("Package is still a draft");
    }
    return problems;
  }

  /**
   * Mark the package submitted. Already-submitted packages are returned unchanged.
   */
  async submit(packageId: string): Promise<DocumentationPackage> {
    const pkg = await this.get(packageId);
    if (pkg.status === "submitted") return pkg;

    const problems = this.checkReadiness(pkg);
    if (problems.length > 0) {
      throw new PackageNotReadyError(packageId, problems);
    }

    const now = this.now();
    const submitted: DocumentationPackage = { ...pkg, status: "submitted", submittedAt: now, updatedAt: now };
    await packagesStorage.save(submitted);
    return submitted;
  }

  /**
   * Attach documents sent after the payer asked for more information.
   * Status is left as it is.
   */
  async supplement(packageId: string, documents: ClinicalDocument[]): Promise<DocumentationPackage> {
    const pkg = await this.get(packageId);

    const foreign = documents.filter((d) => d.patientId !== pkg.patientId);
    if (foreign.length > 0) {
      throw new ValidationError(
        `Documents ${foreign.map((d) => d.id).join(", ")} belong to another patient`
      );
    }

    const known = new Set(pkg.attachedDocuments.map((d) => d.documentId));
    const added: AttachedDocument[] = documents
      .filter((d) => !known.has(d.id))
      .map((d) => ({ documentId: d.id, kind: d.kind, title: d.title, supplemental: true }));

    const attachedDocuments = [...pkg.attachedDocuments, ...added];
    const requirement = this.deps.resolver.resolve(pkg.payerId, pkg.serviceCode);
    const newlyFlagged = findKeywords(requirement.necessityKeywords, documents.map((d) => d.text));
    const flaggedKeywords = requirement.necessityKeywords.filter(
      (k) => pkg.flaggedKeywords.includes(k) || newlyFlagged.includes(k)
    );

    const now = this.now();
    const updated: DocumentationPackage = {
      ...pkg,
      attachedDocuments,
      missingDocs: pkg.missingDocs.filter((kind) => !attachedDocuments.some((d) => d.kind === kind)),
      flaggedKeywords,
      supplementedAt: now,
      updatedAt: now,
    };
    await packagesStorage.save(updated);
    console.log(`[docs] Package ${packageId}: ${added.length} supplemental documents attached`);
    return updated;
  }
}
