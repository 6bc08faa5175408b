/**
 * Documentation package types.
 * The bundle of clinical documents and rationale sent with a PA request.
 */

import type { DocumentKind } from "./authorization.js";

/**
 * Package status. Moves forward only.
 */
export type PackageStatus = "draft" | "ready_for_review" | "submitted";

/** All package statuses, in lifecycle order */
export const PACKAGE_STATUSES: readonly PackageStatus[] = [
  "draft",
  "ready_for_review",
  "submitted",
] as const;

/**
 * A clinical document available from the patient's record.
 */
export interface ClinicalDocument {
  /** EHR document identifier (e.g., "EHR-DOC-001") */
  id: string;
  patientId: string;
  kind: DocumentKind;
  title: string;
  text: string;
  authoredAt?: Date;
}

/**
 * Reference to a document attached to a package.
 */
export interface AttachedDocument {
  documentId: string;
  kind: DocumentKind;
  title: string;

  /** Set for documents added after a request for more information */
  supplemental?: boolean;
}

/**
 * Documentation bundle for one PA request.
 */
export interface DocumentationPackage {
  id: string;
  paRequestId: string;
  patientId: string;
  serviceCode: string;
  payerId: string;

  status: PackageStatus;

  requiredDocs: DocumentKind[];
  attachedDocuments: AttachedDocument[];

  /** Required kinds with no matching document */
  missingDocs: DocumentKind[];

  /** Summarized clinical rationale */
  rationale: string;

  /** Necessity keywords found in the documents */
  flaggedKeywords: string[];

  /** Whether a reviewer must sign off before submission */
  reviewRequired: boolean;

  reviewerComments?: string;
  reviewedBy?: string;
  reviewedAt?: Date;

  submittedAt?: Date;
  supplementedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Reviewer sign-off on a package.
 */
export interface PackageReview {
  reviewer: string;
  comments: string;
}
