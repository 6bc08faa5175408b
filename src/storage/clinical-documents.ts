/**
 * Clinical Document Storage
 *
 * Local copies of EHR documents that documentation packages draw from.
 */

import type { ClinicalDocument } from "../types/documentation.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for clinical documents.
 */
export const clinicalDocumentsStorage = createSqliteRepository<ClinicalDocument>(
  "clinical_documents",
  [
    { column: "patient_id", property: "patientId" },
    { column: "kind", property: "kind" },
  ]
);

export async function saveClinicalDocument(doc: ClinicalDocument): Promise<ClinicalDocument> {
  return clinicalDocumentsStorage.save({ ...doc });
}

export async function findClinicalDocumentsForPatient(
  patientId: string
): Promise<ClinicalDocument[]> {
  return clinicalDocumentsStorage.findAllByIndex("patientId", patientId);
}
