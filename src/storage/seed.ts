/**
 * Seed Data Loader
 *
 * Loads a clinic's reference and sample data from a JSON file into the store.
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { CreatePatientInput } from "../types/patient.js";
import type {
  Provider,
  CreateNetworkAgreementInput,
  CreateScheduleSlotInput,
} from "../types/provider.js";
import type { Payer, Service, CostCatalogEntry } from "../types/payer.js";
import type { AuthorizationRule } from "../types/authorization.js";
import type { DenialPattern, ResolutionStrategy } from "../types/denial.js";
import type { OptimizationRule } from "../types/appointment.js";
import type { Referral, OutreachTemplate } from "../types/referral.js";
import type { ClinicalDocument } from "../types/documentation.js";
import type { CreateEligibilitySnapshotInput } from "../types/eligibility.js";
import { parseDocument } from "./base.js";
import { createPatient } from "./patients.js";
import { createProvider, upsertNetworkAgreement } from "./providers.js";
import { addSlot } from "./schedules.js";
import { createPayer } from "./payers.js";
import {
  saveService,
  authorizationRulesStorage,
  denialPatternsStorage,
  resolutionStrategiesStorage,
  costCatalogStorage,
  outreachTemplatesStorage,
  optimizationRulesStorage,
} from "./reference.js";
import { saveReferral } from "./referrals.js";
import { saveClinicalDocument } from "./clinical-documents.js";
import { appendSnapshot } from "./eligibility.js";

/**
 * Shape of a seed file.
 */
export interface SeedData {
  patients: CreatePatientInput[];
  providers: Provider[];
  networkAgreements: CreateNetworkAgreementInput[];
  scheduleSlots: CreateScheduleSlotInput[];
  payers: Payer[];
  services: Service[];
  authorizationRules: AuthorizationRule[];
  denialPatterns: DenialPattern[];
  resolutionStrategies: ResolutionStrategy[];
  costCatalog: CostCatalogEntry[];
  outreachTemplates: OutreachTemplate[];
  optimizationRules: OptimizationRule[];
  referrals: Referral[];
  clinicalDocuments: ClinicalDocument[];
  eligibilitySnapshots: CreateEligibilitySnapshotInput[];
}

/** Bundled sample clinic */
export const SAMPLE_CLINIC_PATH = fileURLToPath(
  new URL("../../seed/sample-clinic.json", import.meta.url)
);

export function readSeedFile(filePath: string = SAMPLE_CLINIC_PATH): SeedData {
  return parseDocument<SeedData>(fs.readFileSync(filePath, "utf-8"));
}

/**
 * Write every seed record to the store.
 * Snapshots are optional history; pass `includeSnapshots: false` to start
 * with no cached eligibility.
 */
export async function seedDatabase(
  data: SeedData,
  options: { includeSnapshots?: boolean } = {}
): Promise<void> {
  for (const patient of data.patients) await createPatient(patient);
  for (const provider of data.providers) await createProvider(provider);
  for (const agreement of data.networkAgreements) await upsertNetworkAgreement(agreement);
  for (const slot of data.scheduleSlots) await addSlot(slot);
  for (const payer of data.payers) await createPayer(payer);
  for (const service of data.services) await saveService(service);
  for (const rule of data.authorizationRules) await authorizationRulesStorage.save(rule);
  for (const strategy of data.resolutionStrategies) await resolutionStrategiesStorage.save(strategy);
  for (const pattern of data.denialPatterns) await denialPatternsStorage.save(pattern);
  for (const entry of data.costCatalog) await costCatalogStorage.save(entry);
  for (const template of data.outreachTemplates) await outreachTemplatesStorage.save(template);
  for (const rule of data.optimizationRules) await optimizationRulesStorage.save(rule);
  for (const referral of data.referrals) await saveReferral(referral);
  for (const doc of data.clinicalDocuments) await saveClinicalDocument(doc);

  if (options.includeSnapshots ?? true) {
    for (const snapshot of data.eligibilitySnapshots) await appendSnapshot(snapshot);
  }
}
