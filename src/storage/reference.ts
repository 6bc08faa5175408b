/**
 * Reference Data Storage
 *
 * Services, authorization rules, denial patterns, resolution strategies,
 * negotiated rates, outreach templates and scheduling optimization rules.
 * The engine reads these; only seeding and admin scripts write them.
 */

import type { AuthorizationRule } from "../types/authorization.js";
import type { DenialPattern, ResolutionStrategy } from "../types/denial.js";
import type { CostCatalogEntry, Service } from "../types/payer.js";
import type { OptimizationRule } from "../types/appointment.js";
import type { OutreachTemplate } from "../types/referral.js";
import type { ReferenceData } from "../types/reference.js";
import { createSqliteRepository } from "./sqlite.js";

/** Services are keyed by their code */
type StoredService = Service & { id: string };

export const servicesStorage = createSqliteRepository<StoredService>("services");

export const authorizationRulesStorage = createSqliteRepository<AuthorizationRule>(
  "authorization_rules",
  [
    { column: "payer_id", property: "payerId" },
    { column: "service_code", property: "serviceCode" },
  ]
);

export const denialPatternsStorage = createSqliteRepository<DenialPattern>(
  "denial_patterns",
  [
    { column: "payer_id", property: "payerId" },
    { column: "service_code", property: "serviceCode" },
  ]
);

export const resolutionStrategiesStorage =
  createSqliteRepository<ResolutionStrategy>("resolution_strategies");

export const costCatalogStorage = createSqliteRepository<CostCatalogEntry>(
  "cost_catalog",
  [
    { column: "service_code", property: "serviceCode" },
    { column: "payer_id", property: "payerId" },
  ]
);

export const outreachTemplatesStorage = createSqliteRepository<OutreachTemplate>(
  "outreach_templates",
  [{ column: "missing_info_field", property: "missingInfoField" }]
);

export const optimizationRulesStorage = createSqliteRepository<OptimizationRule>(
  "optimization_rules",
  [{ column: "kind", property: "kind" }]
);

export async function saveService(service: Service): Promise<Service> {
  await servicesStorage.save({ ...service, id: service.code });
  return service;
}

/**
 * Load every reference table into memory.
 */
export async function loadReferenceData(): Promise<ReferenceData> {
  const [
    services,
    authorizationRules,
    denialPatterns,
    resolutionStrategies,
    costCatalog,
    outreachTemplates,
    optimizationRules,
  ] = await Promise.all([
    servicesStorage.getAll(),
    authorizationRulesStorage.getAll(),
    denialPatternsStorage.getAll(),
    resolutionStrategiesStorage.getAll(),
    costCatalogStorage.getAll(),
    outreachTemplatesStorage.getAll(),
    optimizationRulesStorage.getAll(),
  ]);

  return {
    services: services.map(({ id: _id, ...service }) => service),
    authorizationRules,
    denialPatterns,
    resolutionStrategies,
    costCatalog,
    outreachTemplates,
    optimizationRules,
  };
}
