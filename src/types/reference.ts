/**
 * Reference data types.
 * Static rule tables loaded once and consulted synchronously by the
 * rule resolver, risk predictor, scheduler and outreach composer.
 */

import type { AuthorizationRule } from "./authorization.js";
import type { DenialPattern, ResolutionStrategy } from "./denial.js";
import type { CostCatalogEntry, Service } from "./payer.js";
import type { OptimizationRule } from "./appointment.js";
import type { OutreachTemplate } from "./referral.js";

/**
 * In-memory view of all reference tables.
 */
export interface ReferenceData {
  services: Service[];
  authorizationRules: AuthorizationRule[];
  denialPatterns: DenialPattern[];
  resolutionStrategies: ResolutionStrategy[];
  costCatalog: CostCatalogEntry[];
  outreachTemplates: OutreachTemplate[];
  optimizationRules: OptimizationRule[];
}

