/**
 * Provider Storage
 *
 * Providers and their network agreements with payers.
 */

import type {
  Provider,
  NetworkAgreement,
  NetworkStatus,
  CreateProviderInput,
  CreateNetworkAgreementInput,
} from "../types/provider.js";
import { generateId } from "./base.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for providers.
 */
export const providersStorage = createSqliteRepository<Provider>("providers", [
  { column: "specialty", property: "specialty" },
]);

/**
 * Storage operations for network agreements.
 */
export const networkAgreementsStorage = createSqliteRepository<NetworkAgreement>(
  "network_agreements",
  [
    { column: "provider_id", property: "providerId" },
    { column: "payer_id", property: "payerId" },
  ]
);

export async function createProvider(input: CreateProviderInput): Promise<Provider> {
  return providersStorage.save({ ...input });
}

/**
 * Providers whose specialty is one of `specialties`.
 */
export async function findProvidersBySpecialty(specialties: string[]): Promise<Provider[]> {
  const wanted = new Set(specialties.map((s) => s.toLowerCase()));
  return providersStorage.find((p) => wanted.has(p.specialty.toLowerCase()));
}

/**
 * Insert or replace the agreement for a (provider, payer) pair.
 */
export async function upsertNetworkAgreement(
  input: CreateNetworkAgreementInput
): Promise<NetworkAgreement> {
  const existing = await findNetworkAgreement(input.providerId, input.payerId);
  return networkAgreementsStorage.save({
    ...input,
    id: existing?.id ?? generateId(),
  });
}

export async function findNetworkAgreement(
  providerId: string,
  payerId: string
): Promise<NetworkAgreement | null> {
  const agreements = await networkAgreementsStorage.findAllByIndex("providerId", providerId);
  return agreements.find((a) => a.payerId === payerId) ?? null;
}

/**
 * Network status of a provider for a payer on a given day.
 * Returns null when no agreement covers that day.
 */
export async function getNetworkStatus(
  providerId: string,
  payerId: string,
  onDate: string
): Promise<NetworkStatus | null> {
  const agreement = await findNetworkAgreement(providerId, payerId);
  if (!agreement) return null;
  if (agreement.effectiveDate > onDate) return null;
  if (agreement.terminationDate && agreement.terminationDate < onDate) return null;
  return agreement.networkStatus;
}
