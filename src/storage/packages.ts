/**
 * Documentation Package Storage
 */

import type { DocumentationPackage } from "../types/documentation.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for documentation packages.
 */
export const packagesStorage = createSqliteRepository<DocumentationPackage>(
  "documentation_packages",
  [
    { column: "pa_request_id", property: "paRequestId" },
    { column: "status", property: "status" },
  ]
);

export async function findPackageByPaRequest(
  paRequestId: string
): Promise<DocumentationPackage | null> {
  return packagesStorage.findByIndex("paRequestId", paRequestId);
}
