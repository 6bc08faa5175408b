/**
 * Payer Storage
 */

import type { Payer } from "../types/payer.js";
import { createSqliteRepository } from "./sqlite.js";

/**
 * Storage operations for payers.
 */
export const payersStorage = createSqliteRepository<Payer>("payers", [
  { column: "name", property: "name" },
]);

export async function createPayer(input: Payer): Promise<Payer> {
  return payersStorage.save({ ...input });
}
