/**
 * Seed script: sample clinic JSON -> SQLite
 *
 * Loads patients, providers, payers, schedules and reference tables from a
 * seed file. Safe to run more than once (records are upserted), except
 * for eligibility snapshots, which are append-only; pass --no-snapshots on
 * reruns.
 *
 * Usage: npx tsx src/scripts/seed.ts [seed-file.json] [--no-snapshots]
 */

import { closeDatabase, getDatabase, readSeedFile, seedDatabase, SAMPLE_CLINIC_PATH, type SeedData } from "../storage/index.js";
import { loadConfig } from "../config.js";

function summarize(data: SeedData): [string, number][] {
  return [
    ["patients", data.patients.length],
    ["providers", data.providers.length],
    ["network agreements", data.networkAgreements.length],
    ["schedule slots", data.scheduleSlots.length],
    ["payers", data.payers.length],
    ["services", data.services.length],
    ["authorization rules", data.authorizationRules.length],
    ["denial patterns", data.denialPatterns.length],
    ["resolution strategies", data.resolutionStrategies.length],
    ["cost catalog entries", data.costCatalog.length],
    ["outreach templates", data.outreachTemplates.length],
    ["optimization rules", data.optimizationRules.length],
    ["referrals", data.referrals.length],
    ["clinical documents", data.clinicalDocuments.length],
    ["eligibility snapshots", data.eligibilitySnapshots.length],
  ];
}

async function seed(): Promise<void> {
  const args = process.argv.slice(2);
  const includeSnapshots = !args.includes("--no-snapshots");
  const filePath = args.find((a) => !a.startsWith("--")) ?? SAMPLE_CLINIC_PATH;

  console.log(`Seeding ${loadConfig().databasePath} from ${filePath}...\n`);
  getDatabase();

  const data = readSeedFile(filePath);
  await seedDatabase(data, { includeSnapshots });

  for (const [name, count] of summarize(data)) {
    if (name === "eligibility snapshots" && !includeSnapshots) {
      console.log(`  ${name}: skipped`);
      continue;
    }
    console.log(`  ${name}: ${count}`);
  }
  console.log("\nSeed complete.");
}

seed()
  .catch((err: unknown) => {
    console.error("Seed failed:", err);
    process.exitCode = 1;
  })
  .finally(() => closeDatabase());
