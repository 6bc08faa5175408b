/**
 * Engine configuration, read from the environment.
 */

import * as path from "node:path";
import { ConfigError } from "./services/errors.js";

export interface EngineConfig {
  /** SQLite file, or ":memory:" */
  databasePath: string;

  /** How long an eligibility snapshot is served from cache */
  eligibilityFreshnessHours: number;

  payer: {
    timeoutMs: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };

  /** Times a PA request may bounce through requires_more_info */
  maxInfoRequests: number;

  /** Complexity score at which a patient counts as complex for scheduling */
  highComplexityThreshold: number;

  apiPort: number;

  /** Run the portal browser headless */
  headless: boolean;

  /** Where rendered fax packages are written */
  outboxDir: string;

  /** Filled into patient outreach messages */
  clinicName: string;
  patientPortalUrl: string;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    databasePath: env.DATABASE_PATH ?? path.join(process.cwd(), "data", "revcycle.db"),
    eligibilityFreshnessHours: readInt(env, "ELIGIBILITY_FRESHNESS_HOURS", 24, 0),
    payer: {
      timeoutMs: readInt(env, "PAYER_TIMEOUT_MS", 30_000, 1),
      retryAttempts: readInt(env, "PAYER_RETRY_ATTEMPTS", 3, 1),
      retryBaseDelayMs: readInt(env, "PAYER_RETRY_BASE_DELAY_MS", 500, 0),
    },
    maxInfoRequests: readInt(env, "PA_MAX_INFO_REQUESTS", 2, 0),
    highComplexityThreshold: readInt(env, "HIGH_COMPLEXITY_THRESHOLD", 4, 1),
    apiPort: readInt(env, "API_PORT", 3001, 1),
    headless: env.HEADLESS !== "false",
    outboxDir: env.OUTBOX_DIR ?? path.join(process.cwd(), "data", "outbox"),
    clinicName: env.CLINIC_NAME ?? "Our Clinic",
    patientPortalUrl: env.PATIENT_PORTAL_URL ?? "https://portal.example.com",
  };
}

/**
 * Credentials for a payer, from `<PREFIX>_PORTAL_USERNAME`,
 * `<PREFIX>_PORTAL_PASSWORD` and `<PREFIX>_EDI_API_KEY`.
 */
export interface PayerCredentials {
  portalUsername?: string;
  portalPassword?: string;
  ediApiKey?: string;
}

export function loadPayerCredentials(prefix: string, env: Env = process.env): PayerCredentials {
  const portalUsername = env[`${prefix}_PORTAL_USERNAME`];
  const portalPassword = env[`${prefix}_PORTAL_PASSWORD`];
  const ediApiKey = env[`${prefix}_EDI_API_KEY`];
  return {
    ...(portalUsername && { portalUsername }),
    ...(portalPassword && { portalPassword }),
    ...(ediApiKey && { ediApiKey }),
  };
}
