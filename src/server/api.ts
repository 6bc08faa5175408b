/**
 * API Server
 *
 * Thin HTTP surface over the engine. Routes translate JSON bodies into
 * engine calls; engine errors map to their status codes.
 */

import * as http from "node:http";
import { loadConfig } from "../config.js";
import { createEngine, type Engine } from "../services/engine.js";
import { EngineError, PayerConnectorError, ValidationError } from "../services/errors.js";
import { parseAuthDecision } from "../services/edi-connector.js";
import { parseDateRange, parseTimeWindow } from "../services/schedule-parsing.js";
import { findClinicalDocumentsForPatient } from "../storage/index.js";
import type { CreateAppointmentRequestInput, DateRange, TimeWindow } from "../types/appointment.js";
import type { AuthDecision, CreatePaRequestInput } from "../types/pa-request.js";
import { ALERT_STATUSES, type AlertStatus } from "../types/alert.js";
import { REFERRAL_STATUSES, type ReferralStatus } from "../types/referral.js";
import type { RecordReferralInput } from "../services/referral-registry.js";

type Body = Record<string, unknown>;

type RouteHandler = (params: Record<string, string>, body: Body, query: URLSearchParams) => Promise<unknown>;

type Method = "GET" | "POST";

export interface ApiResponse {
  status: number;
  body: unknown;
}

// =============================================
// REQUEST HELPERS
// =============================================

function isRecord(value: unknown): value is Body {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse a JSON request body; an empty body is {} */
async function parseBody(req: http.IncomingMessage): Promise<Body> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  const text = Buffer.concat(chunks).toString("utf-8").trim();
  if (!text) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError("Request body is not valid JSON");
  }
  if (!isRecord(parsed)) throw new ValidationError("Request body must be a JSON object");
  return parsed;
}

function requireString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`${field} is required`);
  }
  return value.trim();
}

function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ValidationError(`${field} must be a string`);
  return value.trim() || undefined;
}

function optionalBoolean(body: Body, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ValidationError(`${field} must be true or false`);
  return value;
}

function optionalNumber(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || Number.isNaN(value)) throw new ValidationError(`${field} must be a number`);
  return value;
}

/** "2025-07-01 to 2025-07-15" or { start, end } */
function readDateRange(body: Body): DateRange | undefined {
  const value = body.dateRange;
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return parseDateRange(value);
  if (isRecord(value) && typeof value.start === "string") {
    const end = typeof value.end === "string" ? value.end : value.start;
    return parseDateRange(`${value.start} to ${end}`);
  }
  throw new ValidationError("dateRange must be text or { start, end }");
}

/** "After 4 PM", "Morning", "10:00:00" */
function readTimeWindow(body: Body): TimeWindow | undefined {
  const value = optionalString(body, "timeWindow");
  return value ? parseTimeWindow(value) : undefined;
}

function optionalStringList(body: Body, field: string): string[] {
  const value = body[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ValidationError(`${field} must be a list of strings`);
  }
  return value;
}

function readDecision(body: Body): AuthDecision {
  try {
    return parseAuthDecision(body);
  } catch (err) {
    if (err instanceof PayerConnectorError) throw new ValidationError(err.message);
    throw err;
  }
}

function readAlertStatus(query: URLSearchParams): AlertStatus | undefined {
  const value = query.get("status");
  if (value === null) return undefined;
  const status = ALERT_STATUSES.find((s) => s === value);
  if (!status) throw new ValidationError(`status must be one of ${ALERT_STATUSES.join(", ")}`);
  return status;
}

function readReferralStatus(body: Body): ReferralStatus {
  const value = requireString(body, "status");
  const status = REFERRAL_STATUSES.find((s) => s === value);
  if (!status) throw new ValidationError(`status must be one of ${REFERRAL_STATUSES.join(", ")}`);
  return status;
}

function readReferral(body: Body): RecordReferralInput {
  const referringProviderId = optionalString(body, "referringProviderId");
  const serviceType = optionalString(body, "serviceType");
  const approvalExpirationDate = optionalString(body, "approvalExpirationDate");
  return {
    id: requireString(body, "id"),
    patientId: requireString(body, "patientId"),
    referredToProviderId: requireString(body, "referredToProviderId"),
    payerId: requireString(body, "payerId"),
    status: readReferralStatus(body),
    ...(referringProviderId && { referringProviderId }),
    ...(serviceType && { serviceType }),
    ...(approvalExpirationDate && { approvalExpirationDate }),
  };
}

// =============================================
// ROUTES
// =============================================

export function createRoutes(engine: Engine): Record<Method, Record<string, RouteHandler>> {
  const { orchestrator, verifier, paStateMachine, builder, alerts, allocator, resolver, referrals } = engine;

  const routes: Record<Method, Record<string, RouteHandler>> = { GET: {}, POST: {} };

  // Appointment requests

  routes.POST["/api/appointment-requests"] = async (_params, body) => {
    const requestedProviderId = optionalString(body, "requestedProviderId");
    const dateRange = readDateRange(body);
    const timeWindow = readTimeWindow(body);
    const input: CreateAppointmentRequestInput = {
      patientId: requireString(body, "patientId"),
      serviceCode: requireString(body, "serviceCode"),
      payerId: requireString(body, "payerId"),
      urgencyScore: optionalNumber(body, "urgencyScore") ?? 1,
      ...(requestedProviderId && { requestedProviderId }),
      ...(dateRange && { dateRange }),
      ...(timeWindow && { timeWindow }),
    };
    return orchestrator.requestAppointment(input);
  };

  routes.POST["/api/appointment-requests/:id/withdraw"] = async (params) =>
    orchestrator.withdrawRequest(params.id ?? "");

  routes.POST["/api/appointments/:id/cancel"] = async (params) => allocator.cancelAppointment(params.id ?? "");

  routes.GET["/api/waitlist"] = async () => allocator.activeWaitlist();

  // Eligibility

  routes.POST["/api/eligibility/check"] = async (_params, body) => {
    const forceRefresh = optionalBoolean(body, "forceRefresh");
    return verifier.verify(
      requireString(body, "patientId"),
      requireString(body, "payerId"),
      forceRefresh === undefined ? {} : { forceRefresh }
    );
  };

  routes.GET["/api/eligibility/:patientId/:payerId"] = async (params) => {
    const patientId = params.patientId ?? "";
    const payerId = params.payerId ?? "";
    return {
      current: await verifier.current(patientId, payerId),
      history: await verifier.history(patientId, payerId),
      log: await verifier.log(patientId, payerId),
    };
  };

  // Referrals

  routes.GET["/api/patients/:patientId/referrals"] = async (params) => referrals.list(params.patientId ?? "");

  routes.POST["/api/referrals"] = async (_params, body) => referrals.record(readReferral(body));

  // Prior authorization

  routes.POST["/api/pa-requests"] = async (_params, body) => {
    const appointmentId = optionalString(body, "appointmentId");
    const input: CreatePaRequestInput = {
      patientId: requireString(body, "patientId"),
      providerId: requireString(body, "providerId"),
      serviceCode: requireString(body, "serviceCode"),
      payerId: requireString(body, "payerId"),
      ...(appointmentId && { appointmentId }),
    };
    return paStateMachine.initiate(input);
  };

  routes.GET["/api/pa-requests/:id"] = async (params) => {
    const id = params.id ?? "";
    return {
      request: await paStateMachine.get(id),
      transitions: await paStateMachine.transitions(id),
    };
  };

  routes.POST["/api/pa-requests/:id/package"] = async (params, body) => {
    const reviewRequired = optionalBoolean(body, "reviewRequired");
    return paStateMachine.preparePackage(params.id ?? "", reviewRequired === undefined ? {} : { reviewRequired });
  };

  routes.POST["/api/packages/:id/review"] = async (params, body) =>
    builder.recordReview(params.id ?? "", {
      reviewer: requireString(body, "reviewer"),
      comments: requireString(body, "comments"),
    });

  routes.POST["/api/pa-requests/:id/submit"] = async (params) => paStateMachine.submit(params.id ?? "");

  routes.POST["/api/pa-requests/:id/resubmit"] = async (params, body) => {
    const id = params.id ?? "";
    const documentIds = optionalStringList(body, "documentIds");
    if (documentIds.length === 0) return paStateMachine.resubmit(id);

    const pa = await paStateMachine.get(id);
    const onFile = await findClinicalDocumentsForPatient(pa.patientId);
    const documents = documentIds.map((documentId) => {
      const doc = onFile.find((d) => d.id === documentId);
      if (!doc) throw new ValidationError(`Document ${documentId} is not on file for patient ${pa.patientId}`);
      return doc;
    });
    return paStateMachine.resubmit(id, documents);
  };

  routes.POST["/api/pa-requests/:id/decision"] = async (params, body) => {
    return paStateMachine.recordDecision(params.id ?? "", readDecision(body));
  };

  routes.GET["/api/rules/gaps"] = async () => resolver.gaps();

  // Staff alerts

  routes.GET["/api/alerts"] = async (_params, _body, query) => {
    const status = readAlertStatus(query);
    const patientId = query.get("patientId");
    return alerts.list({
      ...(status && { status }),
      ...(patientId && { patientId }),
    });
  };

  routes.POST["/api/alerts/:id/acknowledge"] = async (params) => alerts.acknowledge(params.id ?? "");

  routes.POST["/api/alerts/:id/resolve"] = async (params) => alerts.resolve(params.id ?? "");

  return routes;
}

// =============================================
// DISPATCH
// =============================================

function matchRoute(
  routes: Record<string, RouteHandler>,
  pathname: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const pathParts = pathname.split("/");

  for (const [pattern, handler] of Object.entries(routes)) {
    const patternParts = pattern.split("/");
    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    const match = patternParts.every((part, i) => {
      const actual = pathParts[i] ?? "";
      if (part.startsWith(":")) {
        params[part.slice(1)] = decodeURIComponent(actual);
        return true;
      }
      return part === actual;
    });

    if (match) return { handler, params };
  }

  return null;
}

function errorResponse(err: unknown): ApiResponse {
  if (err instanceof EngineError) {
    return {
      status: err.statusCode,
      body: { error: err.message, code: err.code, ...(err.details !== undefined && { details: err.details }) },
    };
  }
  console.error("[api] Unhandled error:", err);
  return { status: 500, body: { error: err instanceof Error ? err.message : "Internal server error" } };
}

/**
 * Route one request. Used by the HTTP server and directly by tests.
 */
export function createDispatcher(engine: Engine) {
  const routes = createRoutes(engine);

  return async function dispatch(method: string, target: string, body: Body = {}): Promise<ApiResponse> {
    const parsed = new URL(target, "http://localhost");
    const methodRoutes = method === "GET" || method === "POST" ? routes[method] : undefined;
    const route = methodRoutes ? matchRoute(methodRoutes, parsed.pathname) : null;
    if (!route) {
      return { status: 404, body: { error: "Not found" } };
    }

    try {
      const result = await route.handler(route.params, body, parsed.searchParams);
      return { status: 200, body: result };
    } catch (err) {
      return errorResponse(err);
    }
  };
}

/** Send JSON response with CORS headers */
function json(res: http.ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(JSON.stringify(data));
}

export function startServer(engine: Engine, port = engine.config.apiPort): http.Server {
  const dispatch = createDispatcher(engine);

  const server = http.createServer((req, res) => {
    // CORS preflight
    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    const method = req.method ?? "GET";
    const target = req.url ?? "/";
    console.log(`[api] ${method} ${target}`);

    const handle = async () => {
      const body = method === "GET" ? {} : await parseBody(req);
      const { status, body: payload } = await dispatch(method, target, body);
      json(res, payload, status);
    };
    handle().catch((err: unknown) => {
      const { status, body } = errorResponse(err);
      json(res, body, status);
    });
  });

  server.listen(port, () => {
    console.log(`API server running at http://localhost:${port}`);
  });

  return server;
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  createEngine(loadConfig())
    .then((engine) => startServer(engine))
    .catch((err: unknown) => {
      console.error("[api] Failed to start:", err);
      process.exit(1);
    });
}
