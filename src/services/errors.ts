/**
 * Engine Errors
 *
 * Error taxonomy shared by the engine components and the HTTP layer.
 * `statusCode` is what the API responds with when the error escapes a route.
 */

export class EngineError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(400, "VALIDATION_ERROR", message, details);
  }
}

export class NotFoundError extends EngineError {
  constructor(resource: string, id?: string) {
    super(404, "NOT_FOUND", id ? `${resource} ${id} not found` : `${resource} not found`);
  }
}

export class BusinessRuleError extends EngineError {
  constructor(message: string, details?: unknown) {
    super(422, "BUSINESS_RULE_VIOLATION", message, details);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super(500, "CONFIG_ERROR", message);
  }
}

/**
 * No coverage could be presented for a (patient, payer) pair:
 * the payer failed and there is no earlier snapshot to fall back on.
 */
export class EligibilityUnavailableError extends EngineError {
  constructor(
    public patientId: string,
    public payerId: string,
    reason: string
  ) {
    super(503, "ELIGIBILITY_UNAVAILABLE", `Eligibility unavailable for patient ${patientId} with payer ${payerId}: ${reason}`);
  }
}

/**
 * A documentation package failed its submission checks.
 * `problems` lists what staff must fix.
 */
export class PackageNotReadyError extends EngineError {
  constructor(
    public packageId: string,
    public problems: string[]
  ) {
    super(422, "PACKAGE_NOT_READY", `Package ${packageId} is not ready: ${problems.join("; ")}`, { problems });
  }
}

/**
 * Lost race on a slot booking.
 */
export class SlotConflictError extends EngineError {
  constructor(providerId: string, date: string, time: string) {
    super(409, "SLOT_CONFLICT", `Slot ${providerId} ${date} ${time} is no longer open`);
  }
}

export class MaxInfoRequestsExceededError extends EngineError {
  constructor(paRequestId: string, maxInfoRequests: number) {
    super(422, "MAX_INFO_REQUESTS_EXCEEDED", `PA request ${paRequestId} exceeded ${maxInfoRequests} requests for more information`);
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(paRequestId: string, from: string, to: string) {
    super(409, "INVALID_TRANSITION", `PA request ${paRequestId} cannot move from ${from} to ${to}`, { from, to });
  }
}

/**
 * Every submission channel failed; staff must phone the payer.
 */
export class SubmissionFailedError extends EngineError {
  constructor(paRequestId: string, reasons: string[]) {
    super(502, "SUBMISSION_FAILED", `PA request ${paRequestId} could not be submitted: ${reasons.join("; ")}`, { reasons });
  }
}

/**
 * Failure at the payer connector boundary.
 * Transient failures (network, timeout, 5xx) are retried; others are not.
 */
export class PayerConnectorError extends Error {
  constructor(
    message: string,
    public code: string,
    public transient: boolean,
    public rawResponse?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConnectorTimeoutError extends PayerConnectorError {
  constructor(timeoutMs: number) {
    super(`Payer did not respond within ${timeoutMs}ms`, "TIMEOUT", true);
  }
}

/**
 * Normalize anything thrown by a connector into a PayerConnectorError.
 * Unknown errors are treated as transient network failures.
 */
export function toConnectorError(err: unknown): PayerConnectorError {
  if (err instanceof PayerConnectorError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PayerConnectorError(message, "NETWORK_ERROR", true);
}
