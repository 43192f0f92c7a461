/**
 * Error Registry for the assistant gateway.
 *
 * Standard error codes and messages, in the format [SERVICE]-[CATEGORY]-[CODE].
 *
 * Services:
 * - GW: Gateway (sessions, HTTP surface, inference relay)
 * - AG: Assistant tools
 */

/**
 * Failure kinds recovered at the orchestrator boundary.
 */
export type ErrorKind =
  | "SessionNotFound"
  | "ConversationNotFound"
  | "ToolNotFound"
  | "ToolValidationFailed"
  | "ToolConfirmationRequired"
  | "ToolDisabled"
  | "ToolExecutionFailed"
  | "InferenceUnavailable"
  | "PayloadTooLarge"
  | "InvalidRequest"
  | "RouteNotFound"
  | "RateLimited"
  | "Internal";

export interface ErrorDefinition {
  code: string;
  kind: ErrorKind;
  message: string;
  httpStatus: number;
  retryable?: boolean;
}

const ERROR_DEFINITIONS: Record<ErrorKind, ErrorDefinition> = {
  // Session
  SessionNotFound: { code: "GW-SESS-001", kind: "SessionNotFound", message: "Session not found", httpStatus: 404, retryable: true },
  ConversationNotFound: { code: "GW-SESS-004", kind: "ConversationNotFound", message: "Conversation not found", httpStatus: 500 },

  // Tool
  ToolExecutionFailed: { code: "AG-TOOL-001", kind: "ToolExecutionFailed", message: "Tool execution failed", httpStatus: 500 },
  ToolNotFound: { code: "AG-TOOL-002", kind: "ToolNotFound", message: "Tool not found", httpStatus: 404 },
  ToolConfirmationRequired: { code: "AG-TOOL-003", kind: "ToolConfirmationRequired", message: "Tool requires user confirmation", httpStatus: 409 },
  ToolValidationFailed: { code: "AG-TOOL-004", kind: "ToolValidationFailed", message: "Invalid tool parameters", httpStatus: 400 },
  ToolDisabled: { code: "AG-TOOL-005", kind: "ToolDisabled", message: "Tool is disabled", httpStatus: 403 },

  // API
  InferenceUnavailable: { code: "GW-API-001", kind: "InferenceUnavailable", message: "Inference backend unavailable", httpStatus: 503, retryable: true },
  RouteNotFound: { code: "GW-API-002", kind: "RouteNotFound", message: "Endpoint not found", httpStatus: 404 },
  InvalidRequest: { code: "GW-API-003", kind: "InvalidRequest", message: "Invalid request format", httpStatus: 400 },
  RateLimited: { code: "GW-API-004", kind: "RateLimited", message: "Too many requests", httpStatus: 429, retryable: true },
  PayloadTooLarge: { code: "GW-API-005", kind: "PayloadTooLarge", message: "Payload too large", httpStatus: 413 },

  // Internal
  Internal: { code: "GW-INT-001", kind: "Internal", message: "Internal server error", httpStatus: 500 },
};

export class GatewayError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly httpStatus: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message?: string, details?: Record<string, unknown>) {
    const def = ERROR_DEFINITIONS[kind];
    super(message ?? def.message);
    this.name = "GatewayError";
    this.code = def.code;
    this.kind = kind;
    this.httpStatus = def.httpStatus;
    this.retryable = def.retryable ?? false;
    this.details = details;
  }
}

export function isGatewayError(value: unknown): value is GatewayError {
  return value instanceof GatewayError;
}

/**
 * Classify any thrown value; unknown failures become `Internal`.
 */
export function toGatewayError(value: unknown): GatewayError {
  if (isGatewayError(value)) return value;
  const message = value instanceof Error ? value.message : String(value);
  return new GatewayError("Internal", message);
}

/**
 * Registry code for a failure kind, e.g. `AG-TOOL-003`.
 */
export function errorCode(kind: ErrorKind): string {
  return ERROR_DEFINITIONS[kind].code;
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/**
 * Lookup table for error definitions.
 */
export class ErrorRegistry {
  getDefinition(kind: ErrorKind): ErrorDefinition {
    return ERROR_DEFINITIONS[kind];
  }

  getByCode(code: string): ErrorDefinition | undefined {
    return Object.values(ERROR_DEFINITIONS).find((d) => d.code === code);
  }

  getAllDefinitions(): ErrorDefinition[] {
    return Object.values(ERROR_DEFINITIONS);
  }

  isRetryable(code: string): boolean {
    return this.getByCode(code)?.retryable ?? false;
  }
}
