/**
 * Monitoring module: inference usage tracking and the error taxonomy.
 */

export {
  UsageTracker,
  type UsageRecord,
  type UsageStats,
  type TimeRange,
  type ModelStats,
} from "./UsageTracker.js";

export {
  ErrorRegistry,
  GatewayError,
  isGatewayError,
  toGatewayError,
  errorMessage,
  errorCode,
  type ErrorDefinition,
  type ErrorKind,
} from "./ErrorRegistry.js";
