/**
 * Shared constants for the assistant gateway.
 */

/** First message of every conversation. */
export const SYSTEM_PRIMER =
  "You are a helpful AI assistant with access to various tools. " +
  "You can browse the web, read and write files, and execute system commands. " +
  "Always ask for confirmation before performing potentially dangerous operations.";

/**
 * Tools that always need explicit confirmation, whatever their metadata says.
 * The parser applies this list even when the registry is unavailable.
 */
export const DANGEROUS_TOOLS: readonly string[] = ["write_file", "delete_file", "system_command"];

/** Default number of recent messages sent to inference per turn. */
export const DEFAULT_CONTEXT_MESSAGES = 10;

/** Timeout for inference health probes (3 seconds). */
export const INFERENCE_PROBE_TIMEOUT_MS = 3_000;

/** Interval between SSE keepalive comments (30 seconds). */
export const SSE_KEEPALIVE_MS = 30_000;
