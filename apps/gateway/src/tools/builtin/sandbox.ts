import type { ToolsConfig } from "../../config/schema.js";
import { GatewayError } from "../../monitoring/ErrorRegistry.js";
import { hasAllowedExtension, resolveSandboxPath } from "../../utils/pathSecurity.js";

/**
 * Resolve a tool-supplied path inside the sandbox or throw.
 */
export function sandboxPath(sandboxRoot: string, userPath: string): string {
  const result = resolveSandboxPath(sandboxRoot, userPath);
  if (!result.ok) {
    throw new GatewayError("ToolValidationFailed", result.error ?? `Invalid path: ${userPath}`, { path: userPath });
  }
  return result.fullPath;
}

export function assertAllowedExtension(config: ToolsConfig, filePath: string): void {
  if (!hasAllowedExtension(filePath, config.allowedExtensions)) {
    throw new GatewayError(
      "ToolValidationFailed",
      `File type not allowed: ${filePath} (allowed: ${config.allowedExtensions.join(", ")})`,
      { path: filePath },
    );
  }
}

export function maxFileBytes(config: ToolsConfig): number {
  return Math.floor(config.maxFileSizeMb * 1024 * 1024);
}

export function assertWithinSizeLimit(config: ToolsConfig, size: number, label: string): void {
  const limit = maxFileBytes(config);
  if (size > limit) {
    throw new GatewayError("PayloadTooLarge", `${label} is ${size} bytes; the limit is ${limit} bytes`, { size, limit });
  }
}
