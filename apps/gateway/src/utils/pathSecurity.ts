/**
 * Sandbox path containment for the file tools.
 *
 * Uses path.resolve() for Windows-safe path traversal prevention.
 */

import path from "node:path";

export interface PathValidationResult {
  ok: boolean;
  fullPath: string;
  error?: string;
}

/**
 * Validate that a user-supplied path resolves within the sandbox root.
 *
 * @param basePath - The trusted sandbox directory
 * @param userPath - The untrusted path taken from a tool call
 */
export function resolveSandboxPath(basePath: string, userPath: string): PathValidationResult {
  if (!userPath) {
    return { ok: false, fullPath: "", error: "Missing path parameter" };
  }

  if (path.isAbsolute(userPath)) {
    return { ok: false, fullPath: "", error: `Access denied: absolute paths are not allowed (${userPath})` };
  }

  // Handles "..", "." and mixed separators
  const resolved = path.resolve(basePath, userPath);
  const normalBase = path.resolve(basePath);

  if (!resolved.startsWith(normalBase + path.sep) && resolved !== normalBase) {
    return { ok: false, fullPath: resolved, error: `Access denied: ${userPath} is outside the sandbox` };
  }

  return { ok: true, fullPath: resolved };
}

/**
 * Case-insensitive extension check. An empty allow-list permits everything.
 */
export function hasAllowedExtension(filePath: string, allowed: readonly string[]): boolean {
  if (allowed.length === 0) return true;
  const ext = path.extname(filePath).toLowerCase();
  return allowed.some((a) => a.toLowerCase() === ext);
}

/**
 * Reduce an uploaded file name to a safe basename.
 */
export function sanitizeFilename(name: string): string {
  const base = path.basename(name.replace(/\\/g, "/"));
  const cleaned = base.replace(/[^\w.-]/g, "_").replace(/^\.+/, "");
  return cleaned || "upload";
}
