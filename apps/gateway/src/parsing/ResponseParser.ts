/**
 * Extracts tool calls written as `[TOOL: name(arguments)]` from model output.
 *
 * Parsing never throws. Arguments are split on top-level commas; each is
 * either positional or `name=value`, and positional values bind to the
 * tool's declared parameters in order. An unquoted value fills a slot after
 * the first only when the slot's declared type accepts it; otherwise, or when
 * unquoted values outnumber the slots, the whole positional text binds to the
 * first parameter. Any other ambiguity leaves the mapping empty and the
 * executor decides.
 */
import type { ParameterType, ToolCall } from "@local-assistant/shared";
import { DANGEROUS_TOOLS } from "../config/constants.js";

/**
 * Per-tool facts the parser consults. Built from the registry at runtime;
 * the default below covers the built-in tools when no registry is at hand.
 */
export interface ParsePolicy {
  /** Tools that always need confirmation */
  dangerousTools: ReadonlySet<string>;
  /** Declared parameters, in positional order */
  parameterOrder: ReadonlyMap<string, readonly PositionalParameter[]>;
}

export interface PositionalParameter {
  name: string;
  type: ParameterType;
}

const textParam = (name: string): PositionalParameter => ({ name, type: "string" });

export const DEFAULT_PARSE_POLICY: ParsePolicy = {
  dangerousTools: new Set(DANGEROUS_TOOLS),
  parameterOrder: new Map<string, readonly PositionalParameter[]>([
    ["read_file", [textParam("path")]],
    ["list_directory", [textParam("path")]],
    ["write_file", [textParam("path"), textParam("content")]],
    ["delete_file", [textParam("path")]],
    ["file_upload", [textParam("filename"), textParam("content"), { name: "size", type: "integer" }]],
    ["web_search", [textParam("query"), { name: "max_results", type: "integer" }]],
    ["system_command", [textParam("command")]],
    ["current_time", [textParam("timezone")]],
  ]),
};

const TOOL_PATTERN = /\[TOOL:\s*(\w+)\((.*?)\)\]/g;
const NAMED_ARGUMENT = /^(\w+)\s*=\s*([\s\S]*)$/;

export function parseToolCalls(text: string, policy: ParsePolicy = DEFAULT_PARSE_POLICY): ToolCall[] {
  const calls: ToolCall[] = [];

  for (const match of text.matchAll(TOOL_PATTERN)) {
    const toolName = match[1];
    calls.push({
      toolName,
      parameters: bindArguments(match[2], policy.parameterOrder.get(toolName)),
      requiresConfirmation: policy.dangerousTools.has(toolName),
    });
  }

  return calls;
}

/**
 * Whether any parsed call would stop the turn for confirmation.
 */
export function needsConfirmation(calls: readonly ToolCall[]): boolean {
  return calls.some((c) => c.requiresConfirmation);
}

export function bindArguments(
  raw: string,
  order: readonly PositionalParameter[] | undefined,
): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};
  if (raw.trim() === "") return parameters;

  const tokens = splitArguments(raw);
  const positional: string[] = [];
  for (const token of tokens) {
    const named = isQuoted(token) ? null : NAMED_ARGUMENT.exec(token);
    if (named) {
      parameters[named[1]] = unquote(named[2]);
    } else {
      positional.push(token);
    }
  }
  if (positional.length === 0) return parameters;

  const first = order?.[0];
  if (first === undefined || first.name in parameters) return {};

  const slots = positional.map((token, position) => {
    const slot = order?.[position];
    if (slot === undefined) return undefined;
    return position === 0 || isQuoted(token) || accepts(slot.type, token) ? slot : undefined;
  });

  if (slots.every((slot) => slot !== undefined)) {
    for (let i = 0; i < positional.length; i++) {
      const name = slots[i]?.name;
      if (name === undefined || name in parameters) return {};
      parameters[name] = unquote(positional[i]);
    }
    return parameters;
  }

  // Separately quoted values that do not fit are not one sentence.
  if (positional.some(isQuoted)) return {};

  parameters[first.name] = positional.length === tokens.length ? raw.trim() : positional.join(", ");
  return parameters;
}

/**
 * Whether an unquoted value reads as the declared type.
 */
function accepts(type: ParameterType, value: string): boolean {
  switch (type) {
    case "string":
      return true;
    case "integer":
      return /^-?\d+$/.test(value);
    case "number":
      return /^-?\d+(\.\d+)?$/.test(value);
    case "boolean":
      return value === "true" || value === "false";
    default:
      return false;
  }
}

/**
 * Split on commas outside quotes. Tokens come back trimmed.
 */
export function splitArguments(raw: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: string | null = null;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (quote) {
      current += ch;
      if (ch === "\\" && i + 1 < raw.length) {
        current += raw[++i];
      } else if (ch === quote) {
        quote = null;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ",") {
      tokens.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  tokens.push(current.trim());

  return tokens;
}

function isQuoted(value: string): boolean {
  return value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
}

/**
 * Strip one layer of surrounding quotes and resolve escapes inside them.
 */
function unquote(value: string): string {
  const trimmed = value.trim();
  if (!isQuoted(trimmed)) return trimmed;

  return trimmed
    .slice(1, -1)
    .replace(/\\(["'\\nt])/g, (_, ch: string) => (ch === "n" ? "\n" : ch === "t" ? "\t" : ch));
}
