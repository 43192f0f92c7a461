import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { ConfigSchema, type Config } from "./schema.js";

type PlainObject = Record<string, unknown>;

export interface LoadConfigOptions {
  /** YAML file to read; defaults to $ASSISTANT_CONFIG or config/default-config.yaml */
  configPath?: string;
  /** Environment used for overrides (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function expandHome(p: string): string {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readYamlIfExists(filePath: string): Promise<PlainObject> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isPlainObject(err) && err.code === "ENOENT") return {};
    throw err;
  }
  const parsed: unknown = YAML.parse(text);
  return isPlainObject(parsed) ? parsed : {};
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return out;
}

function setPath(target: PlainObject, dotted: string, value: unknown): void {
  const keys = dotted.split(".");
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isPlainObject(next)) {
      node = next;
    } else {
      const created: PlainObject = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

/**
 * Parse a list-valued env var: comma separated, optionally quoted, or a JSON array.
 */
export function parseList(raw: string): string[] {
  let v = raw.trim();
  if (v.length >= 2 && (v[0] === '"' || v[0] === "'") && v[v.length - 1] === v[0]) {
    v = v.slice(1, -1);
  }
  if (v.startsWith("[") && v.endsWith("]")) {
    try {
      const parsed: unknown = JSON.parse(v);
      if (Array.isArray(parsed)) return parsed.map(String);
    } catch {
      // not JSON, fall through to comma splitting
    }
  }
  return v.split(",").map((item) => item.trim()).filter(Boolean);
}

function parseBool(raw: string): boolean {
  return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

type EnvKind = "string" | "number" | "boolean" | "list";

const ENV_OVERRIDES: Array<[string, string, EnvKind]> = [
  ["HOST", "server.host", "string"],
  ["PORT", "server.port", "number"],
  ["DEBUG", "server.debug", "boolean"],
  ["CORS_ORIGINS", "server.corsOrigins", "list"],
  ["OLLAMA_HOST", "inference.host", "string"],
  ["DEFAULT_MODEL", "inference.model", "string"],
  ["TEMPERATURE", "inference.temperature", "number"],
  ["MAX_TOKENS", "inference.maxTokens", "number"],
  ["SESSION_TIMEOUT_MINUTES", "sessions.timeoutMinutes", "number"],
  ["SANDBOX_PATH", "tools.sandboxPath", "string"],
  ["MAX_FILE_SIZE_MB", "tools.maxFileSizeMb", "number"],
  ["ALLOWED_FILE_EXTENSIONS", "tools.allowedExtensions", "list"],
  ["ENABLE_SYSTEM_COMMANDS", "tools.systemCommands.enabled", "boolean"],
  ["ALLOWED_COMMANDS", "tools.systemCommands.allowedCommands", "list"],
  ["COMMAND_TIMEOUT", "tools.systemCommands.timeoutSeconds", "number"],
  ["RATE_LIMIT_REQUESTS", "rateLimit.maxRequests", "number"],
  ["RATE_LIMIT_WINDOW", "rateLimit.windowSeconds", "number"],
  ["LOG_LEVEL", "logging.level", "string"],
];

function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const out: PlainObject = {};
  for (const [name, target, kind] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined || raw === "") continue;
    switch (kind) {
      case "number":
        setPath(out, target, Number(raw));
        break;
      case "boolean":
        setPath(out, target, parseBool(raw));
        break;
      case "list":
        setPath(out, target, parseList(raw));
        break;
      default:
        setPath(out, target, name === "LOG_LEVEL" ? raw.toLowerCase() : raw);
    }
  }
  return out;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const filePath = expandHome(
    options.configPath ??
      env.ASSISTANT_CONFIG ??
      path.resolve(process.cwd(), "config/default-config.yaml"),
  );

  const fromFile = await readYamlIfExists(filePath);
  const merged = deepMerge(fromFile, envOverrides(env));

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid config\n${message}`);
  }
  return parsed.data;
}
