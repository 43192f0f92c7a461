import { z } from "zod";

/**
 * Log levels understood by the gateway log buffer and pino.
 */
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

/**
 * System command tool configuration.
 * The tool stays registered when disabled; the executor refuses it.
 */
const SystemCommandsConfigSchema = z.object({
  enabled: z.boolean().default(false),
  /** First token of a command must be one of these */
  allowedCommands: z.array(z.string()).default(["dir", "ls", "echo", "cat", "type", "find", "grep"]),
  timeoutSeconds: z.number().int().positive().default(30),
});

/**
 * Web search tool configuration.
 * The endpoint must answer `?q=<query>&format=json` with an instant-answer document.
 */
const SearchConfigSchema = z.object({
  endpoint: z.string().default("https://api.duckduckgo.com/"),
  maxResults: z.number().int().positive().default(5),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const ConfigSchema = z.object({
  server: z.object({
    host: z.string().default("127.0.0.1"),
    port: z.number().int().default(8000),
    httpPath: z.string().default("/api"),
    wsPath: z.string().default("/ws"),
    /** Allowed CORS origins; empty allows any origin */
    corsOrigins: z.array(z.string()).default(["http://localhost:8000", "http://127.0.0.1:8000"]),
    /** Include internal error messages in 500 responses */
    debug: z.boolean().default(false),
  }).default({}),
  inference: z.object({
    host: z.string().default("http://localhost:11434"),
    model: z.string().default("mistral:latest"),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(2048),
    requestTimeoutMs: z.number().int().positive().default(120_000),
  }).default({}),
  sessions: z.object({
    timeoutMinutes: z.number().positive().default(60),
    /** Expiry sweep interval (default: 5 minutes) */
    sweepIntervalMs: z.number().int().positive().default(5 * 60 * 1000),
    /** Messages sent to inference per turn */
    contextMessages: z.number().int().positive().default(10),
  }).default({}),
  tools: z.object({
    sandboxPath: z.string().default("./sandbox"),
    maxFileSizeMb: z.number().positive().default(10),
    allowedExtensions: z
      .array(z.string())
      .default([".txt", ".md", ".json", ".csv", ".log", ".py", ".js", ".html", ".css"]),
    /** Tools refused by the executor regardless of confirmation */
    disabled: z.array(z.string()).default([]),
    /** Execute parsed calls immediately when none of them needs confirmation */
    autoExecuteSafe: z.boolean().default(false),
    systemCommands: SystemCommandsConfigSchema.default({}),
    search: SearchConfigSchema.default({}),
  }).default({}),
  rateLimit: z.object({
    maxRequests: z.number().int().positive().default(100),
    windowSeconds: z.number().int().positive().default(3600),
  }).default({}),
  logging: z.object({
    level: LogLevelSchema,
    /** Entries kept for /logs/recent */
    bufferSize: z.number().int().positive().default(1000),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ToolsConfig = Config["tools"];
export type SessionsConfig = Config["sessions"];
export type InferenceConfig = Config["inference"];
export type LogLevel = z.infer<typeof LogLevelSchema>;
