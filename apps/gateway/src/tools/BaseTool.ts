/**
 * Base class for schema-described tools.
 *
 * A tool declares its parameters once, as a zod object; the published
 * parameter list, validation and coercion of parsed text arguments all
 * come from that schema.
 */
import { performance } from "node:perf_hooks";
import { z } from "zod";
import type { ParameterType, ToolMetadata, ToolParameter, ToolResult } from "@local-assistant/shared";
import { errorCode, errorMessage, isGatewayError } from "../monitoring/ErrorRegistry.js";
import type { Tool, ToolContext } from "./types.js";

export type ToolDefinition = Omit<ToolMetadata, "parameters">;

export abstract class BaseTool<S extends z.AnyZodObject> implements Tool {
  readonly metadata: ToolMetadata;

  protected constructor(
    definition: ToolDefinition,
    protected readonly schema: S,
  ) {
    this.metadata = { ...definition, parameters: describeParameters(schema) };
  }

  protected abstract run(params: z.infer<S>, context: ToolContext): Promise<unknown>;

  validate(parameters: Record<string, unknown>): string | null {
    const parsed = this.schema.safeParse(parameters);
    return parsed.success ? null : formatIssues(parsed.error);
  }

  async execute(context: ToolContext, parameters: Record<string, unknown>): Promise<ToolResult> {
    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);

    const parsed = this.schema.safeParse(parameters);
    if (!parsed.success) {
      return {
        success: false,
        output: null,
        error: formatIssues(parsed.error),
        executionTimeMs: elapsed(),
        metadata: { errorCode: errorCode("ToolValidationFailed") },
      };
    }

    try {
      const output = await this.run(parsed.data, context);
      return { success: true, output, error: null, executionTimeMs: elapsed(), metadata: {} };
    } catch (err) {
      return {
        success: false,
        output: null,
        error: errorMessage(err),
        executionTimeMs: elapsed(),
        metadata: { errorCode: isGatewayError(err) ? err.code : errorCode("ToolExecutionFailed") },
      };
    }
  }

  /**
   * Human-readable usage for GET /tools/:name.
   */
  getUsageHelp(): string {
    const { name, description, parameters, examples } = this.metadata;
    let help = `${name}: ${description}\n`;
    if (parameters.length > 0) {
      help += "\nParameters:\n";
      for (const p of parameters) {
        const flags = p.required ? "required" : `optional${p.default !== undefined ? `, default ${JSON.stringify(p.default)}` : ""}`;
        help += `  - ${p.name} (${p.type}, ${flags}): ${p.description}\n`;
      }
    }
    if (examples.length > 0) {
      help += "\nExamples:\n";
      for (const example of examples) {
        help += `  ${example}\n`;
      }
    }
    return help;
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "parameters"}: ${issue.message}`)
    .join("; ");
}

/**
 * Derive the published parameter list from a zod object, in key order.
 */
export function describeParameters(schema: z.AnyZodObject): ToolParameter[] {
  return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => describeField(name, field));
}

function describeField(name: string, field: z.ZodTypeAny): ToolParameter {
  let inner = field;
  let required = true;
  let defaultValue: unknown;

  for (;;) {
    if (inner instanceof z.ZodOptional) {
      required = false;
      inner = inner.unwrap();
    } else if (inner instanceof z.ZodDefault) {
      required = false;
      defaultValue = inner._def.defaultValue();
      inner = inner.removeDefault();
    } else {
      break;
    }
  }

  const parameter: ToolParameter = {
    name,
    type: parameterType(inner),
    description: field.description ?? inner.description ?? "",
    required,
  };
  if (defaultValue !== undefined) {
    parameter.default = defaultValue;
  }
  return parameter;
}

function parameterType(schema: z.ZodTypeAny): ParameterType {
  if (schema instanceof z.ZodNumber) return schema.isInt ? "integer" : "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (schema instanceof z.ZodArray) return "array";
  if (schema instanceof z.ZodObject) return "object";
  return "string";
}
