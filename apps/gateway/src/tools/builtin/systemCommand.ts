/**
 * Allow-listed command execution inside the sandbox.
 *
 * Commands run through execFile, never a shell, so pipes, redirects and
 * substitutions are passed through as literal arguments. The executor keeps
 * this tool disabled unless `tools.systemCommands.enabled` is set.
 */
import { execFile } from "node:child_process";
import { z } from "zod";
import { BaseTool } from "../BaseTool.js";
import { GatewayError } from "../../monitoring/ErrorRegistry.js";
import type { ToolContext, ToolEnvironment } from "../types.js";

const SystemCommandSchema = z.object({
  command: z.string().trim().min(1).describe("Command line to run, e.g. `ls -la`"),
});

export interface CommandOutput {
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number;
}

const MAX_OUTPUT_BYTES = 1024 * 1024;

export class SystemCommandTool extends BaseTool<typeof SystemCommandSchema> {
  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "system_command",
        description: "Run an allow-listed system command in the sandbox",
        category: "system",
        dangerLevel: "high",
        requiresConfirmation: true,
        examples: ['[TOOL: system_command("ls -la")]'],
      },
      SystemCommandSchema,
    );
  }

  protected async run(params: z.infer<typeof SystemCommandSchema>, context: ToolContext): Promise<CommandOutput> {
    const [program, ...args] = splitCommandLine(params.command);
    const { allowedCommands, timeoutSeconds } = this.env.config.systemCommands;

    if (!program || !allowedCommands.includes(program)) {
      throw new GatewayError("ToolValidationFailed", `Command not allowed: ${program}`, {
        allowedCommands,
      });
    }

    return new Promise<CommandOutput>((resolve, reject) => {
      execFile(
        program,
        args,
        {
          cwd: this.env.sandboxRoot,
          timeout: timeoutSeconds * 1000,
          maxBuffer: MAX_OUTPUT_BYTES,
          windowsHide: true,
          signal: context.signal,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ command: params.command, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 });
            return;
          }
          if (typeof error.code === "number") {
            resolve({ command: params.command, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: error.code });
            return;
          }
          if (error.killed) {
            reject(new Error(`Command timed out after ${timeoutSeconds}s: ${params.command}`));
            return;
          }
          reject(error);
        },
      );
    });
  }
}

/**
 * Split a command line on whitespace, honouring single and double quotes.
 */
export function splitCommandLine(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: string | null = null;
  let hasToken = false;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      hasToken = true;
    } else if (/\s/.test(ch)) {
      if (hasToken) {
        tokens.push(current);
        current = "";
        hasToken = false;
      }
    } else {
      current += ch;
      hasToken = true;
    }
  }
  if (hasToken) tokens.push(current);

  return tokens;
}
