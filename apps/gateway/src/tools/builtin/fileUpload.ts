import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { BaseTool } from "../BaseTool.js";
import type { ToolEnvironment } from "../types.js";
import { sanitizeFilename } from "../../utils/pathSecurity.js";
import { assertAllowedExtension, assertWithinSizeLimit, sandboxPath } from "./sandbox.js";

/** Sandbox subdirectory uploads are saved into */
export const UPLOAD_DIR = "uploads";

const FileUploadSchema = z.object({
  filename: z.string().min(1).describe("Original file name"),
  content: z.string().describe("File content, base64 encoded"),
  size: z.coerce.number().int().nonnegative().optional().describe("Declared size in bytes"),
});

export interface UploadedFile {
  filename: string;
  savedAs: string;
  /** Sandbox-relative path */
  path: string;
  size: number;
}

export class FileUploadTool extends BaseTool<typeof FileUploadSchema> {
  constructor(
    private readonly env: ToolEnvironment,
    private readonly now: () => Date = () => new Date(),
  ) {
    super(
      {
        name: "file_upload",
        description: "Save an uploaded file into the sandbox uploads folder",
        category: "file_system",
        dangerLevel: "low",
        requiresConfirmation: false,
        examples: ['[TOOL: file_upload(filename="data.csv", content="YSxiCjEsMg==")]'],
      },
      FileUploadSchema,
    );
  }

  protected async run(params: z.infer<typeof FileUploadSchema>): Promise<UploadedFile> {
    const data = Buffer.from(params.content, "base64");
    assertWithinSizeLimit(this.env.config, Math.max(data.length, params.size ?? 0), params.filename);

    const safeName = sanitizeFilename(params.filename);
    assertAllowedExtension(this.env.config, safeName);

    // Timestamp prefix keeps repeated uploads of one name apart
    const savedAs = `${timestampPrefix(this.now())}_${safeName}`;
    const relative = path.posix.join(UPLOAD_DIR, savedAs);
    const target = sandboxPath(this.env.sandboxRoot, relative);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);

    return { filename: params.filename, savedAs, path: relative, size: data.length };
  }
}

function timestampPrefix(date: Date): string {
  // YYYYMMDD_HHmmss, UTC
  return date.toISOString().slice(0, 19).replace(/-/g, "").replace(/:/g, "").replace("T", "_");
}
