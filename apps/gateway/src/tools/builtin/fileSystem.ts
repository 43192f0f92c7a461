/**
 * Sandboxed file tools: read, list, write and delete.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { BaseTool } from "../BaseTool.js";
import type { ToolEnvironment } from "../types.js";
import { assertAllowedExtension, assertWithinSizeLimit, sandboxPath } from "./sandbox.js";

const ReadFileSchema = z.object({
  path: z.string().min(1).describe("Path of the file, relative to the sandbox"),
});

const ListDirectorySchema = z.object({
  path: z.string().default(".").describe("Directory to list, relative to the sandbox"),
});

const WriteFileSchema = z.object({
  path: z.string().min(1).describe("Path of the file, relative to the sandbox"),
  content: z.string().default("").describe("Text to write"),
});

const DeleteFileSchema = z.object({
  path: z.string().min(1).describe("Path of the file, relative to the sandbox"),
});

export interface DirectoryEntry {
  name: string;
  type: "file" | "directory";
  size: number;
}

export class ReadFileTool extends BaseTool<typeof ReadFileSchema> {
  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "read_file",
        description: "Read the contents of a text file in the sandbox",
        category: "file_system",
        dangerLevel: "safe",
        requiresConfirmation: false,
        examples: ['[TOOL: read_file("notes.txt")]'],
      },
      ReadFileSchema,
    );
  }

  protected async run(params: z.infer<typeof ReadFileSchema>): Promise<string> {
    const target = sandboxPath(this.env.sandboxRoot, params.path);
    const stat = await fs.stat(target);
    if (!stat.isFile()) {
      throw new Error(`Not a file: ${params.path}`);
    }
    assertWithinSizeLimit(this.env.config, stat.size, params.path);
    return fs.readFile(target, "utf8");
  }
}

export class ListDirectoryTool extends BaseTool<typeof ListDirectorySchema> {
  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "list_directory",
        description: "List files and folders in a sandbox directory",
        category: "file_system",
        dangerLevel: "safe",
        requiresConfirmation: false,
        examples: ['[TOOL: list_directory("projects")]'],
      },
      ListDirectorySchema,
    );
  }

  protected async run(params: z.infer<typeof ListDirectorySchema>): Promise<DirectoryEntry[]> {
    const target = sandboxPath(this.env.sandboxRoot, params.path);
    const entries = await fs.readdir(target, { withFileTypes: true });

    const listing = await Promise.all(
      entries.map(async (entry): Promise<DirectoryEntry> => {
        const isDirectory = entry.isDirectory();
        const size = isDirectory ? 0 : (await fs.stat(path.join(target, entry.name))).size;
        return { name: entry.name, type: isDirectory ? "directory" : "file", size };
      }),
    );

    return listing.sort((a, b) => a.name.localeCompare(b.name));
  }
}

export class WriteFileTool extends BaseTool<typeof WriteFileSchema> {
  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "write_file",
        description: "Create or overwrite a text file in the sandbox",
        category: "file_system",
        dangerLevel: "medium",
        requiresConfirmation: true,
        examples: ['[TOOL: write_file(path="todo.md", content="- buy milk")]'],
      },
      WriteFileSchema,
    );
  }

  protected async run(params: z.infer<typeof WriteFileSchema>): Promise<string> {
    const target = sandboxPath(this.env.sandboxRoot, params.path);
    assertAllowedExtension(this.env.config, params.path);
    const bytes = Buffer.byteLength(params.content, "utf8");
    assertWithinSizeLimit(this.env.config, bytes, params.path);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, params.content, "utf8");
    return `Wrote ${bytes} bytes to ${params.path}`;
  }
}

export class DeleteFileTool extends BaseTool<typeof DeleteFileSchema> {
  constructor(private readonly env: ToolEnvironment) {
    super(
      {
        name: "delete_file",
        description: "Delete a file from the sandbox",
        category: "file_system",
        dangerLevel: "high",
        requiresConfirmation: true,
        examples: ['[TOOL: delete_file("old-notes.txt")]'],
      },
      DeleteFileSchema,
    );
  }

  protected async run(params: z.infer<typeof DeleteFileSchema>): Promise<string> {
    const target = sandboxPath(this.env.sandboxRoot, params.path);
    const stat = await fs.stat(target);
    if (!stat.isFile()) {
      throw new Error(`Not a file: ${params.path}`);
    }
    await fs.unlink(target);
    return `Deleted ${params.path}`;
  }
}
