/**
 * Static tool discovery.
 *
 * Built-in tools are listed in a descriptor table instead of being found by
 * scanning the file system. Adding a tool means adding a descriptor here;
 * nothing else in the gateway changes.
 */
import { gatewayLogs } from "../logs/index.js";
import { errorMessage } from "../monitoring/ErrorRegistry.js";
import { CurrentTimeTool } from "./builtin/currentTime.js";
import { DeleteFileTool, ListDirectoryTool, ReadFileTool, WriteFileTool } from "./builtin/fileSystem.js";
import { FileUploadTool } from "./builtin/fileUpload.js";
import { SystemCommandTool } from "./builtin/systemCommand.js";
import { WebSearchTool } from "./builtin/webSearch.js";
import type { ToolRegistry } from "./ToolRegistry.js";
import type { Tool, ToolEnvironment } from "./types.js";

export interface ToolDescriptor {
  /** Name used in discovery logs; the registered name comes from the tool's metadata */
  id: string;
  create(env: ToolEnvironment): Tool;
}

export const BUILTIN_TOOLS: readonly ToolDescriptor[] = [
  { id: "read_file", create: (env) => new ReadFileTool(env) },
  { id: "list_directory", create: (env) => new ListDirectoryTool(env) },
  { id: "write_file", create: (env) => new WriteFileTool(env) },
  { id: "delete_file", create: (env) => new DeleteFileTool(env) },
  { id: "file_upload", create: (env) => new FileUploadTool(env) },
  { id: "web_search", create: (env) => new WebSearchTool(env) },
  { id: "system_command", create: (env) => new SystemCommandTool(env) },
  { id: "current_time", create: () => new CurrentTimeTool() },
];

export interface DiscoveryResult {
  registered: string[];
  failed: Array<{ id: string; error: string }>;
}

/**
 * Instantiate and register every descriptor. One failing tool is logged
 * and skipped; the rest still load.
 */
export function discoverTools(
  registry: ToolRegistry,
  env: ToolEnvironment,
  descriptors: readonly ToolDescriptor[] = BUILTIN_TOOLS,
): DiscoveryResult {
  const result: DiscoveryResult = { registered: [], failed: [] };

  for (const descriptor of descriptors) {
    try {
      const tool = descriptor.create(env);
      registry.register(tool);
      result.registered.push(tool.metadata.name);
    } catch (err) {
      const error = errorMessage(err);
      gatewayLogs.error("ToolDiscovery", `Error loading tool ${descriptor.id}: ${error}`);
      result.failed.push({ id: descriptor.id, error });
    }
  }

  gatewayLogs.info("ToolDiscovery", `Tool registry initialized with ${result.registered.length} tools`, {
    failed: result.failed.length,
  });
  return result;
}
