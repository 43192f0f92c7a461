import { describe, it, expect, beforeEach } from 'vitest';
import { BUILTIN_TOOLS, discoverTools, type ToolDescriptor } from './discovery.js';
import { ToolRegistry } from './ToolRegistry.js';
import { gatewayLogs } from '../logs/index.js';
import { createToolEnvironment, EchoTool } from '../../test/utils.js';

describe('discoverTools', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    gatewayLogs.clear();
  });

  it('should register every built-in tool', () => {
    const result = discoverTools(registry, createToolEnvironment('/tmp/sandbox'));

    expect(result.failed).toEqual([]);
    expect(registry.names()).toEqual([
      'read_file',
      'list_directory',
      'write_file',
      'delete_file',
      'file_upload',
      'web_search',
      'system_command',
      'current_time',
    ]);
  });

  it('should mark exactly the dangerous built-ins as needing confirmation', () => {
    discoverTools(registry, createToolEnvironment('/tmp/sandbox'));

    const confirmed = registry.list().filter((m) => m.requiresConfirmation).map((m) => m.name);
    expect(confirmed).toEqual(['write_file', 'delete_file', 'system_command']);
  });

  it('should isolate a failing descriptor', () => {
    const broken: ToolDescriptor = {
      id: 'broken',
      create: () => {
        throw new Error('missing dependency');
      },
    };
    const descriptors: ToolDescriptor[] = [broken, { id: 'echo', create: () => new EchoTool() }];

    const result = discoverTools(registry, createToolEnvironment('/tmp/sandbox'), descriptors);

    expect(result).toEqual({ registered: ['echo'], failed: [{ id: 'broken', error: 'missing dependency' }] });
    expect(registry.names()).toEqual(['echo']);
    expect(gatewayLogs.getRecent(10, 'error').map((e) => e.message)).toEqual([
      'Error loading tool broken: missing dependency',
    ]);
  });

  it('should describe each built-in with at least one example', () => {
    expect(BUILTIN_TOOLS).toHaveLength(8);
    discoverTools(registry, createToolEnvironment('/tmp/sandbox'));

    for (const metadata of registry.list()) {
      expect(metadata.examples.length).toBeGreaterThan(0);
    }
  });
});
