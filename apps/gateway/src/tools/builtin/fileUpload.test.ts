import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileUploadTool } from './fileUpload.js';
import { createSandbox, createToolEnvironment, type TestSandbox } from '../../../test/utils.js';

const ctx = { sessionId: 'test-session' };
const fixedNow = () => new Date('2026-04-05T06:07:08Z');

describe('file_upload', () => {
  let sandbox: TestSandbox;

  beforeEach(async () => {
    sandbox = await createSandbox();
  });

  afterEach(async () => {
    await sandbox.cleanup();
  });

  it('should save decoded content under uploads with a timestamp prefix', async () => {
    const tool = new FileUploadTool(createToolEnvironment(sandbox.root), fixedNow);

    const result = await tool.execute(ctx, {
      filename: 'my data.csv',
      content: Buffer.from('a,b\n1,2').toString('base64'),
    });

    expect(result.output).toEqual({
      filename: 'my data.csv',
      savedAs: '20260405_060708_my_data.csv',
      path: 'uploads/20260405_060708_my_data.csv',
      size: 7,
    });
    await expect(
      fs.readFile(path.join(sandbox.root, 'uploads', '20260405_060708_my_data.csv'), 'utf8'),
    ).resolves.toBe('a,b\n1,2');
  });

  it('should strip directories from the supplied name', async () => {
    const tool = new FileUploadTool(createToolEnvironment(sandbox.root), fixedNow);

    const result = await tool.execute(ctx, { filename: '../../escape.txt', content: 'aGk=' });

    expect(result.output).toMatchObject({ savedAs: '20260405_060708_escape.txt', path: 'uploads/20260405_060708_escape.txt' });
  });

  it('should reject content over the size limit', async () => {
    const tool = new FileUploadTool(createToolEnvironment(sandbox.root, { maxFileSizeMb: 0.001 }), fixedNow);

    const result = await tool.execute(ctx, {
      filename: 'big.txt',
      content: Buffer.alloc(2000).toString('base64'),
    });

    expect(result.success).toBe(false);
    expect(result.metadata.errorCode).toBe('GW-API-005');
  });

  it('should reject a declared size over the limit', async () => {
    const tool = new FileUploadTool(createToolEnvironment(sandbox.root, { maxFileSizeMb: 0.001 }), fixedNow);

    const result = await tool.execute(ctx, { filename: 'small.txt', content: 'aGk=', size: '5000' });

    expect(result.error).toBe('small.txt is 5000 bytes; the limit is 1048 bytes');
  });

  it('should reject disallowed extensions', async () => {
    const tool = new FileUploadTool(createToolEnvironment(sandbox.root), fixedNow);

    const result = await tool.execute(ctx, { filename: 'payload.exe', content: 'aGk=' });

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^File type not allowed: payload\.exe/);
  });
});
