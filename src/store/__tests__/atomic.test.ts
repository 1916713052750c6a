/**
 * Tests for atomic file operations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { atomicWrite, readBytes, safeReadFile } from '../atomic.js';
import { readJson } from '../json.js';
import { ToolError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('atomicWrite', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'mlproj-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes a file atomically', async () => {
    const filePath = join(tempDir, 'test.txt');
    await atomicWrite(filePath, 'hello world');
    const content = await readFile(filePath, 'utf8');
    expect(content).toBe('hello world');
  });

  it('creates parent directories if needed', async () => {
    const filePath = join(tempDir, 'nested', 'dir', 'test.txt');
    await atomicWrite(filePath, 'nested content');
    const content = await readFile(filePath, 'utf8');
    expect(content).toBe('nested content');
  });

  it('writes buffers byte for byte', async () => {
    const filePath = join(tempDir, 'bytes.bin');
    await atomicWrite(filePath, Buffer.from([0xe9, 0x00, 0xff]));
    expect([...(await readFile(filePath))]).toEqual([0xe9, 0x00, 0xff]);
  });

  it('overwrites existing files', async () => {
    const filePath = join(tempDir, 'test.txt');
    await atomicWrite(filePath, 'first');
    await atomicWrite(filePath, 'second');
    const content = await readFile(filePath, 'utf8');
    expect(content).toBe('second');
  });
});

describe('reading', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'mlproj-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('safeReadFile returns null for a missing file', async () => {
    expect(await safeReadFile(join(tempDir, 'missing.txt'))).toBeNull();
  });

  it('readBytes fails with NOT_FOUND for a missing file', async () => {
    const err = await readBytes(join(tempDir, 'missing.txt')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolError);
    expect(err instanceof ToolError && err.code).toBe(ExitCode.NOT_FOUND);
  });

  it('readJson parses a file', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWrite(filePath, '{"a":1}');
    expect(await readJson(filePath)).toEqual({ a: 1 });
  });

  it('readJson fails with VALIDATION_ERROR on invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await atomicWrite(filePath, '{oops');
    const err = await readJson(filePath).catch((e: unknown) => e);
    expect(err instanceof ToolError && err.code).toBe(ExitCode.VALIDATION_ERROR);
  });
});
