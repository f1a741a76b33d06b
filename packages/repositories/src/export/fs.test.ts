// Tests for the filesystem export writer

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createFilesystemExportWriter } from './fs.js';

describe('createFilesystemExportWriter', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'property-tracker-export-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates the export directory on first write', async () => {
    const directory = path.join(root, 'nested', 'exports');
    const writer = createFilesystemExportWriter(directory);

    const written = await writer.writeFile('result.csv', 'Metric,Value\n');

    expect(written).toBe(path.join(directory, 'result.csv'));
    expect(await fs.readFile(written, 'utf-8')).toBe('Metric,Value\n');
  });

  it('appends without truncating', async () => {
    const writer = createFilesystemExportWriter(root);

    await writer.appendFile('analysis_results.txt', 'first\n');
    const written = await writer.appendFile('analysis_results.txt', 'second\n');

    expect(await fs.readFile(written, 'utf-8')).toBe('first\nsecond\n');
  });
});
