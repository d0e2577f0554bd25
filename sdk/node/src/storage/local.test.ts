import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LocalStorage } from './local';

describe('LocalStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stackreport-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report as <name>.<extension>', async () => {
    const storage = new LocalStorage({ outputPath: dir });

    const location = await storage.write(
      'abc123',
      'html',
      '<h1>Report</h1>',
      'text/html; charset=utf-8',
    );

    expect(location).toBe(join(dir, 'abc123.html'));
    await expect(readFile(location, 'utf-8')).resolves.toBe('<h1>Report</h1>');
  });

  it('creates the output directory', async () => {
    const outputPath = join(dir, 'nested', 'reports');
    const storage = new LocalStorage({ outputPath });

    const location = await storage.write(
      'def456',
      'json',
      '{}',
      'application/json',
    );

    expect(location).toBe(join(outputPath, 'def456.json'));
    await expect(readFile(location, 'utf-8')).resolves.toBe('{}');
  });
});
