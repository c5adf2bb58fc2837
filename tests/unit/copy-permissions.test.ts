import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { executeCopy } from '../../src/copier/index.js';
import { ReplacementRuleSet } from '../../src/replace/index.js';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    chmod: async () => {
      throw new Error('EPERM: operation not permitted');
    },
  };
});

describe('CopyExecutor permission failures', () => {
  let work: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'casecopy-mode-'));
    await mkdir(join(work, '.git'));
    await mkdir(join(work, 'proj'));
    await writeFile(join(work, 'proj/a.txt'), 'foo');
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  test('keeps the copied file and reports the mode separately', async () => {
    const report = await executeCopy({
      sources: [join(work, 'proj')],
      destination: join(work, 'out'),
      rules: new ReplacementRuleSet([{ from: 'foo', to: 'bar' }]),
    });

    expect(report.copiedCount).toBe(1);
    expect(report.entries[0]?.target).toBe(join(work, 'out/a.txt'));
    expect(report.errors).toEqual([
      {
        kind: 'IOFailure',
        path: join(work, 'out/a.txt'),
        message: 'Failed to copy permissions: EPERM: operation not permitted',
      },
    ]);
    expect(await readFile(join(work, 'out/a.txt'), 'utf-8')).toBe('bar');
  });
});
