import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { scanInPlace } from '../../src/copier/index.js';
import { SourceNotFoundError } from '../../src/errors.js';
import { ReplacementRuleSet } from '../../src/replace/index.js';
import { output } from '../../src/utils/output.js';

const fooToBar = new ReplacementRuleSet([{ from: 'foo', to: 'bar' }]);

describe('InPlaceScanner', () => {
  let work: string;

  async function put(relativePath: string, content: string): Promise<void> {
    const path = join(work, relativePath);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }

  async function read(relativePath: string): Promise<string> {
    return readFile(join(work, relativePath), 'utf-8');
  }

  beforeEach(async () => {
    output.setLevel('quiet');
    work = await mkdtemp(join(tmpdir(), 'casecopy-scan-'));
    await mkdir(join(work, '.git'));
  });

  afterEach(async () => {
    output.reset();
    await rm(work, { recursive: true, force: true });
  });

  test('rewrites contents and renames entries deepest first', async () => {
    await put('proj/foo/foo-item.ts', 'FooItem foo');
    await put('proj/readme.md', 'FOO');

    const report = await scanInPlace({ paths: [join(work, 'proj')], rules: fooToBar });

    expect(report).toEqual({ modifiedCount: 2, renamedCount: 2, errors: [] });
    expect(await read('proj/bar/bar-item.ts')).toBe('BarItem bar');
    expect(await read('proj/readme.md')).toBe('BAR');
    expect(existsSync(join(work, 'proj/foo'))).toBe(false);
  });

  test('renames a root named on the command line', async () => {
    await put('foo/a.txt', 'x');

    const report = await scanInPlace({ paths: [join(work, 'foo')], rules: fooToBar });

    expect(report.renamedCount).toBe(1);
    expect(await read('bar/a.txt')).toBe('x');
  });

  test('leaves file names alone when file renaming is off', async () => {
    await put('proj/foo/foo.txt', 'foo');

    await scanInPlace({ paths: [join(work, 'proj')], rules: fooToBar, renameFiles: false });

    expect(await read('proj/bar/foo.txt')).toBe('bar');
  });

  test('reports a rename onto an existing entry', async () => {
    await put('proj/bar.txt', 'one');
    await put('proj/foo.txt', 'two');

    const report = await scanInPlace({ paths: [join(work, 'proj')], rules: fooToBar });

    expect(report.renamedCount).toBe(0);
    expect(report.errors).toEqual([
      {
        kind: 'DestinationCollision',
        path: join(work, 'proj/foo.txt'),
        message: `Cannot rename to ${join(work, 'proj/bar.txt')}: target already exists`,
      },
    ]);
    expect(await read('proj/bar.txt')).toBe('one');
  });

  test('skips ignored entries', async () => {
    await put('proj/.gitignore', '*.log\n');
    await put('proj/foo.log', 'foo');
    await put('proj/foo.txt', 'foo');

    const report = await scanInPlace({ paths: [join(work, 'proj')], rules: fooToBar });

    expect(report.modifiedCount).toBe(1);
    expect(await read('proj/foo.log')).toBe('foo');
    expect(await read('proj/bar.txt')).toBe('bar');
  });

  test('fails when a path is missing', async () => {
    await expect(scanInPlace({ paths: [join(work, 'missing')], rules: fooToBar })).rejects.toThrow(
      SourceNotFoundError,
    );
  });
});
