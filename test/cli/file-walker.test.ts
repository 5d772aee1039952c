import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { collectSourceFiles } from '../../src/cli/file-walker';
import { createTempDir, writeSource } from './helpers/cli-test-helpers';

describe('collectSourceFiles', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('returns a single file as-is', () => {
    const file = writeSource(tmpDir, 'only.py', '');
    expect(collectSourceFiles(file)).toEqual([file]);
  });

  it('walks directories and returns sorted Python files', () => {
    writeSource(tmpDir, 'b.py', '');
    writeSource(tmpDir, 'a.py', '');
    writeSource(tmpDir, 'pkg/c.py', '');
    writeSource(tmpDir, 'notes.md', '');
    expect(collectSourceFiles(tmpDir)).toEqual([
      path.join(tmpDir, 'a.py'),
      path.join(tmpDir, 'b.py'),
      path.join(tmpDir, 'pkg', 'c.py'),
    ]);
  });

  it('skips ignored, hidden and cache directories', () => {
    writeSource(tmpDir, 'keep.py', '');
    writeSource(tmpDir, 'tests/test_keep.py', '');
    writeSource(tmpDir, '.venv/lib.py', '');
    writeSource(tmpDir, '__pycache__/keep.py', '');
    writeSource(tmpDir, 'node_modules/x.py', '');
    expect(collectSourceFiles(tmpDir, ['tests'])).toEqual([path.join(tmpDir, 'keep.py')]);
  });

  it('matches ignored names at any depth', () => {
    writeSource(tmpDir, 'pkg/migrations/0001.py', '');
    writeSource(tmpDir, 'pkg/models.py', '');
    expect(collectSourceFiles(tmpDir, ['migrations'])).toEqual([path.join(tmpDir, 'pkg', 'models.py')]);
  });
});
