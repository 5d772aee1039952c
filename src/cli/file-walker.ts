import fs from 'fs';
import path from 'path';
import { isAuditableFile } from '../layers/L0-unit-extractor';

const ALWAYS_SKIPPED = new Set(['node_modules', '__pycache__']);

/**
 * Every auditable file under `root`, sorted. Hidden entries, dependency
 * folders, and directories named in `ignoreDirs` are not entered. A file
 * path is returned as-is.
 */
export function collectSourceFiles(root: string, ignoreDirs: readonly string[] = []): string[] {
  const stat = fs.statSync(root);
  if (stat.isFile()) return [root];

  const ignored = new Set(ignoreDirs);
  const results: string[] = [];
  walkDir(root, ignored, results);
  return results.sort();
}

function walkDir(dir: string, ignored: Set<string>, results: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith('.') || ALWAYS_SKIPPED.has(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (ignored.has(entry.name)) continue;
      walkDir(fullPath, ignored, results);
    } else if (entry.isFile() && isAuditableFile(entry.name)) {
      results.push(fullPath);
    }
  }
}
