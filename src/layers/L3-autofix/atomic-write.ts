import fs from 'fs';
import path from 'path';

/**
 * Replace `filePath` with `content` via a temporary sibling and a rename, so
 * an interrupted run leaves either the old file or the new one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  let mode: number | undefined;
  try {
    mode = fs.statSync(filePath).mode;
  } catch {
    mode = undefined; // new file
  }

  try {
    fs.writeFileSync(tmpPath, content, { encoding: 'utf-8', mode });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
