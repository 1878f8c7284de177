import { realpathSync } from 'fs';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { pathToFileURL } from 'url';

/**
 * Ensures that the specified directories exist by creating them if they don't exist.
 * Creates all necessary parent directories recursively and processes all paths in parallel.
 *
 * @example
 * ```typescript
 * await ensureDirectories('results', 'data');
 * ```
 */
export async function ensureDirectories(...paths: string[]): Promise<void> {
  await Promise.all(
    paths.map(dir => mkdir(dir, { recursive: true }))
  );
}

/**
 * Replaces `filePath` with `content` so that readers see either the old file
 * or the new one, never a partial write. The temp file lives in the same
 * directory so the rename stays on one filesystem.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDirectories(dir);

  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * True when `moduleUrl` is the script node was started with. Symlinks in the
 * script path are resolved, as npm installs `bin` entries through one.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved = scriptPath;
  try {
    resolved = realpathSync(scriptPath);
  } catch {
    // missing script: compare the path as given
  }
  return moduleUrl === pathToFileURL(resolved).href;
}
