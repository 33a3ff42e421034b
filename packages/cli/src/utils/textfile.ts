import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Replace `path` with `content` in one step, so a textfile collector reading
 * the directory never sees a half-written file.
 */
export async function writeTextfile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const temp = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(temp, content, { encoding: 'utf8', mode: 0o644 });
    await rename(temp, path);
  } catch (err) {
    await rm(temp, { force: true });
    throw err;
  }
}
