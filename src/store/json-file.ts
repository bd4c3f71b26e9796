import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

/**
 * Read and parse a JSON file. Returns undefined when the file does not exist;
 * any other read or parse failure is thrown.
 */
export async function loadJsonFile(pathname: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(pathname, 'utf8');
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw e;
  }
  return JSON.parse(raw) as unknown;
}

export async function saveJsonFile(pathname: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(pathname), { recursive: true, mode: 0o700 });
  // Atomic write: write to temp file then rename (rename is atomic on POSIX)
  const tmp = `${pathname}.tmp.${process.pid}`;
  await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, { encoding: 'utf8', mode: 0o600 });
  await rename(tmp, pathname);
}
