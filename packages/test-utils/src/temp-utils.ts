import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Run a callback with a file written into a fresh temporary directory.
 * The directory is removed afterwards.
 */
export async function withTempFile<T>(
  name: string,
  contents: string,
  callback: (path: string) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'pdu-cycle-test-'));

  try {
    const path = join(dir, name);
    await writeFile(path, contents, 'utf-8');
    return await callback(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
