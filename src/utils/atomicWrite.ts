/**
 * Atomic Write Utilities
 *
 * Writes go to a temp file beside the target and are then renamed over it,
 * so a reader never sees a half-written file:
 * - Creates parent directories if needed
 * - Cleans up the temp file on any error
 * - Uses PID and timestamp in the temp filename to prevent collisions
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Atomically write content to a file.
 *
 * Buffers are written as-is; strings use the given encoding.
 *
 * @param targetPath - Path to the target file
 * @param content - Bytes or text to write
 * @param encoding - Character encoding for string content (default: 'utf-8')
 *
 * @example
 * ```typescript
 * await atomicWrite('/path/to/main.py', rebuiltBytes);
 * ```
 */
export async function atomicWrite(
  targetPath: string,
  content: string | Buffer,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = `${targetPath}.tmp.${Date.now()}.${process.pid}`;

  try {
    const dir = path.dirname(targetPath);
    await fs.promises.mkdir(dir, { recursive: true });

    if (typeof content === 'string') {
      await fs.promises.writeFile(tempPath, content, encoding);
    } else {
      await fs.promises.writeFile(tempPath, content);
    }

    // Keep the original file mode when overwriting (e.g. executable scripts)
    try {
      const { mode } = await fs.promises.stat(targetPath);
      await fs.promises.chmod(tempPath, mode);
    } catch {
      // Target does not exist yet
    }

    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    try {
      await fs.promises.unlink(tempPath);
    } catch {
      // Ignore cleanup errors (file may not exist if write failed early)
    }
    throw error;
  }
}

/**
 * Atomically write JSON content to a file.
 *
 * @param targetPath - Path to the target file
 * @param data - Data to serialize and write
 * @param pretty - Whether to pretty-print the JSON (default: true)
 */
export async function atomicWriteJson(
  targetPath: string,
  data: unknown,
  pretty: boolean = true
): Promise<void> {
  const content = pretty
    ? JSON.stringify(data, null, 2) + '\n'
    : JSON.stringify(data) + '\n';
  await atomicWrite(targetPath, content);
}
