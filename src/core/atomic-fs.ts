import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

/**
 * Write a file atomically using write-to-temp + rename.
 * A reader never observes a partially written manifest.
 */
export async function atomicWrite(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpFile = path.join(dir, `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(tmpFile, content, { mode: 0o644 });

  try {
    await fs.rename(tmpFile, filePath);
  } catch {
    // Cross-device fallback: copy + unlink
    await fs.copyFile(tmpFile, filePath);
    await fs.unlink(tmpFile);
  }
}
