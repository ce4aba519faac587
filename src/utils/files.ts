import { promises as fs } from 'fs';
import { TextDecoder } from 'util';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads a file as strict UTF-8 with line endings normalized to `\n`.
 * Throws on bytes that are not valid UTF-8.
 */
export async function readUtf8File(filePath: string): Promise<string> {
  const bytes = await fs.readFile(filePath);
  return utf8.decode(bytes).replace(/\r\n?/g, '\n');
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Renames a file, falling back to copy + delete across file systems.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(from, to);
    await fs.rm(from, { force: true });
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
