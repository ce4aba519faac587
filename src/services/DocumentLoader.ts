import { promises as fs } from 'fs';
import path from 'path';
import { DecodeError, InputNotFoundError } from '../errors';
import type { NarrationDocument } from '../models/Document';
import { isErrnoException, readUtf8File } from '../utils/files';
import { splitLines } from './Chunker';

/**
 * Document name used for every artifact: base name without extension.
 */
export function documentName(sourcePath: string): string {
  return path.parse(sourcePath).name;
}

export async function loadDocument(sourcePath: string): Promise<NarrationDocument> {
  const resolved = path.resolve(sourcePath);

  let isFile: boolean;
  try {
    isFile = (await fs.stat(resolved)).isFile();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new InputNotFoundError(sourcePath);
    }
    throw error;
  }
  if (!isFile) {
    throw new InputNotFoundError(sourcePath);
  }

  let text: string;
  try {
    text = await readUtf8File(resolved);
  } catch (error) {
    throw new DecodeError(`Could not read ${sourcePath} as UTF-8 text`, { cause: error });
  }

  return {
    name: documentName(resolved),
    sourcePath: resolved,
    text,
    lineCount: splitLines(text).length
  };
}
