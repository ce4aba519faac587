import type { Chunk } from '../models/Document';

export const DEFAULT_MAX_LINES_PER_CHUNK = 20;
export const CHUNK_LABEL_WIDTH = 5;

const MAX_CHUNKS = 10 ** CHUNK_LABEL_WIDTH;

/**
 * Splits text into lines, each keeping its trailing newline.
 * A last line without a newline still counts.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function chunkLabel(index: number): string {
  return String(index).padStart(CHUNK_LABEL_WIDTH, '0');
}

/**
 * Partitions a document into chunks of at most `maxLines` lines.
 *
 * A document that fits is returned as a single chunk holding the exact
 * input. Otherwise every chunk has `maxLines` lines except possibly the
 * last, and joining the chunk texts in index order gives back the input.
 */
export function chunkDocument(text: string, maxLines: number = DEFAULT_MAX_LINES_PER_CHUNK): Chunk[] {
  if (!Number.isInteger(maxLines) || maxLines < 1) {
    throw new RangeError(`maxLines must be a positive integer, got ${maxLines}`);
  }

  const lines = splitLines(text);
  if (lines.length <= maxLines) {
    return [{ index: 0, label: chunkLabel(0), text, lineCount: lines.length }];
  }

  const chunkCount = Math.ceil(lines.length / maxLines);
  if (chunkCount > MAX_CHUNKS) {
    throw new RangeError(`Document needs ${chunkCount} chunks, at most ${MAX_CHUNKS} are supported`);
  }

  const chunks: Chunk[] = [];
  for (let index = 0; index < chunkCount; index++) {
    const slice = lines.slice(index * maxLines, (index + 1) * maxLines);
    chunks.push({
      index,
      label: chunkLabel(index),
      text: slice.join(''),
      lineCount: slice.length
    });
  }
  return chunks;
}
