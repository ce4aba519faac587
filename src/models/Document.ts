/**
 * A Markdown source read from disk. Immutable once loaded.
 */
export interface NarrationDocument {
  /** Base name of the source path without extension */
  name: string;
  sourcePath: string;
  text: string;
  lineCount: number;
}

/**
 * A contiguous run of document lines, processed independently.
 */
export interface Chunk {
  index: number;
  /** Zero-padded index used in artifact names, e.g. "00002" */
  label: string;
  text: string;
  lineCount: number;
}

/**
 * Playable audio produced for one chunk.
 */
export interface AudioSegment {
  chunkIndex: number;
  path: string;
}
