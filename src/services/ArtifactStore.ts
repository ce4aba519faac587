import { promises as fs } from 'fs';
import path from 'path';
import type { Chunk } from '../models/Document';
import type { PipelineConfig } from '../models/PipelineConfig';
import { escapeRegExp, moveFile } from '../utils/files';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ArtifactStore' });

export type ArtifactDirectories = Pick<PipelineConfig, 'inputDir' | 'outputDir' | 'destinationDir'>;

export interface ChunkArtifacts {
  /** Markdown the chunk is read from */
  source: string;
  narration: string;
  raw: string;
  audio: string;
}

/**
 * File layout of one document's run.
 *
 * input/   <name>-part-00000.md          chunk sources
 * output/  <name>-part-00000.{txt,wav,mp3} per-chunk intermediates
 * output/  <name>.mp3                    final track before publishing
 *
 * A document that is not chunked uses `<name>` instead of
 * `<name>-part-<label>` and is read straight from its source file.
 */
export class ArtifactStore {
  private readonly chunkPattern: RegExp;
  private readonly audioPattern: RegExp;

  constructor(
    private readonly dirs: ArtifactDirectories,
    readonly documentName: string
  ) {
    const name = escapeRegExp(documentName);
    this.chunkPattern = new RegExp(`^${name}(-part-\\d+\\.(md|txt|wav|mp3)|\\.(txt|wav|partial\\.mp3))$`);
    this.audioPattern = new RegExp(`^${name}-part-\\d+\\.mp3$`);
  }

  get finalTrackPath(): string {
    return path.join(this.dirs.outputDir, `${this.documentName}.mp3`);
  }

  get mergeTempPath(): string {
    return path.join(this.dirs.outputDir, `${this.documentName}.partial.mp3`);
  }

  get publishedPath(): string {
    return path.join(this.dirs.destinationDir, `${this.documentName}.mp3`);
  }

  chunkSourcePath(chunk: Chunk): string {
    return path.join(this.dirs.inputDir, `${this.documentName}-part-${chunk.label}.md`);
  }

  /**
   * @param sourcePath - Set for an unchunked document: the input file itself
   */
  chunkArtifacts(chunk: Chunk, sourcePath?: string): ChunkArtifacts {
    const base = sourcePath === undefined
      ? `${this.documentName}-part-${chunk.label}`
      : this.documentName;
    const outputBase = path.join(this.dirs.outputDir, base);

    return {
      source: sourcePath ?? this.chunkSourcePath(chunk),
      narration: `${outputBase}.txt`,
      raw: `${outputBase}.wav`,
      audio: `${outputBase}.mp3`
    };
  }

  async prepare(): Promise<void> {
    await fs.mkdir(this.dirs.inputDir, { recursive: true });
    await fs.mkdir(this.dirs.outputDir, { recursive: true });
    await fs.mkdir(this.dirs.destinationDir, { recursive: true });
  }

  async writeChunkSource(chunk: Chunk): Promise<string> {
    const target = this.chunkSourcePath(chunk);
    await fs.writeFile(target, chunk.text, 'utf-8');
    return target;
  }

  /**
   * Removes every chunk intermediate of this document from the input and
   * output areas. The final track is left alone.
   */
  async clearChunkArtifacts(): Promise<number> {
    let removed = 0;
    for (const dir of [this.dirs.inputDir, this.dirs.outputDir]) {
      const entries = await fs.readdir(dir);
      for (const entry of entries) {
        if (this.chunkPattern.test(entry)) {
          await fs.rm(path.join(dir, entry), { force: true });
          removed++;
        }
      }
    }
    if (removed > 0) {
      logger.debug({ document: this.documentName, removed }, 'Removed chunk artifacts');
    }
    return removed;
  }

  /**
   * Chunk audio files currently in the output area, in lexicographic order.
   */
  async listChunkAudio(): Promise<string[]> {
    const entries = await fs.readdir(this.dirs.outputDir);
    return entries
      .filter((entry) => this.audioPattern.test(entry))
      .sort()
      .map((entry) => path.join(this.dirs.outputDir, entry));
  }

  /**
   * Moves the final track into the destination directory.
   */
  async publish(): Promise<string> {
    const from = path.resolve(this.finalTrackPath);
    const to = path.resolve(this.publishedPath);
    if (from !== to) {
      await moveFile(from, to);
    }
    return to;
  }
}
