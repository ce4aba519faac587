import { promises as fs } from 'fs';
import { CancelledError, DecodeError, MergeError, SynthesisError, errorMessage } from '../errors';
import type { AudioSegment, Chunk, NarrationDocument } from '../models/Document';
import {
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput
} from '../models/PipelineConfig';
import type { ITTSProvider } from '../providers/tts/ITTSProvider';
import type { IAudioPostProcessor } from '../providers/audio/IAudioPostProcessor';
import { createLogger } from '../utils/logger';
import { ArtifactStore } from './ArtifactStore';
import { chunkDocument } from './Chunker';
import { ChunkProcessor, type ChunkJob } from './ChunkProcessor';
import { loadDocument } from './DocumentLoader';

const logger = createLogger({ service: 'Assembler' });

export interface AssemblerDependencies {
  tts: ITTSProvider;
  postProcessor: IAudioPostProcessor;
}

export interface NarrateOptions {
  signal?: AbortSignal;
}

export interface NarrationResult {
  documentName: string;
  finalTrackPath: string;
  chunkCount: number;
  segmentCount: number;
}

/**
 * Narrates a Markdown file into one audio track.
 *
 * Chunks go through a pool of `concurrency` workers; segments are merged
 * by chunk index whatever order they finish in. The first chunk failure
 * stops new work and fails the whole document.
 *
 * Usage:
 * ```typescript
 * const assembler = new Assembler(
 *   { inputDir, outputDir, destinationDir: process.cwd(), model, speaker },
 *   { tts: new CoquiTTSProvider(), postProcessor: new FfmpegPostProcessor() }
 * );
 * const { finalTrackPath } = await assembler.narrate('notes.md');
 * ```
 */
export class Assembler {
  readonly config: PipelineConfig;
  private processor: ChunkProcessor;

  constructor(config: PipelineConfigInput, private readonly deps: AssemblerDependencies) {
    this.config = PipelineConfigSchema.parse(config);
    this.processor = new ChunkProcessor({
      tts: deps.tts,
      postProcessor: deps.postProcessor,
      voice: {
        model: this.config.model,
        speaker: this.config.speaker,
        language: this.config.language
      },
      retry: this.config.retry
    });
  }

  async narrate(inputPath: string, options: NarrateOptions = {}): Promise<NarrationResult> {
    const { signal } = options;
    const document = await loadDocument(inputPath);
    const store = new ArtifactStore(this.config, document.name);

    await store.prepare();
    await store.clearChunkArtifacts();

    const chunks = chunkDocument(document.text, this.config.maxLinesPerChunk);
    const jobs = await this.createJobs(document, chunks, store);

    logger.info(
      { document: document.name, lines: document.lineCount, chunks: chunks.length },
      'Processing document'
    );

    try {
      await this.startService();
      const results = await this.processChunks(jobs, signal);
      const segments = results.filter((segment): segment is AudioSegment => segment !== null);
      if (segments.length === 0) {
        throw new DecodeError(`${document.name} contains no narratable text`);
      }

      await this.merge(store, segments, chunks.length > 1, signal);
      const finalTrackPath = await store.publish();

      logger.info({ document: document.name, finalTrackPath }, 'Final audio file written');
      return {
        documentName: document.name,
        finalTrackPath,
        chunkCount: chunks.length,
        segmentCount: segments.length
      };
    } catch (error) {
      if (signal?.aborted) {
        await store.clearChunkArtifacts();
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      throw error;
    } finally {
      await this.stopService();
    }
  }

  private async createJobs(
    document: NarrationDocument,
    chunks: Chunk[],
    store: ArtifactStore
  ): Promise<ChunkJob[]> {
    if (chunks.length === 1) {
      const [chunk] = chunks;
      return [{ chunk, total: 1, artifacts: store.chunkArtifacts(chunk, document.sourcePath) }];
    }

    const jobs: ChunkJob[] = [];
    for (const chunk of chunks) {
      await store.writeChunkSource(chunk);
      jobs.push({ chunk, total: chunks.length, artifacts: store.chunkArtifacts(chunk) });
    }
    return jobs;
  }

  /**
   * Runs every job; results are stored at their chunk index.
   */
  private async processChunks(
    jobs: ChunkJob[],
    signal?: AbortSignal
  ): Promise<Array<AudioSegment | null>> {
    const results: Array<AudioSegment | null> = new Array<AudioSegment | null>(jobs.length).fill(null);
    const failures: Array<{ index: number; error: unknown }> = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (failures.length === 0 && next < jobs.length) {
        const job = jobs[next++];
        try {
          results[job.chunk.index] = await this.processor.process(job, signal);
        } catch (error) {
          failures.push({ index: job.chunk.index, error });
        }
      }
    };

    const slots = Math.min(this.config.concurrency, jobs.length);
    await Promise.all(Array.from({ length: slots }, () => worker()));

    if (failures.length > 0) {
      failures.sort((a, b) => a.index - b.index);
      const [first] = failures;
      logger.error(
        { chunk: first.index, error: errorMessage(first.error) },
        'Chunk failed, aborting document'
      );
      throw first.error;
    }
    return results;
  }

  /**
   * Builds the final track in the output area.
   * On failure the chunk files stay in place and no final track exists.
   */
  private async merge(
    store: ArtifactStore,
    segments: AudioSegment[],
    chunked: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    if (!chunked) {
      // The single segment already is `<name>.mp3`
      return;
    }

    const ordered = [...segments].sort((a, b) => a.chunkIndex - b.chunkIndex);
    const expected = ordered.map((segment) => segment.path);
    const listed = await store.listChunkAudio();
    if (listed.length !== expected.length || listed.some((file, i) => file !== expected[i])) {
      throw new MergeError(
        `Chunk audio files in the output area do not match chunk order for ${store.documentName}`
      );
    }

    logger.info({ document: store.documentName, segments: expected.length }, 'Merging audio chunks');
    const temp = store.mergeTempPath;
    try {
      await this.deps.postProcessor.concatenate(expected, temp, signal);
      await fs.rename(temp, store.finalTrackPath);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new MergeError(`Merging audio for ${store.documentName} failed: ${errorMessage(error)}`, {
        cause: error
      });
    }

    await store.clearChunkArtifacts();
  }

  private async startService(): Promise<void> {
    if (!this.deps.tts.start) {
      return;
    }
    try {
      await this.deps.tts.start();
    } catch (error) {
      throw new SynthesisError(`TTS backend ${this.deps.tts.name} is unavailable: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  private async stopService(): Promise<void> {
    if (!this.deps.tts.stop) {
      return;
    }
    try {
      await this.deps.tts.stop();
    } catch (error) {
      logger.warn({ provider: this.deps.tts.name, error: errorMessage(error) }, 'Failed to stop TTS backend');
    }
  }
}
