import { promises as fs } from 'fs';
import {
  CancelledError,
  DecodeError,
  PostProcessError,
  SynthesisError,
  describeChunk,
  errorMessage
} from '../errors';
import type { AudioSegment, Chunk } from '../models/Document';
import type { RetryConfig } from '../models/PipelineConfig';
import type { ITTSProvider, SynthesizeOptions } from '../providers/tts/ITTSProvider';
import type { IAudioPostProcessor } from '../providers/audio/IAudioPostProcessor';
import { readUtf8File } from '../utils/files';
import { createLogger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import type { ChunkArtifacts } from './ArtifactStore';
import { toNarrationText } from './NarrationPunctuator';

const logger = createLogger({ service: 'ChunkProcessor' });

export interface ChunkJob {
  chunk: Chunk;
  /** Number of chunks in the document */
  total: number;
  artifacts: ChunkArtifacts;
}

export interface ChunkProcessorOptions {
  tts: ITTSProvider;
  postProcessor: IAudioPostProcessor;
  voice: Pick<SynthesizeOptions, 'model' | 'speaker' | 'language'>;
  retry: RetryConfig;
}

/**
 * Markdown chunk in, one playable audio file out.
 *
 * The narration text and raw audio are removed once the playable file
 * exists. A chunk without narratable text yields no segment.
 */
export class ChunkProcessor {
  constructor(private readonly options: ChunkProcessorOptions) {}

  async process(job: ChunkJob, signal?: AbortSignal): Promise<AudioSegment | null> {
    const { chunk, total, artifacts } = job;
    const position = describeChunk(chunk.index, total);
    throwIfAborted(signal);

    let source: string;
    try {
      source = await readUtf8File(artifacts.source);
    } catch (error) {
      throw new DecodeError(`Could not read ${position} from ${artifacts.source}: ${errorMessage(error)}`, {
        chunkIndex: chunk.index,
        cause: error
      });
    }

    const narration = toNarrationText(source);
    if (narration.trim() === '') {
      logger.warn({ chunk: chunk.label }, 'Chunk has no narratable text, skipping');
      return null;
    }
    await fs.writeFile(artifacts.narration, narration, 'utf-8');

    logger.info({ chunk: chunk.label, total, characters: narration.length }, 'Synthesizing chunk');
    const audio = await this.synthesize(narration, chunk, position, signal);
    await fs.writeFile(artifacts.raw, audio);

    try {
      await this.options.postProcessor.convert(artifacts.raw, artifacts.audio, signal);
    } catch (error) {
      throwIfAborted(signal);
      throw new PostProcessError(`Audio conversion failed for ${position}: ${errorMessage(error)}`, {
        chunkIndex: chunk.index,
        cause: error
      });
    }

    await fs.rm(artifacts.narration, { force: true });
    await fs.rm(artifacts.raw, { force: true });

    return { chunkIndex: chunk.index, path: artifacts.audio };
  }

  private async synthesize(
    narration: string,
    chunk: Chunk,
    position: string,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const { tts, voice, retry } = this.options;

    try {
      return await withRetry(
        () => tts.synthesize(narration, { ...voice, signal }),
        {
          ...retry,
          signal,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { chunk: chunk.label, attempt, delayMs, error: errorMessage(error) },
              'Speech synthesis failed, retrying'
            );
          }
        }
      );
    } catch (error) {
      throwIfAborted(signal);
      throw new SynthesisError(`Speech synthesis failed for ${position} (${tts.name}): ${errorMessage(error)}`, {
        chunkIndex: chunk.index,
        cause: error
      });
    }
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
