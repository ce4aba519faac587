import { promises as fs } from 'fs';
import type { IAudioPostProcessor } from './IAudioPostProcessor';
import { runCommand } from '../../utils/process';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'FfmpegPostProcessor' });

export interface FfmpegPostProcessorOptions {
  ffmpegPath?: string;
  /** atempo factor, 0.5 - 2.0; below 1 slows speech down */
  tempo?: number;
}

/**
 * Quotes a path for an ffmpeg concat list (`file '...'`).
 */
export function concatListEntry(filePath: string): string {
  return `file '${filePath.replace(/'/g, "'\\''")}'`;
}

export class FfmpegPostProcessor implements IAudioPostProcessor {
  readonly name = 'ffmpeg';
  private ffmpegPath: string;
  private tempo: number;

  constructor(options: FfmpegPostProcessorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.tempo = options.tempo ?? 0.78;
  }

  convertArgs(inputPath: string, outputPath: string): string[] {
    return [
      '-y',
      '-i', inputPath,
      '-filter:a', `atempo=${this.tempo}`,
      outputPath              // codec follows the extension (.mp3)
    ];
  }

  concatArgs(listPath: string, outputPath: string): string[] {
    return [
      '-y',
      '-f', 'concat',
      '-safe', '0',
      '-i', listPath,
      '-c', 'copy',           // no re-encode, container rebuilt by ffmpeg
      outputPath
    ];
  }

  async convert(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    await runCommand(this.ffmpegPath, this.convertArgs(inputPath, outputPath), { signal });
    logger.debug({ inputPath, outputPath, tempo: this.tempo }, 'Audio converted');
  }

  async concatenate(inputPaths: readonly string[], outputPath: string, signal?: AbortSignal): Promise<void> {
    const listPath = `${outputPath}.list.txt`;
    const list = inputPaths.map(concatListEntry).join('\n') + '\n';

    await fs.writeFile(listPath, list, 'utf-8');
    try {
      await runCommand(this.ffmpegPath, this.concatArgs(listPath, outputPath), { signal });
      logger.debug({ outputPath, parts: inputPaths.length }, 'Audio concatenated');
    } finally {
      await fs.rm(listPath, { force: true });
    }
  }
}
