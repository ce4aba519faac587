/**
 * Docker TTS Provider
 *
 * Runs the Coqui `tts` command line inside an existing container through
 * `docker exec`. The container writes the WAV into a directory that is
 * mounted from the host, where it is read back and removed.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import type { ITTSProvider, SynthesizeOptions } from './ITTSProvider';
import { runCommand } from '../../utils/process';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'DockerTTSProvider' });

export interface DockerTTSProviderOptions {
  container: string;
  /** Host side of the shared output volume */
  hostOutputDir: string;
  /** Container side of the shared output volume */
  containerOutputDir: string;
  useCuda: boolean;
  dockerPath: string;
}

export class DockerTTSProvider implements ITTSProvider {
  readonly name = 'docker';
  private options: DockerTTSProviderOptions;

  constructor(options: DockerTTSProviderOptions) {
    this.options = options;
  }

  async start(): Promise<void> {
    await runCommand(this.options.dockerPath, ['container', 'start', this.options.container]);
    logger.info({ container: this.options.container }, 'TTS container started');
  }

  async stop(): Promise<void> {
    await runCommand(this.options.dockerPath, ['container', 'stop', this.options.container]);
    logger.info({ container: this.options.container }, 'TTS container stopped');
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    const fileName = `narration-${randomUUID()}.wav`;
    const hostPath = path.join(this.options.hostOutputDir, fileName);

    try {
      await runCommand(this.options.dockerPath, this.buildArgs(text, fileName, options), {
        signal: options.signal
      });
      return await fs.readFile(hostPath);
    } finally {
      await fs.rm(hostPath, { force: true });
    }
  }

  buildArgs(text: string, fileName: string, options: SynthesizeOptions): string[] {
    const args = [
      'exec', '-i', this.options.container,
      'tts',
      '--text', text,
      '--model_name', options.model,
      '--out_path', path.posix.join(this.options.containerOutputDir, fileName),
      '--speaker_idx', options.speaker,
      '--use_cuda', String(this.options.useCuda)
    ];
    if (options.language) {
      args.push('--language_idx', options.language);
    }
    return args;
  }
}
