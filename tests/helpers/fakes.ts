import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { ITTSProvider, SynthesizeOptions } from '../../src/providers/tts/ITTSProvider';
import type { IAudioPostProcessor } from '../../src/providers/audio/IAudioPostProcessor';

export interface FakeTTSBehavior {
  /** Return true to make the call fail */
  fail?: (text: string, callNumber: number) => boolean;
  /** Milliseconds to wait before answering */
  delayMs?: (text: string) => number;
  onCall?: (text: string) => void;
}

/**
 * In-process speech backend: the "audio" is the text it was given.
 */
export class FakeTTSProvider implements ITTSProvider {
  readonly name = 'fake';
  calls: Array<{ text: string; options: SynthesizeOptions }> = [];
  started = 0;
  stopped = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behavior: FakeTTSBehavior = {}) {}

  async start(): Promise<void> {
    this.started++;
  }

  async stop(): Promise<void> {
    this.stopped++;
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    this.calls.push({ text, options });
    const callNumber = this.calls.length;
    this.behavior.onCall?.(text);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delayMs = this.behavior.delayMs?.(text) ?? 0;
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      if (this.behavior.fail?.(text, callNumber)) {
        throw new Error('backend unavailable');
      }
      return Buffer.from(`WAV[${text}]`);
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Prefixes converted files with "MP3:" and joins files byte-wise.
 */
export class FakePostProcessor implements IAudioPostProcessor {
  readonly name = 'fake';
  converted: string[] = [];
  concatenated: string[][] = [];
  failConvert = false;
  failConcatenate = false;
  /** Signal passed to each call, in call order */
  signals: Array<AbortSignal | undefined> = [];

  async convert(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    this.signals.push(signal);
    if (this.failConvert) {
      throw new Error('malformed input audio');
    }
    const raw = await fs.readFile(inputPath);
    await fs.writeFile(outputPath, Buffer.concat([Buffer.from('MP3:'), raw]));
    this.converted.push(outputPath);
  }

  async concatenate(inputPaths: readonly string[], outputPath: string, signal?: AbortSignal): Promise<void> {
    this.signals.push(signal);
    this.concatenated.push([...inputPaths]);
    if (this.failConcatenate) {
      await fs.writeFile(outputPath, 'half-written');
      throw new Error('concat failed');
    }
    const parts = await Promise.all(inputPaths.map((inputPath) => fs.readFile(inputPath)));
    await fs.writeFile(outputPath, Buffer.concat(parts));
  }
}

export interface Workspace {
  root: string;
  inputDir: string;
  outputDir: string;
  destinationDir: string;
}

export async function createWorkspace(): Promise<Workspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'md-narrator-'));
  return {
    root,
    inputDir: path.join(root, 'input'),
    outputDir: path.join(root, 'output'),
    destinationDir: path.join(root, 'dest')
  };
}

export async function removeWorkspace(workspace: Workspace): Promise<void> {
  await fs.rm(workspace.root, { recursive: true, force: true });
}

/**
 * "Line 1.\nLine 2.\n..." with `count` lines.
 */
export function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `Line ${i + 1}.\n`).join('');
}
