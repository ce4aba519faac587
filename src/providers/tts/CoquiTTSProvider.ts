/**
 * Coqui TTS Provider
 *
 * Uses a running Coqui TTS server (`TTS/server/server.py`).
 * @see https://github.com/coqui-ai/TTS
 *
 * API: GET /api/tts?text=...&speaker_id=...&language_id=...
 *
 * The server synthesizes with the model it was started with, so the
 * `model` option is only logged.
 */

import type { ITTSProvider, SynthesizeOptions } from './ITTSProvider';
import { withRetry } from '../../utils/retry';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'CoquiTTSProvider' });

export interface CoquiReadinessOptions {
  maxAttempts: number;
  baseDelayMs: number;
}

export class CoquiTTSProvider implements ITTSProvider {
  readonly name = 'coqui';
  private baseUrl: string;
  private readiness: CoquiReadinessOptions;

  constructor(
    baseUrl: string = 'http://localhost:5002',
    readiness: CoquiReadinessOptions = { maxAttempts: 5, baseDelayMs: 1000 }
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.readiness = readiness;
  }

  /**
   * Waits until the server answers on its index page.
   */
  async start(): Promise<void> {
    await withRetry(
      async () => {
        const response = await fetch(`${this.baseUrl}/`, { method: 'GET' });
        if (!response.ok) {
          throw new Error(`CoquiTTS server not ready: ${response.status} ${response.statusText}`);
        }
      },
      {
        ...this.readiness,
        onRetry: (_error, attempt, delayMs) => {
          logger.info({ attempt, delayMs, baseUrl: this.baseUrl }, 'Waiting for CoquiTTS server');
        }
      }
    );
    logger.debug({ baseUrl: this.baseUrl }, 'CoquiTTS server ready');
  }

  async synthesize(text: string, options: SynthesizeOptions): Promise<Buffer> {
    try {
      const params = new URLSearchParams({
        text,
        speaker_id: options.speaker,
        language_id: options.language ?? ''
      });

      logger.debug({ model: options.model, speaker: options.speaker, length: text.length }, 'Requesting speech');

      const response = await fetch(`${this.baseUrl}/api/tts?${params}`, {
        method: 'GET',
        signal: options.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`CoquiTTS API error: ${response.status} ${response.statusText} - ${errorText}`);
      }

      // Coqui returns WAV audio
      const arrayBuffer = await response.arrayBuffer();
      return Buffer.from(arrayBuffer);
    } catch (error) {
      if (error instanceof Error && (error.name === 'AbortError' || error.message.includes('CoquiTTS API error'))) {
        throw error;
      }
      throw new Error(`CoquiTTS synthesis failed: ${error instanceof Error ? error.message : 'Unknown error'}`, {
        cause: error
      });
    }
  }
}
