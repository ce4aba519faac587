/**
 * Text-to-Speech Provider Interface
 *
 * Abstraction for speech synthesis backends (Coqui TTS server, Coqui CLI
 * inside a container, ...).
 */

export interface SynthesizeOptions {
  /** Model identifier, e.g. tts_models/en/vctk/vits */
  model: string;
  /** Speaker identifier of a multi-speaker model, e.g. p230 */
  speaker: string;
  language?: string;
  signal?: AbortSignal;
}

export interface ITTSProvider {
  /**
   * Provider name for logging/debugging
   */
  readonly name: string;

  /**
   * Synthesize text to audio
   * @returns WAV audio
   */
  synthesize(text: string, options: SynthesizeOptions): Promise<Buffer>;

  /**
   * Make the backend ready to take requests
   */
  start?(): Promise<void>;

  /**
   * Release the backend once a document is done
   */
  stop?(): Promise<void>;
}
