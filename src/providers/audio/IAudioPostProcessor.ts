/**
 * Audio Post-Processor Interface
 *
 * Turns raw synthesized audio into the playable target format and joins
 * playable files into one track.
 */

export interface IAudioPostProcessor {
  readonly name: string;

  /**
   * Re-encode and tempo-adjust one raw audio file
   */
  convert(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;

  /**
   * Concatenate playable files, in the given order, at audio level
   */
  concatenate(inputPaths: readonly string[], outputPath: string, signal?: AbortSignal): Promise<void>;
}
