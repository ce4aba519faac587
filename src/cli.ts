import { ConfigurationError, loadEnv, pipelineConfigFromEnv, type Env } from './config/env';
import { NarrationError, errorMessage } from './errors';
import { createProviders } from './providers/ProviderFactory';
import { Assembler } from './services/Assembler';
import { logger, setLogLevel } from './utils/logger';

export const USAGE = [
  'Converts a markdown file to an audio file using TTS. The MP3 file is created in the current directory.',
  'Usage: md-narrator [-p] <input.md>',
  'Where:',
  '  <input.md>  The input markdown file to be converted to audio',
  '  -p          (Optional) play the audio file after generation',
  ''
].join('\n');

export interface CliOptions {
  inputPath: string;
  play: boolean;
}

/**
 * @returns null when no input file was given
 */
export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  let play = false;
  let inputPath: string | undefined;
  let positionalOnly = false;

  for (const arg of argv) {
    if (!positionalOnly && arg === '--') {
      positionalOnly = true;
    } else if (!positionalOnly && (arg === '-p' || arg === '--play')) {
      play = true;
    } else if (inputPath === undefined) {
      inputPath = arg;
    }
  }

  return inputPath ? { inputPath, play } : null;
}

/**
 * Runs the narrator and returns the process exit code.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (!options) {
    process.stderr.write(USAGE);
    return 1;
  }

  let env: Env;
  try {
    env = loadEnv();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ issues: error.issues }, 'Environment validation failed');
      process.stderr.write(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
  setLogLevel(env.LOG_LEVEL);

  const { tts, postProcessor, player } = createProviders(env);
  const assembler = new Assembler(pipelineConfigFromEnv(env), { tts, postProcessor });

  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, cancelling narration');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    logger.info({ input: options.inputPath, provider: tts.name }, 'Narrating document');
    const result = await assembler.narrate(options.inputPath, { signal: controller.signal });
    process.stdout.write(`Final audio file: ${result.finalTrackPath}\n`);

    if (options.play) {
      try {
        await player.play(result.finalTrackPath);
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Playback failed');
      }
    }
    return 0;
  } catch (error) {
    logger.error(
      {
        error: errorMessage(error),
        kind: error instanceof NarrationError ? error.kind : undefined,
        chunkIndex: error instanceof NarrationError ? error.chunkIndex : undefined
      },
      'Narration failed'
    );
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    return 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
