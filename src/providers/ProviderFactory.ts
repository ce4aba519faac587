/**
 * Provider Factory
 *
 * Creates the synthesis backend, post-processor and player from the
 * environment configuration.
 */

import { DEFAULT_TTS_MODEL, outputDir, type Env } from '../config/env';
import { createLogger } from '../utils/logger';
import { ProviderRegistry } from './ProviderRegistry';
import type { ITTSProvider } from './tts/ITTSProvider';
import { CoquiTTSProvider } from './tts/CoquiTTSProvider';
import { DockerTTSProvider } from './tts/DockerTTSProvider';
import type { IAudioPostProcessor } from './audio/IAudioPostProcessor';
import { FfmpegPostProcessor } from './audio/FfmpegPostProcessor';
import type { IAudioPlayer } from './audio/IAudioPlayer';
import { FfplayPlayer } from './audio/FfplayPlayer';

const logger = createLogger({ service: 'ProviderFactory' });

export interface Providers {
  tts: ITTSProvider;
  postProcessor: IAudioPostProcessor;
  player: IAudioPlayer;
}

/**
 * Create Provider Registry with all TTS backends
 */
export function createProviderRegistry(env: Env): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.registerTTS('coqui', new CoquiTTSProvider(env.TTS_COQUI_URL));
  registry.registerTTS('docker', new DockerTTSProvider({
    container: env.TTS_DOCKER_CONTAINER,
    hostOutputDir: outputDir(env),
    containerOutputDir: env.TTS_DOCKER_OUTPUT_DIR,
    useCuda: env.TTS_DOCKER_USE_CUDA,
    dockerPath: env.DOCKER_PATH
  }));

  return registry;
}

/**
 * Settings that the selected backend cannot apply.
 * The Coqui server speaks with the model it was started with.
 */
export function ignoredSettings(env: Env): string[] {
  if (env.TTS_PROVIDER === 'coqui' && env.TTS_MODEL !== DEFAULT_TTS_MODEL) {
    return ['TTS_MODEL'];
  }
  return [];
}

export function createProviders(env: Env): Providers {
  const registry = createProviderRegistry(env);

  for (const setting of ignoredSettings(env)) {
    logger.warn(
      { setting, provider: env.TTS_PROVIDER },
      'Setting has no effect with this TTS provider; use TTS_PROVIDER=docker or restart the server with the model'
    );
  }

  return {
    tts: registry.getTTS(env.TTS_PROVIDER),
    postProcessor: new FfmpegPostProcessor({
      ffmpegPath: env.FFMPEG_PATH,
      tempo: env.AUDIO_TEMPO
    }),
    player: new FfplayPlayer(env.FFPLAY_PATH)
  };
}
