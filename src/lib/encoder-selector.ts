/**
 * Encoder selection by requested mode and host availability
 */

import type { EncodingMode } from '../types/conversion';
import type {
  EncoderStrategy,
  EncoderStrategyOptions,
  StrategyMode,
} from './encoder-strategy';
import { EncoderUnavailableError } from './errors';
import { HardwareEncoder } from './hardware-encoder';
import { SoftwareEncoder } from './software-encoder';
import { logger } from './sentry';

const AUTO_ORDER: readonly StrategyMode[] = ['hardware', 'software'];

async function firstAvailable(
  strategies: readonly EncoderStrategy[],
  mode: StrategyMode,
): Promise<EncoderStrategy | null> {
  for (const strategy of strategies) {
    if (strategy.mode === mode && (await strategy.isAvailable())) {
      return strategy;
    }
  }
  return null;
}

/**
 * Pick the strategy that serves a request.
 * 'auto' prefers hardware and falls back to software; an explicit mode
 * only accepts strategies of that mode.
 */
export async function selectEncoder(
  mode: EncodingMode,
  strategies: readonly EncoderStrategy[],
): Promise<EncoderStrategy> {
  const candidates: readonly StrategyMode[] =
    mode === 'auto' ? AUTO_ORDER : [mode];

  for (const candidate of candidates) {
    const strategy = await firstAvailable(strategies, candidate);
    if (strategy) {
      if (mode === 'auto' && candidate !== AUTO_ORDER[0]) {
        logger.info(
          '[EncoderSelector] Hardware encoder unavailable, using software',
          { encoderName: strategy.encoderName },
        );
      }
      return strategy;
    }
  }

  throw new EncoderUnavailableError(
    mode === 'auto'
      ? 'No H.265 encoder available. Install FFmpeg with hevc_videotoolbox or libx265 support.'
      : `No ${mode} H.265 encoder available on this host`,
  );
}

/**
 * Owns one set of strategy instances, and therefore one availability cache
 */
export class EncoderSelector {
  readonly strategies: readonly EncoderStrategy[];

  constructor(strategies?: readonly EncoderStrategy[]) {
    this.strategies = strategies ?? createDefaultStrategies();
  }

  select(mode: EncodingMode): Promise<EncoderStrategy> {
    return selectEncoder(mode, this.strategies);
  }

  /**
   * Names of the encoders the host can run, in preference order
   */
  async availableEncoders(): Promise<string[]> {
    const available: string[] = [];
    for (const strategy of this.strategies) {
      if (await strategy.isAvailable()) {
        available.push(strategy.encoderName);
      }
    }
    return available;
  }
}

export function createDefaultStrategies(
  options: EncoderStrategyOptions = {},
): EncoderStrategy[] {
  return [new HardwareEncoder(options), new SoftwareEncoder(options)];
}
