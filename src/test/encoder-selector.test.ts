/**
 * Encoder selector tests
 */

import { describe, it, expect } from 'vitest';
import {
  EncoderSelector,
  createDefaultStrategies,
  selectEncoder,
} from '@/lib/encoder-selector';
import type { EncoderStrategy, StrategyMode } from '@/lib/encoder-strategy';
import { EncoderUnavailableError } from '@/lib/errors';
import { HardwareEncoder } from '@/lib/hardware-encoder';
import { SoftwareEncoder } from '@/lib/software-encoder';
import { createFakeLauncher } from './helpers/fake-process';

function stubStrategy(
  mode: StrategyMode,
  encoderName: string,
  available: boolean,
): EncoderStrategy & { checks: number } {
  return {
    mode,
    encoderName,
    checks: 0,
    isAvailable() {
      this.checks++;
      return Promise.resolve(available);
    },
    buildInvocation() {
      return { command: 'ffmpeg', args: [], displayCommand: 'ffmpeg' };
    },
  };
}

describe('selectEncoder', () => {
  it('should prefer hardware in auto mode', async () => {
    const hardware = stubStrategy('hardware', 'hevc_videotoolbox', true);
    const software = stubStrategy('software', 'libx265', true);

    const selected = await selectEncoder('auto', [software, hardware]);

    expect(selected).toBe(hardware);
  });

  it('should fall back to software in auto mode', async () => {
    const hardware = stubStrategy('hardware', 'hevc_videotoolbox', false);
    const software = stubStrategy('software', 'libx265', true);

    const selected = await selectEncoder('auto', [hardware, software]);

    expect(selected).toBe(software);
  });

  it('should never fall back across an explicit mode', async () => {
    const hardware = stubStrategy('hardware', 'hevc_videotoolbox', false);
    const software = stubStrategy('software', 'libx265', true);

    await expect(
      selectEncoder('hardware', [hardware, software]),
    ).rejects.toBeInstanceOf(EncoderUnavailableError);
    expect(software.checks).toBe(0);
  });

  it('should pick the first available strategy of the requested mode', async () => {
    const first = stubStrategy('software', 'libx265', false);
    const second = stubStrategy('software', 'libx265_alt', true);

    const selected = await selectEncoder('software', [first, second]);

    expect(selected.encoderName).toBe('libx265_alt');
  });

  it('should fail with an availability error when nothing is installed', async () => {
    const strategies = [
      stubStrategy('hardware', 'hevc_videotoolbox', false),
      stubStrategy('software', 'libx265', false),
    ];

    const error = await selectEncoder('auto', strategies).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(EncoderUnavailableError);
    expect(error).toMatchObject({ kind: 'availability' });
  });
});

describe('EncoderSelector', () => {
  it('should create one hardware and one software strategy by default', () => {
    const strategies = createDefaultStrategies();

    expect(strategies).toHaveLength(2);
    expect(strategies[0]).toBeInstanceOf(HardwareEncoder);
    expect(strategies[1]).toBeInstanceOf(SoftwareEncoder);
  });

  it('should reuse cached availability across selections', async () => {
    const fake = createFakeLauncher({ encoders: ['libx265'] });
    const selector = new EncoderSelector(
      createDefaultStrategies({ launcher: fake.launcher }),
    );

    const first = await selector.select('auto');
    const second = await selector.select('auto');

    expect(first.encoderName).toBe('libx265');
    expect(second).toBe(first);
    // One listing per strategy instance
    expect(fake.encoderListings()).toHaveLength(2);
  });

  it('should list available encoders in preference order', async () => {
    const selector = new EncoderSelector([
      stubStrategy('hardware', 'hevc_videotoolbox', true),
      stubStrategy('software', 'libx265', false),
    ]);

    expect(await selector.availableEncoders()).toEqual(['hevc_videotoolbox']);
  });
});
