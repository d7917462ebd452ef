/**
 * Encoder strategy tests: argument construction and availability probing
 */

import { describe, it, expect } from 'vitest';
import { HardwareEncoder } from '@/lib/hardware-encoder';
import { HDR_ARGS, SoftwareEncoder } from '@/lib/software-encoder';
import {
  clampInteger,
  normalizeAudioMode,
  sanitizePath,
} from '@/lib/encoder-strategy';
import { hasEncoder } from '@/lib/ffmpeg-capabilities';
import type { ProcessLauncher } from '@/lib/process-runner';
import {
  createConversionRequest,
  type ConversionRequestInput,
} from '@/types/conversion';
import { FakeProcess, createFakeLauncher } from './helpers/fake-process';

function request(overrides: Partial<ConversionRequestInput> = {}) {
  return createConversionRequest({
    inputPath: '/videos/in.mov',
    outputPath: '/videos/in_h265.mp4',
    ...overrides,
  });
}

function valueAfter(
  args: readonly string[],
  flag: string,
): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

describe('HardwareEncoder', () => {
  it('should build the full VideoToolbox invocation', () => {
    const encoder = new HardwareEncoder({
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
    });
    const invocation = encoder.buildInvocation(request({ quality: 60 }));

    expect(invocation.command).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(invocation.args).toEqual([
      '-hide_banner',
      '-y',
      '-i',
      '/videos/in.mov',
      '-c:v',
      'hevc_videotoolbox',
      '-q:v',
      '60',
      '-tag:v',
      'hvc1',
      '-c:a',
      'copy',
      '-map_metadata',
      '0',
      '-movflags',
      '+faststart+use_metadata_tags',
      '/videos/in_h265.mp4',
    ]);
    expect(invocation.displayCommand).toBe(
      ['/opt/ffmpeg/bin/ffmpeg', ...invocation.args].join(' '),
    );
  });

  it('should clamp quality 500 to 100', () => {
    const invocation = new HardwareEncoder().buildInvocation(
      request({ quality: 500 }),
    );
    expect(valueAfter(invocation.args, '-q:v')).toBe('100');
    expect(invocation.args).not.toContain('500');
  });

  it('should clamp low, fractional and non-finite quality', () => {
    const encoder = new HardwareEncoder();
    expect(encoder.resolveQuality(0)).toBe(1);
    expect(encoder.resolveQuality(-20)).toBe(1);
    expect(encoder.resolveQuality(44.6)).toBe(45);
    expect(encoder.resolveQuality(Number.NaN)).toBe(45);
  });

  it('should use the requested audio codec', () => {
    const invocation = new HardwareEncoder().buildInvocation(
      request({ audioMode: 'aac' }),
    );
    expect(valueAfter(invocation.args, '-c:a')).toBe('aac');
  });
});

describe('SoftwareEncoder', () => {
  it('should build a libx265 invocation with defaults', () => {
    const invocation = new SoftwareEncoder().buildInvocation(request());

    expect(invocation.command).toBe('ffmpeg');
    expect(invocation.args).toEqual([
      '-hide_banner',
      '-y',
      '-i',
      '/videos/in.mov',
      '-c:v',
      'libx265',
      '-crf',
      '22',
      '-preset',
      'medium',
      '-pix_fmt',
      'yuv420p',
      '-tag:v',
      'hvc1',
      '-c:a',
      'copy',
      '-map_metadata',
      '0',
      '-movflags',
      '+faststart+use_metadata_tags',
      '/videos/in_h265.mp4',
    ]);
  });

  it('should fall back to the default preset for unknown names', () => {
    const invocation = new SoftwareEncoder().buildInvocation(
      request({ preset: 'ultrafast-typo' }),
    );
    expect(valueAfter(invocation.args, '-preset')).toBe('medium');
  });

  it('should keep a valid preset', () => {
    const invocation = new SoftwareEncoder().buildInvocation(
      request({ preset: 'veryslow' }),
    );
    expect(valueAfter(invocation.args, '-preset')).toBe('veryslow');
  });

  it('should clamp CRF to 0-51', () => {
    const encoder = new SoftwareEncoder();
    expect(encoder.resolveCrf(80)).toBe(51);
    expect(encoder.resolveCrf(-1)).toBe(0);
    expect(encoder.resolveCrf(Number.POSITIVE_INFINITY)).toBe(22);
  });

  it('should add HDR signalling for 10-bit HDR requests', () => {
    const invocation = new SoftwareEncoder().buildInvocation(
      request({ bitDepth: 10, hdr: true }),
    );

    expect(valueAfter(invocation.args, '-pix_fmt')).toBe('yuv420p10le');
    const start = invocation.args.indexOf('-color_primaries');
    expect(invocation.args.slice(start, start + HDR_ARGS.length)).toEqual([
      ...HDR_ARGS,
    ]);
  });

  it('should ignore HDR for 8-bit output', () => {
    const invocation = new SoftwareEncoder().buildInvocation(
      request({ bitDepth: 8, hdr: true }),
    );

    expect(valueAfter(invocation.args, '-pix_fmt')).toBe('yuv420p');
    expect(invocation.args).not.toContain('-x265-params');
  });

  it('should treat unsupported bit depths as 8-bit', () => {
    const invocation = new SoftwareEncoder().buildInvocation(
      request({ bitDepth: 12, hdr: true }),
    );
    expect(valueAfter(invocation.args, '-pix_fmt')).toBe('yuv420p');
  });
});

describe('availability probing', () => {
  it('should list encoders once per instance', async () => {
    const fake = createFakeLauncher({ encoders: ['libx265'] });
    const software = new SoftwareEncoder({ launcher: fake.launcher });

    expect(await software.isAvailable()).toBe(true);
    expect(await software.isAvailable()).toBe(true);
    expect(fake.encoderListings()).toHaveLength(1);
    expect(fake.encoderListings()[0].args).toEqual([
      '-hide_banner',
      '-encoders',
    ]);
  });

  it('should list encoders again from a new instance', async () => {
    const fake = createFakeLauncher({ encoders: ['libx265'] });

    await new HardwareEncoder({ launcher: fake.launcher }).isAvailable();
    await new HardwareEncoder({ launcher: fake.launcher }).isAvailable();

    expect(fake.encoderListings()).toHaveLength(2);
  });

  it('should report an encoder missing from the listing', async () => {
    const fake = createFakeLauncher({ encoders: ['libx265'] });
    const hardware = new HardwareEncoder({ launcher: fake.launcher });
    expect(await hardware.isAvailable()).toBe(false);
  });

  it('should report unavailable when ffmpeg cannot be launched', async () => {
    const launcher: ProcessLauncher = (command, args) => {
      const proc = new FakeProcess(command, args);
      proc.fail('ENOENT', `spawn ${command} ENOENT`);
      return proc;
    };
    const software = new SoftwareEncoder({ launcher });
    expect(await software.isAvailable()).toBe(false);
  });
});

describe('argument helpers', () => {
  it('should match encoder names as whole tokens', () => {
    const listing = ' V....D libx265_alpha  test\n V....D hevc_nvenc  test';
    expect(hasEncoder(listing, 'libx265')).toBe(false);
    expect(hasEncoder(listing, 'hevc_nvenc')).toBe(true);
  });

  it('should clamp integers and substitute the fallback', () => {
    expect(clampInteger(7.5, 1, 10, 5)).toBe(8);
    expect(clampInteger(Number.NaN, 1, 10, 5)).toBe(5);
  });

  it('should reject audio modes that are not plain tokens', () => {
    expect(normalizeAudioMode('libopus')).toBe('libopus');
    expect(normalizeAudioMode('aac -f null')).toBe('copy');
    expect(normalizeAudioMode('')).toBe('copy');
  });

  it('should strip null bytes from paths', () => {
    expect(sanitizePath('/videos/a\0b.mov')).toBe('/videos/ab.mov');
  });
});
