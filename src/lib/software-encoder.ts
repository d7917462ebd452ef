/**
 * libx265 encoding (maps to -c:v libx265)
 */

import {
  DEFAULT_BIT_DEPTH,
  DEFAULT_PRESET,
  ENCODING_PRESETS,
  SOFTWARE_CRF_RANGE,
  type BitDepth,
  type ConversionRequest,
  type EncodingPreset,
} from '../types/conversion';
import { BaseEncoderStrategy, clampInteger } from './encoder-strategy';

/**
 * HDR10 signalling: BT.2020 primaries and matrix, PQ transfer, headers
 * repeated on every keyframe
 */
export const HDR_ARGS = [
  '-color_primaries',
  'bt2020',
  '-color_trc',
  'smpte2084',
  '-colorspace',
  'bt2020nc',
  '-x265-params',
  'hdr-opt=1:repeat-headers=1:colorprim=bt2020:transfer=smpte2084:colormatrix=bt2020nc',
] as const;

function isPreset(value: string): value is EncodingPreset {
  return (ENCODING_PRESETS as readonly string[]).includes(value);
}

export class SoftwareEncoder extends BaseEncoderStrategy {
  readonly mode = 'software';
  readonly encoderName = 'libx265';

  /**
   * CRF, 0-51, lower is better quality and larger output
   */
  resolveCrf(crf: number): number {
    return clampInteger(
      crf,
      SOFTWARE_CRF_RANGE.min,
      SOFTWARE_CRF_RANGE.max,
      SOFTWARE_CRF_RANGE.default,
    );
  }

  resolvePreset(preset: string): EncodingPreset {
    return isPreset(preset) ? preset : DEFAULT_PRESET;
  }

  resolveBitDepth(bitDepth: number): BitDepth {
    return bitDepth === 10 ? 10 : bitDepth === 8 ? 8 : DEFAULT_BIT_DEPTH;
  }

  protected buildVideoArgs(request: ConversionRequest): string[] {
    const bitDepth = this.resolveBitDepth(request.bitDepth);
    const args = [
      '-c:v',
      this.encoderName,
      '-crf',
      String(this.resolveCrf(request.crf)),
      '-preset',
      this.resolvePreset(request.preset),
      '-pix_fmt',
      bitDepth === 10 ? 'yuv420p10le' : 'yuv420p',
    ];

    if (bitDepth === 10 && request.hdr) {
      args.push(...HDR_ARGS);
    }

    return args;
  }
}
