/**
 * VideoToolbox HEVC encoding (maps to -c:v hevc_videotoolbox)
 */

import {
  HARDWARE_QUALITY_RANGE,
  type ConversionRequest,
} from '../types/conversion';
import { BaseEncoderStrategy, clampInteger } from './encoder-strategy';

export class HardwareEncoder extends BaseEncoderStrategy {
  readonly mode = 'hardware';
  readonly encoderName = 'hevc_videotoolbox';

  /**
   * VideoToolbox quality, 1-100, higher is better
   */
  resolveQuality(quality: number): number {
    return clampInteger(
      quality,
      HARDWARE_QUALITY_RANGE.min,
      HARDWARE_QUALITY_RANGE.max,
      HARDWARE_QUALITY_RANGE.default,
    );
  }

  protected buildVideoArgs(request: ConversionRequest): string[] {
    return [
      '-c:v',
      this.encoderName,
      '-q:v',
      String(this.resolveQuality(request.quality)),
    ];
  }
}
