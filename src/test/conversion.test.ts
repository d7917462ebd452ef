/**
 * Unit tests for conversion types and defaults
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ENCODING,
  ENCODING_PRESETS,
  TERMINAL_STATUSES,
  createConversionRequest,
} from '@/types/conversion';

describe('Conversion Types', () => {
  describe('DEFAULT_ENCODING', () => {
    it('should have correct default values', () => {
      expect(DEFAULT_ENCODING).toEqual({
        mode: 'auto',
        quality: 45,
        crf: 22,
        preset: 'medium',
        bitDepth: 8,
        hdr: false,
        audioMode: 'copy',
      });
    });
  });

  describe('ENCODING_PRESETS', () => {
    it('should list presets from fastest to slowest', () => {
      expect(ENCODING_PRESETS[0]).toBe('ultrafast');
      expect(ENCODING_PRESETS[ENCODING_PRESETS.length - 1]).toBe('placebo');
      expect(ENCODING_PRESETS).toHaveLength(10);
    });
  });

  describe('TERMINAL_STATUSES', () => {
    it('should contain only finished states', () => {
      expect([...TERMINAL_STATUSES].sort()).toEqual([
        'cancelled',
        'failed',
        'succeeded',
      ]);
    });
  });

  describe('createConversionRequest', () => {
    it('should fill unspecified settings from defaults', () => {
      const request = createConversionRequest({
        inputPath: '/videos/in.mov',
        outputPath: '/videos/in_h265.mp4',
        preset: 'slow',
      });

      expect(request).toEqual({
        inputPath: '/videos/in.mov',
        outputPath: '/videos/in_h265.mp4',
        ...DEFAULT_ENCODING,
        preset: 'slow',
      });
    });

    it('should use the given defaults', () => {
      const request = createConversionRequest(
        { inputPath: '/videos/in.mov', outputPath: '/videos/out.mp4' },
        { ...DEFAULT_ENCODING, mode: 'hardware', quality: 70 },
      );

      expect(request.mode).toBe('hardware');
      expect(request.quality).toBe(70);
    });

    it('should produce an immutable request', () => {
      const request = createConversionRequest({
        inputPath: '/videos/in.mov',
        outputPath: '/videos/out.mp4',
      });
      expect(Object.isFrozen(request)).toBe(true);
    });
  });
});
