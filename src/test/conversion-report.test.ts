/**
 * Batch report tests
 */

import { describe, it, expect } from 'vitest';
import { createResult } from '@/lib/conversion-executor';
import {
  ConversionReportBuilder,
  formatBytes,
  formatDuration,
  formatReportSummary,
} from '@/lib/conversion-report';
import { createConversionRequest } from '@/types/conversion';

const START = new Date('2024-03-01T10:00:00.000Z');

function requestFor(name: string) {
  return createConversionRequest({
    inputPath: `/videos/${name}.mov`,
    outputPath: `/videos/${name}_h265.mp4`,
  });
}

function sampleResults() {
  return [
    createResult('t1', requestFor('a'), {
      outcome: 'success',
      startedAt: START,
      completedAt: new Date('2024-03-01T10:00:30.000Z'),
      encoderName: 'libx265',
      inputSize: 1000,
      outputSize: 400,
    }),
    createResult('t2', requestFor('b'), {
      outcome: 'failure',
      startedAt: START,
      completedAt: START,
      inputSize: 2000,
      error: { kind: 'runtime', message: 'Encoder failed with exit code 1' },
    }),
    createResult('t3', requestFor('c'), {
      outcome: 'cancelled',
      startedAt: START,
      completedAt: START,
    }),
  ];
}

describe('createResult', () => {
  it('should derive savings for successful runs', () => {
    const [success] = sampleResults();

    expect(success.elapsedSeconds).toBe(30);
    expect(success.spaceSaved).toBe(600);
    expect(success.compressionRatio).toBeCloseTo(0.6, 10);
    expect(Object.isFrozen(success)).toBe(true);
  });

  it('should never report negative savings', () => {
    const result = createResult('t1', requestFor('a'), {
      outcome: 'success',
      startedAt: START,
      inputSize: 100,
      outputSize: 250,
    });

    expect(result.spaceSaved).toBe(0);
    expect(result.compressionRatio).toBeCloseTo(-1.5, 10);
  });

  it('should not count savings for failed runs', () => {
    const [, failure] = sampleResults();
    expect(failure.spaceSaved).toBe(0);
    expect(failure.compressionRatio).toBe(0);
  });
});

describe('ConversionReportBuilder', () => {
  it('should aggregate counts and sizes', () => {
    const builder = new ConversionReportBuilder('batch-1', START);
    for (const result of sampleResults()) builder.add(result);

    const report = builder.finalize(new Date('2024-03-01T11:02:03.000Z'));

    expect(report).toMatchObject({
      batchId: 'batch-1',
      startedAt: '2024-03-01T10:00:00.000Z',
      completedAt: '2024-03-01T11:02:03.000Z',
      total: 3,
      succeeded: 1,
      failed: 1,
      cancelled: 1,
      totalInputSize: 1000,
      totalOutputSize: 400,
      totalSpaceSaved: 600,
      errors: ['b.mov: Encoder failed with exit code 1'],
    });
    expect(report.results.map((result) => result.taskId)).toEqual([
      't1',
      't2',
      't3',
    ]);
  });

  it('should keep completedAt null until finalized', () => {
    const builder = new ConversionReportBuilder('batch-1', START);
    expect(builder.snapshot().completedAt).toBeNull();
    expect(builder.isFinalized).toBe(false);
  });

  it('should reject results after finalize', () => {
    const builder = new ConversionReportBuilder('batch-1', START);
    builder.finalize();

    expect(() => builder.add(sampleResults()[0])).toThrow(
      'Cannot add results to a finalized report',
    );
  });

  it('should return independent snapshots', () => {
    const builder = new ConversionReportBuilder('batch-1', START);
    const snapshot = builder.snapshot();
    snapshot.results.push(sampleResults()[0]);

    expect(builder.snapshot().results).toEqual([]);
  });
});

describe('formatBytes', () => {
  it('should format with base-1024 units', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1024)).toBe('1.0 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024 * 1024)).toBe('5.0 GB');
  });
});

describe('formatDuration', () => {
  it('should drop leading zero units', () => {
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(45)).toBe('45s');
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(3723)).toBe('1h 2m 3s');
    expect(formatDuration(59.6)).toBe('1m 0s');
  });
});

describe('formatReportSummary', () => {
  it('should summarize a finalized report', () => {
    const builder = new ConversionReportBuilder('batch-1', START);
    for (const result of sampleResults()) builder.add(result);
    const report = builder.finalize(new Date('2024-03-01T11:02:03.000Z'));

    expect(formatReportSummary(report)).toBe(
      [
        'Converted 1 of 3 files (1 failed, 1 cancelled)',
        'Input: 1000 B, output: 400 B, saved: 600 B',
        'Elapsed: 1h 2m 3s',
        'Errors:',
        '  b.mov: Encoder failed with exit code 1',
      ].join('\n'),
    );
  });
});
