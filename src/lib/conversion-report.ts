/**
 * Batch report aggregation and presentation helpers
 */

import { randomUUID } from 'crypto';
import path from 'path';
import type { ConversionReport, ConversionResult } from '../types/conversion';

/**
 * Accumulates results into a batch report. Totals are updated as results
 * arrive; finalize() stamps completedAt once.
 */
export class ConversionReportBuilder {
  private report: ConversionReport;

  constructor(batchId: string = randomUUID(), startedAt: Date = new Date()) {
    this.report = {
      batchId,
      startedAt: startedAt.toISOString(),
      completedAt: null,
      total: 0,
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      totalInputSize: 0,
      totalOutputSize: 0,
      totalSpaceSaved: 0,
      results: [],
      errors: [],
    };
  }

  get isFinalized(): boolean {
    return this.report.completedAt !== null;
  }

  add(result: ConversionResult): void {
    if (this.isFinalized) {
      throw new Error('Cannot add results to a finalized report', {
        cause: { batchId: this.report.batchId, taskId: result.taskId },
      });
    }

    const report = this.report;
    report.total += 1;
    report.results.push(result);

    switch (result.outcome) {
      case 'success':
        report.succeeded += 1;
        report.totalInputSize += result.inputSize;
        report.totalOutputSize += result.outputSize;
        report.totalSpaceSaved += result.spaceSaved;
        break;
      case 'failure':
        report.failed += 1;
        report.errors.push(
          `${path.basename(result.inputPath)}: ${result.error?.message ?? 'Unknown error'}`,
        );
        break;
      case 'cancelled':
        report.cancelled += 1;
        break;
    }
  }

  finalize(completedAt: Date = new Date()): ConversionReport {
    if (!this.isFinalized) {
      this.report.completedAt = completedAt.toISOString();
    }
    return this.snapshot();
  }

  /**
   * Copy of the report as it stands
   */
  snapshot(): ConversionReport {
    return {
      ...this.report,
      results: [...this.report.results],
      errors: [...this.report.errors],
    };
  }
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human-readable byte count, base 1024
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0
    ? `${value} ${BYTE_UNITS[unit]}`
    : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * Format seconds as "1h 2m 3s", dropping leading zero units
 */
export function formatDuration(totalSeconds: number): string {
  if (!Number.isFinite(totalSeconds) || totalSeconds <= 0) return '0s';
  const rounded = Math.round(totalSeconds);
  const hours = Math.floor(rounded / 3600);
  const minutes = Math.floor((rounded % 3600) / 60);
  const seconds = rounded % 60;

  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

export function formatReportSummary(report: ConversionReport): string {
  const lines = [
    `Converted ${report.succeeded} of ${report.total} files` +
      ` (${report.failed} failed, ${report.cancelled} cancelled)`,
    `Input: ${formatBytes(report.totalInputSize)}, ` +
      `output: ${formatBytes(report.totalOutputSize)}, ` +
      `saved: ${formatBytes(report.totalSpaceSaved)}`,
  ];

  if (report.completedAt) {
    const elapsed =
      (Date.parse(report.completedAt) - Date.parse(report.startedAt)) / 1000;
    lines.push(`Elapsed: ${formatDuration(elapsed)}`);
  }

  if (report.errors.length > 0) {
    lines.push('Errors:');
    for (const error of report.errors) {
      lines.push(`  ${error}`);
    }
  }

  return lines.join('\n');
}
