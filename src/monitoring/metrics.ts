/**
 * Metrics collection for one sync run
 */

import { formatBytes, formatDuration } from '../utils/format.js';

export type FileOutcome = 'added' | 'modified' | 'deleted' | 'unsupported' | 'failed';

export interface SyncMetrics {
  startTime: number;
  endTime?: number;
  duration?: number;
  filesProcessed: number;
  filesAdded: number;
  filesModified: number;
  filesDeleted: number;
  filesUnsupported: number;
  filesFailed: number;
  chunksWritten: number;
  driveApiCalls: number;
  downloadedBytes: number;
  errors: ErrorMetric[];
  success: boolean;
}

export interface ErrorMetric {
  timestamp: number;
  errorType: string;
  errorMessage: string;
  context?: Record<string, unknown>;
}

export class MetricsCollector {
  private metrics: SyncMetrics;

  constructor() {
    this.metrics = this.createEmptyMetrics();
  }

  private createEmptyMetrics(): SyncMetrics {
    return {
      startTime: Date.now(),
      filesProcessed: 0,
      filesAdded: 0,
      filesModified: 0,
      filesDeleted: 0,
      filesUnsupported: 0,
      filesFailed: 0,
      chunksWritten: 0,
      driveApiCalls: 0,
      downloadedBytes: 0,
      errors: [],
      success: false,
    };
  }

  /**
   * Start a new metrics collection session
   */
  start(): void {
    this.metrics = this.createEmptyMetrics();
  }

  end(success: boolean): void {
    this.metrics.endTime = Date.now();
    this.metrics.duration = this.metrics.endTime - this.metrics.startTime;
    this.metrics.success = success;
  }

  /**
   * Unsupported and failed files are counted on top of added/modified, not
   * instead of them, so only the first three bump filesProcessed.
   */
  recordFileProcessed(outcome: FileOutcome): void {
    switch (outcome) {
      case 'added':
        this.metrics.filesProcessed++;
        this.metrics.filesAdded++;
        break;
      case 'modified':
        this.metrics.filesProcessed++;
        this.metrics.filesModified++;
        break;
      case 'deleted':
        this.metrics.filesProcessed++;
        this.metrics.filesDeleted++;
        break;
      case 'unsupported':
        this.metrics.filesUnsupported++;
        break;
      case 'failed':
        this.metrics.filesFailed++;
        break;
    }
  }

  recordChunksWritten(count: number): void {
    this.metrics.chunksWritten += count;
  }

  recordDriveApiCall(): void {
    this.metrics.driveApiCalls++;
  }

  recordDownloadedBytes(bytes: number): void {
    this.metrics.downloadedBytes += bytes;
  }

  recordError(error: Error, context?: Record<string, unknown>): void {
    this.metrics.errors.push({
      timestamp: Date.now(),
      errorType: error.name,
      errorMessage: error.message,
      context,
    });
  }

  getMetrics(): SyncMetrics {
    return { ...this.metrics, errors: [...this.metrics.errors] };
  }

  /**
   * Get a summary string for logging
   */
  getSummary(): string {
    const m = this.metrics;
    return [
      `Sync ${m.success ? 'succeeded' : 'failed'}`,
      `Duration: ${formatDuration(m.duration)}`,
      `Files: ${m.filesProcessed} (${m.filesAdded} added, ${m.filesModified} modified, ${m.filesDeleted} deleted)`,
      `Unsupported: ${m.filesUnsupported}`,
      `Failed: ${m.filesFailed}`,
      `Chunks: ${m.chunksWritten}`,
      `Drive: ${m.driveApiCalls} calls, ${formatBytes(m.downloadedBytes)} downloaded`,
      `Errors: ${m.errors.length}`,
    ].join(' | ');
  }
}
