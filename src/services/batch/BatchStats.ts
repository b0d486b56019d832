import { isFailure, type ProcessingResult } from '../../types/image';

export interface StatsSnapshot {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  /** Successes whose tags are defaults because generation gave up. */
  degraded: number;
  metadataFailures: number;
  elapsedSeconds: number;
  averageSeconds: number;
  /** Completed jobs per minute of wall-clock time. */
  throughputPerMinute: number;
}

/** Run-wide counters; mutated once per completed job. */
export class BatchStats {
  private processed = 0;
  private succeeded = 0;
  private failed = 0;
  private degraded = 0;
  private metadataFailures = 0;
  private readonly times: number[] = [];

  constructor(
    public readonly total: number,
    private readonly now: () => number = Date.now,
    private readonly startedAt: number = now()
  ) {}

  record(result: ProcessingResult): void {
    this.processed++;
    this.times.push(result.processing_time);
    if (isFailure(result)) {
      this.failed++;
      return;
    }
    this.succeeded++;
    if (result.generation_error !== undefined) this.degraded++;
    if (!result.metadata_written) this.metadataFailures++;
  }

  /** Per-item processing times in completion order. */
  get processingTimes(): readonly number[] {
    return this.times;
  }

  snapshot(): StatsSnapshot {
    const elapsedSeconds = (this.now() - this.startedAt) / 1000;
    const sum = this.times.reduce((total, time) => total + time, 0);
    return {
      total: this.total,
      processed: this.processed,
      succeeded: this.succeeded,
      failed: this.failed,
      degraded: this.degraded,
      metadataFailures: this.metadataFailures,
      elapsedSeconds,
      averageSeconds: this.times.length > 0 ? sum / this.times.length : 0,
      throughputPerMinute: elapsedSeconds > 0 ? (this.processed / elapsedSeconds) * 60 : 0,
    };
  }
}
