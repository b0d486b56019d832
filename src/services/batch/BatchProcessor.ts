import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import { isFailure, type ProcessingResult } from '../../types/image';
import { writeFileAtomic } from '../../utils/atomicWrite';
import { RunInterruptedError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { failureFor } from '../tagger/PhotoTagger';
import { BatchStats, type StatsSnapshot } from './BatchStats';
import { collectImages } from './scanDirectory';

export interface ImageProcessor {
  processImage(imagePath: string): Promise<ProcessingResult>;
}

export interface BatchOptions {
  workers: number;
  recursive: boolean;
  signal?: AbortSignal;
}

export interface ProgressEvent {
  current: number;
  total: number;
  result: ProcessingResult;
  stats: StatsSnapshot;
}

export type BatchOutcome =
  | { status: 'no-images'; input: string }
  | {
      status: 'completed';
      outputPath: string;
      results: ProcessingResult[];
      stats: StatsSnapshot;
    };

/**
 * Fans the images of a run out to a bounded pool of async workers and
 * writes every result to one JSON file once all of them have settled.
 */
export class BatchProcessor {
  public progressEmitter: EventEmitter;

  constructor(
    private tagger: ImageProcessor,
    private logger: Logger,
    private now: () => number = Date.now
  ) {
    this.progressEmitter = new EventEmitter();
  }

  async run(input: string, outputPath: string, options: BatchOptions): Promise<BatchOutcome> {
    const files = await collectImages(input, options.recursive);
    if (files.length === 0) {
      this.logger.warn({ input }, 'No images found');
      return { status: 'no-images', input };
    }

    const stats = new BatchStats(files.length, this.now);
    const results: ProcessingResult[] = [];
    const workerCount = Math.max(1, Math.min(options.workers, files.length));
    let next = 0;

    this.logger.info(
      { images: files.length, workers: workerCount },
      `Starting batch - Found ${files.length} images`
    );

    const worker = async () => {
      while (!options.signal?.aborted) {
        const index = next++;
        if (index >= files.length) return;
        const file = files[index];

        const result = await this.tagger
          .processImage(file)
          .catch((error: unknown) => failureFor(file, error, 0));
        results.push(result);
        stats.record(result);

        if (isFailure(result)) {
          this.logger.warn({ file: result.original_file, error: result.error }, 'Job failed');
        }
        const event: ProgressEvent = {
          current: results.length,
          total: files.length,
          result,
          stats: stats.snapshot(),
        };
        this.progressEmitter.emit('progress', event);
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (options.signal?.aborted) {
      this.logger.warn(
        { completed: results.length, total: files.length },
        'Run interrupted, no output written'
      );
      throw new RunInterruptedError(results.length, files.length);
    }

    const target = path.resolve(outputPath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await writeFileAtomic(target, `${JSON.stringify(results, null, 2)}\n`);
    this.logger.info({ output: target, results: results.length }, 'Results written');

    return { status: 'completed', outputPath: target, results, stats: stats.snapshot() };
  }
}
