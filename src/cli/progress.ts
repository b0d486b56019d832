import { EventEmitter } from 'events';
import path from 'path';
import type { ProgressEvent } from '../services/batch/BatchProcessor';

const BAR_WIDTH = 50;

/** One-line progress bar: `[████----] 50.0% | 5/10 | ok: 4 | failed: 1`. */
export function renderProgress(event: ProgressEvent, color = true): string {
  const percentage = (event.current / event.total) * 100;
  const filled = Math.round((BAR_WIDTH * percentage) / 100);
  const bar = `[${'█'.repeat(filled)}${'-'.repeat(BAR_WIDTH - filled)}]`;
  const bold = (value: string | number) => (color ? `\x1b[1m${value}\x1b[0m` : String(value));

  const stats: Record<string, number> = {
    ok: event.stats.succeeded,
    failed: event.stats.failed,
  };
  if (event.stats.degraded > 0) stats.degraded = event.stats.degraded;

  const statsText = Object.entries(stats)
    .map(([key, value]) => `${key}: ${bold(value)}`)
    .join(' | ');
  const last = path.basename(event.result.path);

  return `${color ? `\x1b[36m${bar}\x1b[0m` : bar} ${bold(
    `${percentage.toFixed(1)}%`
  )} | ${event.current}/${event.total} | ${statsText} | ${last}`;
}

/** Redraws the bar on `stream` for every progress event; returns a detach function. */
export function attachProgress(
  emitter: EventEmitter,
  stream: Pick<NodeJS.WritableStream, 'write'> = process.stdout
): () => void {
  const onProgress = (event: ProgressEvent) => {
    // Clear line and move to beginning
    stream.write('\r\x1b[K');
    stream.write(renderProgress(event));
    if (event.current === event.total) stream.write('\n');
  };
  emitter.on('progress', onProgress);
  return () => {
    emitter.off('progress', onProgress);
  };
}
