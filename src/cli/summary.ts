import type { StatsSnapshot } from '../services/batch/BatchStats';
import type { ProcessingFailure } from '../types/image';

const LISTED_FAILURES = 3;

function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

function share(count: number, of: number): string {
  return `${((count / Math.max(1, of)) * 100).toFixed(1)}%`;
}

/** End-of-run report; the first few failures are listed after the counters. */
export function formatSummary(
  stats: StatsSnapshot,
  outputPath: string,
  failures: readonly ProcessingFailure[] = [],
  color = true
): string {
  const bold = (value: string) => (color ? `\x1b[1m${value}\x1b[0m` : value);
  const paint = (code: number, value: string) => (color ? `\x1b[${code}m${value}\x1b[0m` : value);

  const lines = [
    bold('Processing summary'),
    `  Images:     ${stats.total}`,
    `  Succeeded:  ${paint(32, String(stats.succeeded))} (${share(stats.succeeded, stats.processed)})`,
    `  Failed:     ${paint(stats.failed > 0 ? 31 : 32, String(stats.failed))} (${share(
      stats.failed,
      stats.processed
    )})`,
  ];
  if (stats.degraded > 0) {
    lines.push(`  Default tags (generation failed): ${paint(33, String(stats.degraded))}`);
  }
  if (stats.metadataFailures > 0) {
    lines.push(`  Metadata not written: ${paint(33, String(stats.metadataFailures))}`);
  }
  lines.push(
    `  Total time: ${formatDuration(stats.elapsedSeconds)}`,
    `  Average:    ${stats.averageSeconds.toFixed(2)}s per image`,
    `  Throughput: ${stats.throughputPerMinute.toFixed(1)} images/min`,
    `  Results:    ${outputPath}`
  );

  if (failures.length > 0) {
    lines.push(bold('Failures'));
    failures.slice(0, LISTED_FAILURES).forEach((failure, index) => {
      lines.push(`  ${index + 1}. ${paint(31, `${failure.original_file}: ${failure.error}`)}`);
    });
    if (failures.length > LISTED_FAILURES) {
      lines.push(`  … and ${failures.length - LISTED_FAILURES} more (details in the results file)`);
    }
  }
  return lines.join('\n');
}
