import pino from 'pino';
import pretty from 'pino-pretty';

/**
 * Structured log sink handed to every component. Components never reach
 * for a process-wide logger; the CLI builds one and passes it down.
 */
export type Logger = pino.Logger;

const LEVELS = ['warn', 'info', 'debug', 'trace'] as const;

export function levelForVerbosity(verbosity: number): pino.Level {
  const index = Math.max(0, Math.min(verbosity, LEVELS.length - 1));
  return LEVELS[index];
}

/**
 * Child logger for a third-party client's traffic. It stays silent below the
 * highest verbosity, where the library's requests and responses are traced.
 */
export function libraryLogger(parent: Logger, verbosity: number, library: string): Logger {
  return parent.child({ library }, { level: verbosity >= LEVELS.length - 1 ? 'trace' : 'silent' });
}

export interface LoggerOptions {
  verbosity?: number;
  name?: string;
  prettyPrint?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = levelForVerbosity(options.verbosity ?? 0);
  const base = {
    level,
    name: options.name ?? 'image-tagger',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.prettyPrint ?? process.stderr.isTTY) {
    return pino(
      base,
      pretty({
        colorize: true,
        destination: 2,
        sync: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname,name',
      })
    );
  }

  return pino(base, pino.destination({ dest: 2, sync: true }));
}

/** Logger that drops everything; used by tests and library callers. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
