import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { levelForVerbosity, libraryLogger } from '../logger';

function capture() {
  const lines: string[] = [];
  const logger = pino({ level: 'trace' }, { write: (line: string) => lines.push(line) });
  return { logger, entries: () => lines.map((line) => JSON.parse(line)) };
}

describe('levelForVerbosity', () => {
  it('maps -v counts to levels and clamps the rest', () => {
    expect([-1, 0, 1, 2, 3, 7].map(levelForVerbosity)).toEqual([
      'warn',
      'warn',
      'info',
      'debug',
      'trace',
      'trace',
    ]);
  });
});

describe('libraryLogger', () => {
  it('stays silent below the highest verbosity', () => {
    const { logger, entries } = capture();

    const library = libraryLogger(logger, 2, 'googleapis');
    library.debug('images.annotate request');
    library.warn('images.annotate response');

    expect(entries()).toEqual([]);
  });

  it('traces library traffic at the highest verbosity', () => {
    const { logger, entries } = capture();

    libraryLogger(logger, 3, '@google/genai').trace({ bytes: 12 }, 'models.generateContent body');

    expect(entries()).toEqual([
      expect.objectContaining({
        level: 10,
        library: '@google/genai',
        bytes: 12,
        msg: 'models.generateContent body',
      }),
    ]);
  });
});
