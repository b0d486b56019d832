import path from 'path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError, ValidationError } from '../../utils/errors';
import { buildConfig, defaultOutputPath } from '../loadConfig';

const credentials = {
  project_id: 'test-project',
  client_email: 'tagger@example.com',
  private_key: 'test-secret',
};

const now = new Date(2024, 2, 5, 9, 7, 3);

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({
      input: 'photos',
      cli: { credentials: 'key.json' },
      credentials,
      env: {},
      now,
    });

    expect(config).toEqual({
      api: {
        credentialsPath: path.resolve('key.json'),
        projectId: 'test-project',
        location: 'us-central1',
        geminiModel: 'gemini-2.5-flash',
        temperature: 0.7,
        retryCount: 3,
        retryDelayMs: 2000,
        timeoutMs: 60000,
        visionMaxResults: 50,
      },
      processing: {
        workers: 4,
        recursive: false,
        rename: true,
        backup: false,
        maxFileSizeMb: 20,
      },
      output: {
        inputPath: path.resolve('photos'),
        outputPath: 'results_20240305_090703.json',
        language: 'fr',
        author: undefined,
      },
      verbosity: 0,
    });
  });

  it('lets flags override the environment', () => {
    const config = buildConfig({
      input: 'photos',
      cli: { credentials: 'key.json', workers: '8', lang: 'en', project: 'other-project', verbose: 5 },
      credentials,
      env: {
        IMAGE_TAGGER_WORKERS: '2',
        IMAGE_TAGGER_LANGUAGE: 'fr',
        IMAGE_TAGGER_RETRY_COUNT: '5',
        IMAGE_TAGGER_GEMINI_MODEL: 'gemini-test',
        IMAGE_TAGGER_AUTHOR: 'Test Author',
      },
      now,
    });

    expect(config.processing.workers).toBe(8);
    expect(config.output.language).toBe('en');
    expect(config.api.projectId).toBe('other-project');
    expect(config.api.retryCount).toBe(5);
    expect(config.api.geminiModel).toBe('gemini-test');
    expect(config.output.author).toBe('Test Author');
    expect(config.verbosity).toBe(3);
  });

  it('rejects invalid values with the offending field', () => {
    const build = (env: Record<string, string>) => () =>
      buildConfig({ input: 'photos', cli: { credentials: 'key.json' }, credentials, env, now });

    expect(build({ IMAGE_TAGGER_LANGUAGE: 'de' })).toThrow(ValidationError);
    expect(build({ IMAGE_TAGGER_WORKERS: 'many' })).toThrow(
      'Invalid configuration (processing.workers): workers must be a number'
    );
    expect(build({ IMAGE_TAGGER_WORKERS: '0' })).toThrow('workers must be at least 1');
  });

  it('requires a credentials path', () => {
    expect(() => buildConfig({ input: 'photos', cli: {}, credentials, env: {}, now })).toThrow(
      ConfigurationError
    );
  });
});

describe('defaultOutputPath', () => {
  it('stamps local date and time', () => {
    expect(defaultOutputPath(new Date(2025, 11, 31, 23, 59, 58))).toBe(
      'results_20251231_235958.json'
    );
  });
});
