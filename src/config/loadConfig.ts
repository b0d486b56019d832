import path from 'path';
import { z } from 'zod';
import {
  type AppConfig,
  type ServiceAccountCredentials,
  SUPPORTED_LANGUAGES,
} from '../types/config';
import { ConfigurationError, ValidationError } from '../utils/errors';

export const ENV_PREFIX = 'IMAGE_TAGGER_';

export const DEFAULTS = {
  location: 'us-central1',
  geminiModel: 'gemini-2.5-flash',
  temperature: 0.7,
  retryCount: 3,
  retryDelayMs: 2000,
  timeoutMs: 60000,
  visionMaxResults: 50,
  workers: 4,
  maxFileSizeMb: 20,
  language: 'fr',
} as const;

/** Options as commander hands them over; numbers still arrive as strings. */
export interface CliOptions {
  credentials?: string;
  output?: string;
  project?: string;
  lang?: string;
  workers?: string;
  verbose?: number;
  rename?: boolean;
  retry?: string;
  backup?: boolean;
  recursive?: boolean;
}

const integer = (field: string, min: number, max: number) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .min(min, `${field} must be at least ${min}`)
    .max(max, `${field} must be at most ${max}`);

const ConfigSchema = z.object({
  api: z.object({
    credentialsPath: z.string().min(1, 'credentials path is required'),
    projectId: z.string().min(1, 'project id is required'),
    location: z.string().min(1).default(DEFAULTS.location),
    geminiModel: z.string().min(1).default(DEFAULTS.geminiModel),
    temperature: z.coerce.number().min(0).max(2).default(DEFAULTS.temperature),
    retryCount: integer('retry', 1, 10).default(DEFAULTS.retryCount),
    retryDelayMs: integer('retry delay', 0, 60000).default(DEFAULTS.retryDelayMs),
    timeoutMs: integer('timeout', 1000, 600000).default(DEFAULTS.timeoutMs),
    visionMaxResults: integer('vision max results', 1, 100).default(DEFAULTS.visionMaxResults),
  }),
  processing: z.object({
    workers: integer('workers', 1, 64).default(DEFAULTS.workers),
    recursive: z.boolean(),
    rename: z.boolean(),
    backup: z.boolean(),
    maxFileSizeMb: z.coerce.number().positive().default(DEFAULTS.maxFileSizeMb),
  }),
  output: z.object({
    inputPath: z.string().min(1),
    outputPath: z.string().min(1),
    language: z.enum(['fr', 'en'], {
      errorMap: () => ({ message: `language must be one of ${SUPPORTED_LANGUAGES.join(', ')}` }),
    }),
    author: z.string().min(1).optional(),
  }),
  verbosity: z.number().int().min(0).max(3),
});

/** `results_YYYYMMDD_HHMMSS.json` in local time. */
export function defaultOutputPath(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `results_${date}_${time}.json`;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

export interface ConfigSources {
  input: string;
  cli: CliOptions;
  credentials: ServiceAccountCredentials;
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

/**
 * Merges CLI flags, `IMAGE_TAGGER_*` variables and defaults, in that order of
 * precedence. The project id falls back to the one in the credentials file.
 */
export function buildConfig({
  input,
  cli,
  credentials,
  env = process.env,
  now = new Date(),
}: ConfigSources): AppConfig {
  if (!cli.credentials) {
    throw new ConfigurationError('--credentials is required');
  }

  const candidate = {
    api: {
      credentialsPath: path.resolve(cli.credentials),
      projectId: cli.project ?? credentials.project_id,
      location: envValue(env, 'LOCATION'),
      geminiModel: envValue(env, 'GEMINI_MODEL'),
      temperature: envValue(env, 'TEMPERATURE'),
      retryCount: cli.retry ?? envValue(env, 'RETRY_COUNT'),
      retryDelayMs: envValue(env, 'RETRY_DELAY_MS'),
      timeoutMs: envValue(env, 'TIMEOUT_MS'),
      visionMaxResults: envValue(env, 'VISION_MAX_RESULTS'),
    },
    processing: {
      workers: cli.workers ?? envValue(env, 'WORKERS'),
      recursive: cli.recursive ?? false,
      rename: cli.rename ?? true,
      backup: cli.backup ?? false,
      maxFileSizeMb: envValue(env, 'MAX_FILE_SIZE_MB'),
    },
    output: {
      inputPath: path.resolve(input),
      outputPath: cli.output ?? defaultOutputPath(now),
      language: cli.lang ?? envValue(env, 'LANGUAGE') ?? DEFAULTS.language,
      author: envValue(env, 'AUTHOR'),
    },
    verbosity: Math.min(cli.verbose ?? 0, 3),
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid configuration (${field}): ${issue.message}`, field);
  }
  return parsed.data;
}
