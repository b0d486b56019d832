import { Command, InvalidArgumentError, Option } from 'commander';
import path from 'path';
import { buildConfig, type CliOptions } from '../config/loadConfig';
import { loadCredentials } from '../config/credentials';
import { BatchProcessor, type ImageProcessor } from '../services/batch/BatchProcessor';
import { ImageNormalizer } from '../services/image/ImageNormalizer';
import { createGeminiTransport, GeminiService } from '../services/llm/GeminiService';
import { MetadataWriter } from '../services/metadata/MetadataWriter';
import { FileRenamer } from '../services/tagger/FileRenamer';
import { PhotoTagger } from '../services/tagger/PhotoTagger';
import { createVisionTransport, GoogleVisionService } from '../services/vision/GoogleVisionService';
import { type AppConfig, SUPPORTED_LANGUAGES } from '../types/config';
import { isFailure } from '../types/image';
import {
  ConfigurationError,
  errorMessage,
  ImageTaggerError,
  RunInterruptedError,
} from '../utils/errors';
import {
  createLogger,
  libraryLogger,
  type Logger,
  type LoggerOptions,
} from '../utils/logger';
import { attachProgress } from './progress';
import { formatSummary } from './summary';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

function positiveInteger(value: string): string {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return value;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(): Command {
  return new Command()
    .name('image-tagger')
    .description(
      'Tag images with Google Cloud Vision and Gemini, write XMP/IPTC metadata and rename them'
    )
    .argument('<input>', 'image file or directory')
    .option('--credentials <path>', 'service-account JSON key file')
    .option('-o, --output <path>', 'results JSON file (default: results_YYYYMMDD_HHMMSS.json)')
    .option('--project <id>', 'Google Cloud project (default: from the credentials file)')
    .addOption(
      new Option('--lang <code>', 'language of the generated text').choices([
        ...SUPPORTED_LANGUAGES,
      ])
    )
    .option('--workers <n>', 'number of images processed concurrently (default: 4)', positiveInteger)
    .option('-v, --verbose', 'increase log verbosity (repeatable)', increaseVerbosity, 0)
    .option('--no-rename', 'keep original file names')
    .option('--retry <n>', 'attempts per remote call (default: 3)', positiveInteger)
    .option('--backup', 'copy originals to a backups/ folder before changing them')
    .option('-r, --recursive', 'descend into subdirectories')
    .showHelpAfterError();
}

export function createPhotoTagger(config: AppConfig, logger: Logger): PhotoTagger {
  const { api, processing, output } = config;

  const vision = new GoogleVisionService(
    createVisionTransport(
      api.credentialsPath,
      api.timeoutMs,
      libraryLogger(logger, config.verbosity, 'googleapis')
    ),
    {
      retryCount: api.retryCount,
      retryDelayMs: api.retryDelayMs,
      maxResults: api.visionMaxResults,
    },
    logger.child({ component: 'vision' })
  );
  const generative = new GeminiService(
    createGeminiTransport(
      {
        credentialsPath: api.credentialsPath,
        projectId: api.projectId,
        location: api.location,
        model: api.geminiModel,
        temperature: api.temperature,
        timeoutMs: api.timeoutMs,
      },
      libraryLogger(logger, config.verbosity, '@google/genai')
    ),
    {
      language: output.language,
      retryCount: api.retryCount,
      retryDelayMs: api.retryDelayMs,
    },
    logger.child({ component: 'gemini' })
  );

  return new PhotoTagger(
    {
      normalizer: new ImageNormalizer(logger),
      vision,
      generative,
      metadata: new MetadataWriter(logger.child({ component: 'metadata' }), {
        author: output.author,
      }),
      renamer: new FileRenamer(logger),
      logger,
    },
    {
      rename: processing.rename,
      backup: processing.backup,
      maxFileSizeMb: processing.maxFileSizeMb,
    }
  );
}

export interface MainDependencies {
  createLogger?: (options: LoggerOptions) => Logger;
  createTagger?: (config: AppConfig, logger: Logger) => ImageProcessor;
  print?: (text: string) => void;
  controller?: AbortController;
}

export async function main(
  argv: string[] = process.argv,
  deps: MainDependencies = {}
): Promise<number> {
  const {
    createLogger: makeLogger = createLogger,
    createTagger = createPhotoTagger,
    print = console.log,
    controller = new AbortController(),
  } = deps;

  const program = buildProgram();
  program.parse(argv);
  const [input] = program.args;
  const options = program.opts<CliOptions>();

  const logger = makeLogger({ verbosity: options.verbose ?? 0 });
  const forceExit = () => process.exit(EXIT_INTERRUPTED);
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Interrupt received, waiting for in-flight images');
    controller.abort();
    process.once(signal, forceExit);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    if (!options.credentials) {
      throw new ConfigurationError('--credentials <path> is required');
    }
    const credentials = await loadCredentials(path.resolve(options.credentials));
    const config = buildConfig({ input, cli: options, credentials });
    logger.debug({ config: { ...config.api, credentialsPath: undefined } }, 'Configuration loaded');

    const processor = new BatchProcessor(createTagger(config, logger), logger);
    const detach = process.stdout.isTTY ? attachProgress(processor.progressEmitter) : undefined;
    const outcome = await processor
      .run(config.output.inputPath, config.output.outputPath, {
        workers: config.processing.workers,
        recursive: config.processing.recursive,
        signal: controller.signal,
      })
      .finally(() => detach?.());

    if (outcome.status === 'no-images') {
      print(`No supported images found in ${outcome.input}`);
      return EXIT_OK;
    }
    print(
      formatSummary(
        outcome.stats,
        outcome.outputPath,
        outcome.results.filter(isFailure),
        process.stdout.isTTY
      )
    );
    return EXIT_OK;
  } catch (error) {
    if (error instanceof RunInterruptedError) {
      logger.warn(error.details, error.message);
      return EXIT_INTERRUPTED;
    }
    if (error instanceof ImageTaggerError) {
      logger.error(error.toJSON(), error.message);
    } else {
      logger.fatal({ err: error }, `Unexpected error: ${errorMessage(error)}`);
    }
    return EXIT_ERROR;
  } finally {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.off(signal, onSignal);
      process.off(signal, forceExit);
    }
    logger.flush();
  }
}
