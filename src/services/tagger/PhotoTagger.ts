import type { Stats } from 'fs';
import fs from 'fs/promises';
import mime from 'mime-types';
import path from 'path';
import type {
  ImageJob,
  ProcessingFailure,
  ProcessingResult,
  ProcessingSuccess,
} from '../../types/image';
import {
  errorMessage,
  FileNotFoundError,
  FileProcessingError,
  FileSizeError,
  ImageTaggerError,
  isNotFoundError,
  UnsupportedFormatError,
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { ImageNormalizer } from '../image/ImageNormalizer';
import type { GenerativeService } from '../llm/GenerativeService';
import { MetadataWriter } from '../metadata/MetadataWriter';
import type { VisionService } from '../vision/VisionService';
import { FileRenamer } from './FileRenamer';

export const SUPPORTED_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const;

export function isSupportedExtension(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

export interface TaggerOptions {
  rename: boolean;
  backup: boolean;
  maxFileSizeMb: number;
}

export interface TaggerDependencies {
  normalizer: ImageNormalizer;
  vision: VisionService;
  generative: GenerativeService;
  metadata: MetadataWriter;
  renamer: FileRenamer;
  logger: Logger;
}

/**
 * Runs one image through validate, normalize, annotate, rename and
 * metadata write. `processImage` never rejects; every failure is folded into
 * the returned result.
 */
export class PhotoTagger {
  constructor(private deps: TaggerDependencies, private options: TaggerOptions) {}

  async processImage(imagePath: string): Promise<ProcessingResult> {
    const startTime = Date.now();
    const sourcePath = path.resolve(imagePath);
    const logger = this.deps.logger.child({ file: path.basename(sourcePath) });

    try {
      const job = await this.validate(sourcePath);
      const backupPath = this.options.backup
        ? await this.deps.renamer.backup(job.sourcePath)
        : undefined;

      const image = await this.deps.normalizer.normalize(job.sourcePath);
      const vision = await this.deps.vision.annotate(image.data);
      logger.debug(
        { labels: vision.labels.length, objects: vision.objects.length },
        'Vision annotation done'
      );
      const record = await this.deps.generative.generate(image.data, image.mimeType, vision);

      const finalPath = this.options.rename
        ? await this.deps.renamer.rename(job.sourcePath, record.title)
        : job.sourcePath;
      const metadataWritten = await this.deps.metadata.write(finalPath, record);

      const result: ProcessingSuccess = {
        original_file: path.basename(job.sourcePath),
        new_file: path.basename(finalPath),
        path: finalPath,
        original_dimensions: image.originalDimensions,
        upload_dimensions: image.dimensions,
        title: record.title,
        description: record.description,
        comment: record.comment,
        story: record.story,
        main_genre: record.mainCategory,
        secondary_genre: record.secondaryCategory,
        content_keywords: record.contentKeywords,
        technical_characteristics: record.technicalCharacteristics,
        keywords: record.keywords,
        metadata_written: metadataWritten,
        processing_time: elapsedSeconds(startTime),
      };
      if (record.generationError !== undefined) result.generation_error = record.generationError;
      if (backupPath !== undefined) result.backup_path = backupPath;

      logger.info(
        { newFile: result.new_file, metadataWritten, seconds: result.processing_time },
        'Image processed'
      );
      return result;
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Image processing failed');
      logger.debug({ err: error }, 'Image processing failure detail');
      return failureFor(sourcePath, error, elapsedSeconds(startTime));
    }
  }

  private async validate(sourcePath: string): Promise<ImageJob> {
    let stats: Stats;
    try {
      stats = await fs.stat(sourcePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new FileNotFoundError(`File not found: ${sourcePath}`, sourcePath);
      }
      throw error;
    }
    if (!stats.isFile()) {
      throw new FileProcessingError(`Not a regular file: ${sourcePath}`, sourcePath);
    }

    const extension = path.extname(sourcePath).toLowerCase();
    if (!isSupportedExtension(sourcePath)) {
      throw new UnsupportedFormatError(`Unsupported format: ${extension || '(none)'}`, sourcePath, {
        extension,
        supported: SUPPORTED_EXTENSIONS,
      });
    }

    const maxBytes = this.options.maxFileSizeMb * 1024 * 1024;
    if (stats.size > maxBytes) {
      throw new FileSizeError(sourcePath, stats.size, maxBytes);
    }

    return {
      sourcePath,
      extension,
      mimeType: mime.lookup(sourcePath) || 'application/octet-stream',
      sizeBytes: stats.size,
    };
  }
}

function elapsedSeconds(startTime: number): number {
  return (Date.now() - startTime) / 1000;
}

export function failureFor(
  sourcePath: string,
  error: unknown,
  processingTime: number
): ProcessingFailure {
  const failure: ProcessingFailure = {
    original_file: path.basename(sourcePath),
    path: sourcePath,
    error: errorMessage(error),
    error_type: error instanceof Error ? error.name : 'Error',
    processing_time: processingTime,
  };
  if (error instanceof ImageTaggerError && Object.keys(error.details).length > 0) {
    failure.error_details = error.details;
  }
  return failure;
}
