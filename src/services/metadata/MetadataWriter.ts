import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import type { TagRecord } from '../../types/image';
import { temporarySibling } from '../../utils/atomicWrite';
import { errorMessage } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { embedIptc, embedXmp, iptcFieldsFor, minimalXmpFields, xmpFieldsFor } from './embed';

export const CLEAN_COPY_JPEG_QUALITY = 95;

export interface WriteOutcome {
  strategy: string;
  written: boolean;
  error?: string;
  warnings: string[];
}

export interface WriteStrategy {
  readonly name: string;
  apply(filePath: string, record: TagRecord): Promise<WriteOutcome>;
}

export interface MetadataOptions {
  /** Written to the PNG `Author` text chunk when set. */
  author?: string;
}

/**
 * Full XMP packet; JPEGs then get the legacy IPTC block. An IPTC failure is
 * reported as a warning and leaves the XMP write in place.
 */
export class XmpStrategy implements WriteStrategy {
  readonly name = 'xmp';

  constructor(private options: MetadataOptions = {}) {}

  async apply(filePath: string, record: TagRecord): Promise<WriteOutcome> {
    const format = await embedXmp(filePath, xmpFieldsFor(record), this.options.author);
    const warnings: string[] = [];
    if (format === 'jpeg') {
      try {
        await embedIptc(filePath, iptcFieldsFor(record));
      } catch (error) {
        warnings.push(`IPTC write failed: ${errorMessage(error)}`);
      }
    }
    return { strategy: this.name, written: true, warnings };
  }
}

/**
 * Re-decodes the image while ignoring malformed metadata, re-encodes it to a
 * clean sibling and tags that copy with a minimal packet. The clean copy
 * replaces the original even when tagging it fails.
 */
export class CleanCopyStrategy implements WriteStrategy {
  readonly name = 'clean-copy';

  constructor(
    private options: MetadataOptions = {},
    private embed: typeof embedXmp = embedXmp
  ) {}

  async apply(filePath: string, record: TagRecord): Promise<WriteOutcome> {
    const extension = path.extname(filePath).toLowerCase();
    const tmp = temporarySibling(filePath, extension);

    try {
      const image = sharp(filePath, { failOn: 'none' });
      await (extension === '.png'
        ? image.png()
        : image.jpeg({ quality: CLEAN_COPY_JPEG_QUALITY })
      ).toFile(tmp);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      return { strategy: this.name, written: false, error: errorMessage(error), warnings: [] };
    }

    let error: string | undefined;
    try {
      await this.embed(tmp, minimalXmpFields(record), this.options.author);
    } catch (cause) {
      error = `Minimal XMP write failed: ${errorMessage(cause)}`;
    }
    try {
      await fs.rename(tmp, filePath);
    } catch (cause) {
      await fs.rm(tmp, { force: true });
      throw cause;
    }

    return {
      strategy: this.name,
      written: error === undefined,
      error,
      warnings: ['Original file replaced by a re-encoded copy'],
    };
  }
}

export class MetadataWriter {
  private readonly strategies: WriteStrategy[];

  constructor(
    private logger: Logger,
    options: MetadataOptions = {},
    strategies?: WriteStrategy[]
  ) {
    this.strategies = strategies ?? [new XmpStrategy(options), new CleanCopyStrategy(options)];
  }

  /** Tries each strategy in order and stops at the first one that writes. */
  async write(filePath: string, record: TagRecord): Promise<boolean> {
    for (const strategy of this.strategies) {
      const outcome = await this.attempt(strategy, filePath, record);
      for (const warning of outcome.warnings) {
        this.logger.warn({ path: filePath, strategy: outcome.strategy }, warning);
      }
      if (outcome.written) {
        this.logger.debug({ path: filePath, strategy: outcome.strategy }, 'Metadata written');
        return true;
      }
      this.logger.warn(
        { path: filePath, strategy: outcome.strategy, error: outcome.error },
        'Metadata strategy failed'
      );
    }
    return false;
  }

  private async attempt(
    strategy: WriteStrategy,
    filePath: string,
    record: TagRecord
  ): Promise<WriteOutcome> {
    try {
      return await strategy.apply(filePath, record);
    } catch (error) {
      return { strategy: strategy.name, written: false, error: errorMessage(error), warnings: [] };
    }
  }
}
