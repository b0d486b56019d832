import fs from 'fs/promises';
import mime from 'mime-types';
import sharp from 'sharp';
import type { Dimensions, NormalizedImage } from '../../types/image';
import { errorMessage } from '../../utils/errors';
import type { Logger } from '../../utils/logger';

export const MAX_UPLOAD_EDGE = 1024;
export const UPLOAD_JPEG_QUALITY = 85;

export interface NormalizeOptions {
  maxEdge?: number;
  quality?: number;
}

/**
 * Produces the JPEG buffer that is sent to the annotation services.
 *
 * Alpha channels are dropped rather than composited onto a background, so a
 * transparent area comes out in whatever colour the pixel data held.
 */
export class ImageNormalizer {
  private readonly maxEdge: number;
  private readonly quality: number;

  constructor(private logger: Logger, options: NormalizeOptions = {}) {
    this.maxEdge = options.maxEdge ?? MAX_UPLOAD_EDGE;
    this.quality = options.quality ?? UPLOAD_JPEG_QUALITY;
  }

  async normalize(imagePath: string): Promise<NormalizedImage> {
    try {
      return await this.reencode(imagePath);
    } catch (error) {
      this.logger.warn(
        { path: imagePath, error: errorMessage(error) },
        'Resize failed, uploading original bytes'
      );
      const data = await fs.readFile(imagePath);
      return {
        data,
        mimeType: mime.lookup(imagePath) || 'application/octet-stream',
        dimensions: [0, 0],
        originalDimensions: [0, 0],
        resized: false,
      };
    }
  }

  private async reencode(imagePath: string): Promise<NormalizedImage> {
    const metadata = await sharp(imagePath).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error('Unable to determine image dimensions');
    }
    const originalDimensions: Dimensions = [metadata.width, metadata.height];

    let pipeline = sharp(imagePath);
    if (metadata.hasAlpha || metadata.isPalette) {
      this.logger.debug(
        { path: imagePath, space: metadata.space, hasAlpha: metadata.hasAlpha },
        'Discarding alpha/palette before JPEG encoding'
      );
      pipeline = pipeline.removeAlpha();
    }

    const { data, info } = await pipeline
      .toColourspace('srgb')
      .resize(this.maxEdge, this.maxEdge, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .jpeg({ quality: this.quality })
      .toBuffer({ resolveWithObject: true });

    const resized =
      info.width !== originalDimensions[0] ||
      info.height !== originalDimensions[1];
    if (resized) {
      this.logger.debug(
        { path: imagePath, from: originalDimensions, to: [info.width, info.height] },
        'Image downscaled for upload'
      );
    }

    return {
      data,
      mimeType: 'image/jpeg',
      dimensions: [info.width, info.height],
      originalDimensions,
      resized,
    };
  }
}
