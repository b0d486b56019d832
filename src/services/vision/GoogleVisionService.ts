import { google, type vision_v1 } from 'googleapis';
import type { DominantColor, ScoredLabel, VisionResult } from '../../types/image';
import {
  AnnotationError,
  errorMessage,
  toAnnotationError,
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { retryWithDelay, type Sleep } from '../../utils/retry';
import { emptyVisionResult, type VisionService, type VisionTransport } from './VisionService';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

export interface GoogleVisionOptions {
  retryCount: number;
  retryDelayMs: number;
  maxResults: number;
  sleep?: Sleep;
}

export function createVisionTransport(
  credentialsPath: string,
  timeoutMs: number,
  logger: Logger
): VisionTransport {
  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsPath,
    scopes: [CLOUD_PLATFORM_SCOPE],
  });
  const vision = google.vision({ version: 'v1', auth });

  return {
    async annotate(request) {
      logger.debug(
        { features: request.features?.map((feature) => feature.type) },
        'images.annotate request'
      );
      const response = await vision.images.annotate(
        { requestBody: { requests: [request] } },
        { timeout: timeoutMs }
      );
      logger.debug({ url: response.config.url, status: response.status }, 'images.annotate response');
      logger.trace({ data: response.data }, 'images.annotate body');
      const result = response.data.responses?.[0];
      if (!result) {
        throw new AnnotationError('Vision API returned no response', 'vision');
      }
      if (result.error?.message) {
        const code = result.error.code ?? undefined;
        throw new AnnotationError(
          `Vision API error: ${result.error.message}`,
          'vision',
          code,
          code === undefined || code >= 500
        );
      }
      return result;
    },
  };
}

export class GoogleVisionService implements VisionService {
  constructor(
    private transport: VisionTransport,
    private options: GoogleVisionOptions,
    private logger: Logger
  ) {}

  async annotate(image: Buffer): Promise<VisionResult> {
    const request = this.buildRequest(image);

    try {
      const response = await retryWithDelay(
        async (attempt) => {
          this.logger.debug({ attempt, bytes: image.length }, 'Vision request');
          try {
            return await this.transport.annotate(request);
          } catch (error) {
            throw toAnnotationError(error, 'vision');
          }
        },
        {
          attempts: this.options.retryCount,
          delayMs: this.options.retryDelayMs,
          sleep: this.options.sleep,
          shouldRetry: (error) =>
            !(error instanceof AnnotationError) || error.retryable,
          onRetry: (error, attempt, delay) =>
            this.logger.warn(
              { attempt, delayMs: delay, error: errorMessage(error) },
              'Vision request failed, retrying'
            ),
        }
      );
      const result = this.mapResponse(response);
      this.logger.trace({ vision: result }, 'Vision response');
      return result;
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        'Vision annotation unavailable, continuing without it'
      );
      return emptyVisionResult();
    }
  }

  private buildRequest(image: Buffer): vision_v1.Schema$AnnotateImageRequest {
    const maxResults = this.options.maxResults;
    return {
      image: { content: image.toString('base64') },
      features: [
        { type: 'LABEL_DETECTION', maxResults },
        { type: 'WEB_DETECTION', maxResults },
        { type: 'IMAGE_PROPERTIES' },
        { type: 'OBJECT_LOCALIZATION', maxResults },
        { type: 'LANDMARK_DETECTION', maxResults },
      ],
    };
  }

  private mapResponse(response: vision_v1.Schema$AnnotateImageResponse): VisionResult {
    const colors: DominantColor[] = (
      response.imagePropertiesAnnotation?.dominantColors?.colors ?? []
    ).map((info) => ({
      hex: toHex(info.color),
      score: info.score ?? 0,
      pixelFraction: info.pixelFraction ?? 0,
    }));

    return {
      labels: toScoredLabels(response.labelAnnotations),
      webEntities: (response.webDetection?.webEntities ?? [])
        .map((entity) => entity.description)
        .filter((description): description is string => !!description),
      colors,
      objects: (response.localizedObjectAnnotations ?? [])
        .filter((object) => !!object.name)
        .map((object) => ({ name: object.name ?? '', score: object.score ?? 0 })),
      landmarks: toScoredLabels(response.landmarkAnnotations),
    };
  }
}

function toScoredLabels(
  annotations: vision_v1.Schema$EntityAnnotation[] | undefined
): ScoredLabel[] {
  return (annotations ?? [])
    .filter((annotation) => !!annotation.description)
    .map((annotation) => ({
      description: annotation.description ?? '',
      score: annotation.score ?? 0,
    }));
}

function toHex(color: vision_v1.Schema$Color | undefined): string {
  const channel = (value: number | null | undefined) =>
    Math.round(Math.max(0, Math.min(255, value ?? 0)))
      .toString(16)
      .padStart(2, '0');
  return `#${channel(color?.red)}${channel(color?.green)}${channel(color?.blue)}`;
}
