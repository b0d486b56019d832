import { GoogleGenAI } from '@google/genai';
import type { Language } from '../../types/config';
import type { TagRecord, VisionResult } from '../../types/image';
import {
  AnnotationError,
  errorMessage,
  ResponseParseError,
  toAnnotationError,
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { retryWithDelay, type Sleep } from '../../utils/retry';
import type {
  GenerativeRequest,
  GenerativeService,
  GenerativeTransport,
} from './GenerativeService';
import {
  buildCommentPrompt,
  buildTaggingPrompt,
  commentInstruction,
  systemInstruction,
} from './prompts';
import { type JsonObject, parseModelResponse } from './responseParser';
import { defaultTagRecord, repairTagRecord } from './tagRecord';

export interface VertexOptions {
  credentialsPath: string;
  projectId: string;
  location: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export function createGeminiTransport(options: VertexOptions, logger: Logger): GenerativeTransport {
  const client = new GoogleGenAI({
    vertexai: true,
    project: options.projectId,
    location: options.location,
    googleAuthOptions: { keyFile: options.credentialsPath },
  });

  return {
    async generate(request) {
      logger.debug(
        { model: options.model, bytes: request.image.data.length, json: request.json },
        'models.generateContent request'
      );
      const result = await client.models.generateContent({
        model: options.model,
        contents: [
          {
            role: 'user',
            parts: [
              {
                inlineData: {
                  mimeType: request.image.mimeType,
                  data: request.image.data.toString('base64'),
                },
              },
              { text: request.prompt },
            ],
          },
        ],
        config: {
          systemInstruction: request.systemInstruction,
          temperature: options.temperature,
          responseMimeType: request.json ? 'application/json' : 'text/plain',
          httpOptions: { timeout: options.timeoutMs },
        },
      });

      logger.debug(
        { modelVersion: result.modelVersion, usage: result.usageMetadata },
        'models.generateContent response'
      );
      logger.trace({ candidates: result.candidates }, 'models.generateContent body');
      const text = result.text?.trim();
      if (!text) {
        throw new AnnotationError('Gemini returned empty response', 'generative');
      }
      return text;
    },
  };
}

export interface GeminiServiceOptions {
  language: Language;
  retryCount: number;
  retryDelayMs: number;
  sleep?: Sleep;
}

export class GeminiService implements GenerativeService {
  constructor(
    private transport: GenerativeTransport,
    private options: GeminiServiceOptions,
    private logger: Logger
  ) {}

  async generate(image: Buffer, mimeType: string, vision: VisionResult): Promise<TagRecord> {
    const { language } = this.options;
    const request: GenerativeRequest = {
      prompt: buildTaggingPrompt(vision, language),
      image: { data: image, mimeType },
      systemInstruction: systemInstruction(language),
      json: true,
    };

    let raw: JsonObject;
    try {
      raw = await retryWithDelay(
        async (attempt) => {
          this.logger.debug({ attempt, bytes: image.length }, 'Generative request');
          const text = await this.callTransport(request);
          this.logger.trace({ attempt, response: text }, 'Generative response');
          const parsed = parseModelResponse(text);
          if (!parsed.title || !parsed.description) {
            throw new ResponseParseError('Model response lacks title or description', text);
          }
          return parsed;
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
              'Generative request failed, retrying'
            ),
        }
      );
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error) },
        'Generative annotation failed, using default record'
      );
      return defaultTagRecord(language, errorMessage(error));
    }

    const record = repairTagRecord(raw, language);
    if (!record.comment) {
      record.comment = await this.generateComment(record.title, image, mimeType);
    }
    return record;
  }

  /** Single best-effort call; any failure yields an empty comment. */
  private async generateComment(
    title: string,
    image: Buffer,
    mimeType: string
  ): Promise<string> {
    const { language } = this.options;
    try {
      const text = await this.callTransport({
        prompt: buildCommentPrompt(title, language),
        image: { data: image, mimeType },
        systemInstruction: commentInstruction(language),
        json: false,
      });
      return text.replace(/^["«\s]+|["»\s]+$/g, '');
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Comment generation failed');
      return '';
    }
  }

  private async callTransport(request: GenerativeRequest): Promise<string> {
    try {
      return await this.transport.generate(request);
    } catch (error) {
      throw toAnnotationError(error, 'generative');
    }
  }
}
