import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { ImageNormalizer } from '../services/image/ImageNormalizer';
import type {
  GenerativeRequest,
  GenerativeService,
  GenerativeTransport,
} from '../services/llm/GenerativeService';
import { MetadataWriter } from '../services/metadata/MetadataWriter';
import { FileRenamer } from '../services/tagger/FileRenamer';
import { PhotoTagger, type TaggerOptions } from '../services/tagger/PhotoTagger';
import { emptyVisionResult, type VisionTransport } from '../services/vision/VisionService';
import type { TagRecord } from '../types/image';
import { createSilentLogger, type Logger } from '../utils/logger';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'image-tagger-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeJpeg(filePath: string, width = 64, height = 48): Promise<string> {
  await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } },
  })
    .jpeg()
    .toFile(filePath);
  return filePath;
}

export async function writePng(
  filePath: string,
  width = 64,
  height = 48,
  alpha = false
): Promise<string> {
  await sharp({
    create: {
      width,
      height,
      channels: alpha ? 4 : 3,
      background: alpha ? { r: 20, g: 120, b: 220, alpha: 0.5 } : { r: 20, g: 120, b: 220 },
    },
  })
    .png()
    .toFile(filePath);
  return filePath;
}

export function sampleRecord(overrides: Partial<TagRecord> = {}): TagRecord {
  return {
    title: 'Coucher de soleil',
    description: 'Un soleil orange descend sur la mer.',
    comment: 'La journée se retire en silence.',
    story: 'Ce soir-là, le port attendait les barques.',
    mainCategory: 'Paysage',
    secondaryCategory: 'Marine',
    contentKeywords: ['soleil', 'mer'],
    technicalCharacteristics: ['contre-jour'],
    keywords: ['soleil', 'mer', 'contre-jour'],
    ...overrides,
  };
}

export const noSleep = async (): Promise<void> => {};

/** Answers with the queued replies in order; an Error reply is thrown. */
export class FakeGenerativeTransport implements GenerativeTransport {
  readonly requests: GenerativeRequest[] = [];

  constructor(private replies: (string | Error)[]) {}

  async generate(request: GenerativeRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No reply queued');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export class FakeVisionTransport implements VisionTransport {
  calls = 0;

  constructor(
    private reply: Awaited<ReturnType<VisionTransport['annotate']>> | Error = {}
  ) {}

  async annotate(): Promise<Awaited<ReturnType<VisionTransport['annotate']>>> {
    this.calls++;
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export function modelAnswer(fields: Record<string, unknown>): string {
  return JSON.stringify({
    title: 'Coucher de soleil',
    description: 'Un soleil orange descend sur la mer.',
    comment: 'La journée se retire en silence.',
    story: 'Le port attendait les barques.',
    main_genre: 'Paysage',
    secondary_genre: 'Marine',
    content_keywords: ['soleil', 'mer'],
    technical_characteristics: ['contre-jour'],
    ...fields,
  });
}

export function buildTestTagger(
  options: Partial<TaggerOptions> = {},
  generative: GenerativeService = { generate: async () => sampleRecord() },
  logger: Logger = createSilentLogger()
): PhotoTagger {
  return new PhotoTagger(
    {
      normalizer: new ImageNormalizer(logger),
      vision: { annotate: async () => emptyVisionResult() },
      generative,
      metadata: new MetadataWriter(logger),
      renamer: new FileRenamer(logger),
      logger,
    },
    { rename: true, backup: false, maxFileSizeMb: 20, ...options }
  );
}
