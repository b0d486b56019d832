import fs from 'fs/promises';
import type { EmbeddedMetadata, TagRecord } from '../../types/image';
import { writeFileAtomic } from '../../utils/atomicWrite';
import type { IptcFields } from './iptc';
import { assertReadableExif, getIptc, getXmp, isJpeg, parseJpeg, serializeJpeg, setIptc, setXmp } from './jpeg';
import {
  internationalTextChunk,
  isPng,
  parsePng,
  readTextChunks,
  replaceTextChunks,
  serializePng,
  textChunk,
  XMP_KEYWORD,
} from './png';
import { buildXmpPacket, parseXmpPacket, type XmpFields } from './xmp';

export type ImageFormat = EmbeddedMetadata['format'];

export const MINIMAL_KEYWORD_COUNT = 10;

const PNG_TEXT_KEYWORDS = new Set([XMP_KEYWORD, 'Title', 'Description', 'Keywords', 'Author']);

export function detectFormat(buffer: Buffer): ImageFormat {
  if (isJpeg(buffer)) return 'jpeg';
  if (isPng(buffer)) return 'png';
  throw new Error('Unrecognized image container');
}

export function xmpFieldsFor(record: TagRecord): XmpFields {
  return {
    title: record.title,
    headline: record.title,
    description: record.comment
      ? `${record.description}\n\n${record.comment}`
      : record.description,
    keywords: record.keywords,
    category: record.mainCategory,
    supplementalCategories: record.secondaryCategory ? [record.secondaryCategory] : [],
    instructions: record.story || undefined,
  };
}

export function minimalXmpFields(record: TagRecord): XmpFields {
  return {
    title: record.title,
    description: record.description,
    keywords: record.keywords.slice(0, MINIMAL_KEYWORD_COUNT),
  };
}

export function iptcFieldsFor(record: TagRecord): IptcFields {
  return {
    objectName: record.title,
    headline: record.title,
    caption: record.description,
    keywords: record.keywords,
    category: record.mainCategory,
    supplementalCategory: record.secondaryCategory || undefined,
  };
}

function embedPng(buffer: Buffer, fields: XmpFields, author?: string): Buffer {
  const additions = [
    internationalTextChunk(XMP_KEYWORD, buildXmpPacket(fields)),
    textChunk('Title', fields.title),
    textChunk('Description', fields.description),
    textChunk('Keywords', fields.keywords.join(', ')),
  ];
  if (author) additions.push(textChunk('Author', author));
  return serializePng(replaceTextChunks(parsePng(buffer), PNG_TEXT_KEYWORDS, additions));
}

function embedJpeg(buffer: Buffer, fields: XmpFields): Buffer {
  const file = parseJpeg(buffer);
  assertReadableExif(file);
  return serializeJpeg(setXmp(file, buildXmpPacket(fields)));
}

/** Writes the XMP packet (and PNG text chunks) into the file in place. */
export async function embedXmp(
  filePath: string,
  fields: XmpFields,
  author?: string
): Promise<ImageFormat> {
  const buffer = await fs.readFile(filePath);
  const format = detectFormat(buffer);
  const updated = format === 'png' ? embedPng(buffer, fields, author) : embedJpeg(buffer, fields);
  await writeFileAtomic(filePath, updated);
  return format;
}

export async function embedIptc(filePath: string, fields: IptcFields): Promise<void> {
  const file = parseJpeg(await fs.readFile(filePath));
  await writeFileAtomic(filePath, serializeJpeg(setIptc(file, fields)));
}

export async function readEmbeddedMetadata(filePath: string): Promise<EmbeddedMetadata> {
  const buffer = await fs.readFile(filePath);
  const format = detectFormat(buffer);

  let packet: string | undefined;
  let iptc: IptcFields = { keywords: [] };
  let text: Record<string, string> = {};

  if (format === 'jpeg') {
    const file = parseJpeg(buffer);
    packet = getXmp(file);
    iptc = getIptc(file) ?? iptc;
  } else {
    text = readTextChunks(parsePng(buffer));
    packet = text[XMP_KEYWORD];
    delete text[XMP_KEYWORD];
  }

  const xmp = packet ? parseXmpPacket(packet) : { keywords: [], supplementalCategories: [] };
  return { format, ...xmp, iptc, text };
}
