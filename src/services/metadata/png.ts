import zlib from 'zlib';
import { crc32 } from './crc32';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
export const XMP_KEYWORD = 'XML:com.adobe.xmp';

export interface PngChunk {
  type: string;
  data: Buffer;
}

export function isPng(buffer: Buffer): boolean {
  return buffer.length >= 8 && buffer.subarray(0, 8).equals(PNG_SIGNATURE);
}

export function parsePng(buffer: Buffer): PngChunk[] {
  if (!isPng(buffer)) {
    throw new Error('Not a PNG file');
  }

  const chunks: PngChunk[] = [];
  let offset = PNG_SIGNATURE.length;
  while (offset + 12 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const type = buffer.subarray(offset + 4, offset + 8).toString('latin1');
    const end = offset + 12 + length;
    if (end > buffer.length) {
      throw new Error(`Truncated PNG chunk ${type}`);
    }
    chunks.push({ type, data: buffer.subarray(offset + 8, offset + 8 + length) });
    offset = end;
    if (type === 'IEND') return chunks;
  }

  throw new Error('PNG has no IEND chunk');
}

export function serializePng(chunks: PngChunk[]): Buffer {
  const parts: Buffer[] = [PNG_SIGNATURE];
  for (const chunk of chunks) {
    const length = Buffer.alloc(4);
    length.writeUInt32BE(chunk.data.length);
    const type = Buffer.from(chunk.type, 'latin1');
    const crc = Buffer.alloc(4);
    crc.writeUInt32BE(crc32(type, chunk.data));
    parts.push(length, type, chunk.data, crc);
  }
  return Buffer.concat(parts);
}

const isLatin1 = (value: string) => /^[\x00-\xff]*$/.test(value);

/** tEXt when the value is Latin-1, iTXt (UTF-8) otherwise. */
export function textChunk(keyword: string, value: string): PngChunk {
  if (isLatin1(value)) {
    return {
      type: 'tEXt',
      data: Buffer.concat([Buffer.from(`${keyword}\0`, 'latin1'), Buffer.from(value, 'latin1')]),
    };
  }
  return internationalTextChunk(keyword, value);
}

export function internationalTextChunk(keyword: string, value: string): PngChunk {
  return {
    type: 'iTXt',
    data: Buffer.concat([
      Buffer.from(`${keyword}\0`, 'latin1'),
      // uncompressed, empty language tag and translated keyword
      Buffer.from([0, 0, 0, 0]),
      Buffer.from(value, 'utf8'),
    ]),
  };
}

/** Decodes tEXt, zTXt and iTXt chunks; returns undefined for other types. */
export function readTextChunk(chunk: PngChunk): { keyword: string; text: string } | undefined {
  const nul = chunk.data.indexOf(0);
  if (nul < 0) return undefined;
  const keyword = chunk.data.subarray(0, nul).toString('latin1');

  switch (chunk.type) {
    case 'tEXt':
      return { keyword, text: chunk.data.subarray(nul + 1).toString('latin1') };
    case 'zTXt':
      return { keyword, text: zlib.inflateSync(chunk.data.subarray(nul + 2)).toString('latin1') };
    case 'iTXt': {
      const compressed = chunk.data[nul + 1] === 1;
      const languageEnd = chunk.data.indexOf(0, nul + 3);
      const translatedEnd = languageEnd < 0 ? -1 : chunk.data.indexOf(0, languageEnd + 1);
      if (translatedEnd < 0) return undefined;
      const body = chunk.data.subarray(translatedEnd + 1);
      return {
        keyword,
        text: (compressed ? zlib.inflateSync(body) : body).toString('utf8'),
      };
    }
    default:
      return undefined;
  }
}

/**
 * Drops text chunks whose keyword is in `keywords` and inserts `additions`
 * before the first IDAT.
 */
export function replaceTextChunks(
  chunks: PngChunk[],
  keywords: Set<string>,
  additions: PngChunk[]
): PngChunk[] {
  const kept = chunks.filter((chunk) => {
    const text = readTextChunk(chunk);
    return !text || !keywords.has(text.keyword);
  });
  const idat = kept.findIndex((chunk) => chunk.type === 'IDAT');
  const index = idat >= 0 ? idat : kept.length - 1;
  return [...kept.slice(0, index), ...additions, ...kept.slice(index)];
}

export function readTextChunks(chunks: PngChunk[]): Record<string, string> {
  const texts: Record<string, string> = {};
  for (const chunk of chunks) {
    const text = readTextChunk(chunk);
    if (text) texts[text.keyword] = text.text;
  }
  return texts;
}
