import { describe, expect, it } from 'vitest';
import { crc32 } from '../crc32';
import {
  internationalTextChunk,
  type PngChunk,
  readTextChunk,
  readTextChunks,
  replaceTextChunks,
  textChunk,
} from '../png';

describe('png chunks', () => {
  it('computes the standard CRC-32', () => {
    expect(crc32(Buffer.from('IEND'))).toBe(0xae426082);
    expect(crc32(Buffer.from('IE'), Buffer.from('ND'))).toBe(0xae426082);
  });

  it('uses tEXt for Latin-1 values and iTXt otherwise', () => {
    expect(textChunk('Title', 'Été à Nice').type).toBe('tEXt');
    const chunk = textChunk('Title', 'Tōkyō');
    expect(chunk.type).toBe('iTXt');
    expect(readTextChunk(chunk)).toEqual({ keyword: 'Title', text: 'Tōkyō' });
  });

  it('replaces matching text chunks before the first IDAT', () => {
    const chunks: PngChunk[] = [
      { type: 'IHDR', data: Buffer.alloc(13) },
      textChunk('Title', 'old'),
      textChunk('Software', 'editor'),
      { type: 'IDAT', data: Buffer.from([1]) },
      { type: 'IEND', data: Buffer.alloc(0) },
    ];

    const updated = replaceTextChunks(chunks, new Set(['Title']), [
      internationalTextChunk('Title', 'new'),
    ]);

    expect(updated.map((chunk) => chunk.type)).toEqual(['IHDR', 'tEXt', 'iTXt', 'IDAT', 'IEND']);
    expect(readTextChunks(updated)).toEqual({ Software: 'editor', Title: 'new' });
  });
});
