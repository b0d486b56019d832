import type { EmbeddedMetadata } from '../../types/image';

/**
 * IPTC-IIM records and the Photoshop image-resource block (APP13) that
 * carries them inside a JPEG.
 */

export type IptcFields = EmbeddedMetadata['iptc'];

const TAG_MARKER = 0x1c;
/** ESC % G: the record-2 values that follow are UTF-8. */
const UTF8_MARKER = Buffer.from([0x1b, 0x25, 0x47]);
const MAX_DATASET_LENGTH = 0x7fff;

export const IIM = {
  codedCharacterSet: [1, 90],
  recordVersion: [2, 0],
  objectName: [2, 5],
  category: [2, 15],
  supplementalCategory: [2, 20],
  keywords: [2, 25],
  headline: [2, 105],
  caption: [2, 120],
} as const;

interface Dataset {
  record: number;
  dataset: number;
  value: Buffer;
}

function dataset([record, number]: readonly [number, number], value: Buffer): Dataset {
  return { record, dataset: number, value };
}

/** Cuts a UTF-8 string to `maxBytes` without splitting a code point. */
export function truncateUtf8(value: string, maxBytes: number): Buffer {
  const encoded = Buffer.from(value, 'utf8');
  if (encoded.length <= maxBytes) return encoded;
  let end = maxBytes;
  while (end > 0 && (encoded[end] & 0xc0) === 0x80) end--;
  return encoded.subarray(0, end);
}

export function encodeIptc(fields: IptcFields): Buffer {
  const text = (id: readonly [number, number], value: string) =>
    dataset(id, truncateUtf8(value, MAX_DATASET_LENGTH));

  const datasets: Dataset[] = [
    dataset(IIM.codedCharacterSet, UTF8_MARKER),
    dataset(IIM.recordVersion, Buffer.from([0x00, 0x04])),
  ];
  if (fields.objectName) datasets.push(text(IIM.objectName, fields.objectName));
  if (fields.category) datasets.push(text(IIM.category, fields.category));
  if (fields.supplementalCategory) {
    datasets.push(text(IIM.supplementalCategory, fields.supplementalCategory));
  }
  for (const keyword of fields.keywords) datasets.push(text(IIM.keywords, keyword));
  if (fields.headline) datasets.push(text(IIM.headline, fields.headline));
  if (fields.caption) datasets.push(text(IIM.caption, fields.caption));

  return Buffer.concat(
    datasets.map(({ record, dataset: number, value }) => {
      const header = Buffer.alloc(5);
      header[0] = TAG_MARKER;
      header[1] = record;
      header[2] = number;
      header.writeUInt16BE(value.length, 3);
      return Buffer.concat([header, value]);
    })
  );
}

export function decodeIptc(data: Buffer): IptcFields {
  const fields: IptcFields = { keywords: [] };
  let offset = 0;

  while (offset + 5 <= data.length && data[offset] === TAG_MARKER) {
    const record = data[offset + 1];
    const number = data[offset + 2];
    const length = data.readUInt16BE(offset + 3);
    if (length & 0x8000) {
      throw new Error('Extended IPTC datasets are not supported');
    }
    const end = offset + 5 + length;
    if (end > data.length) {
      throw new Error('Truncated IPTC dataset');
    }
    const value = data.subarray(offset + 5, end).toString('utf8');
    offset = end;

    if (record !== 2) continue;
    switch (number) {
      case IIM.objectName[1]:
        fields.objectName = value;
        break;
      case IIM.category[1]:
        fields.category = value;
        break;
      case IIM.supplementalCategory[1]:
        fields.supplementalCategory = value;
        break;
      case IIM.keywords[1]:
        fields.keywords.push(value);
        break;
      case IIM.headline[1]:
        fields.headline = value;
        break;
      case IIM.caption[1]:
        fields.caption = value;
        break;
    }
  }

  return fields;
}

export const PHOTOSHOP_HEADER = Buffer.from('Photoshop 3.0\0', 'latin1');
const RESOURCE_SIGNATURE = Buffer.from('8BIM', 'latin1');
export const IPTC_RESOURCE_ID = 0x0404;

export interface ImageResource {
  id: number;
  /** Pascal-string name bytes, without the length prefix. */
  name: Buffer;
  data: Buffer;
}

/** Parses the body of an APP13 segment that follows `Photoshop 3.0\0`. */
export function parseImageResources(block: Buffer): ImageResource[] {
  const resources: ImageResource[] = [];
  let offset = 0;

  while (offset + 4 <= block.length) {
    if (!block.subarray(offset, offset + 4).equals(RESOURCE_SIGNATURE)) {
      throw new Error(`Invalid Photoshop resource signature at offset ${offset}`);
    }
    const id = block.readUInt16BE(offset + 4);
    const nameLength = block[offset + 6];
    const name = block.subarray(offset + 7, offset + 7 + nameLength);
    offset += 6 + pad(1 + nameLength);
    const size = block.readUInt32BE(offset);
    offset += 4;
    if (offset + size > block.length) {
      throw new Error('Truncated Photoshop resource');
    }
    resources.push({ id, name, data: block.subarray(offset, offset + size) });
    offset += pad(size);
  }

  return resources;
}

export function serializeImageResources(resources: ImageResource[]): Buffer {
  const parts: Buffer[] = [];
  for (const resource of resources) {
    const head = Buffer.alloc(6);
    RESOURCE_SIGNATURE.copy(head);
    head.writeUInt16BE(resource.id, 4);
    const name = Buffer.alloc(pad(1 + resource.name.length));
    name[0] = resource.name.length;
    resource.name.copy(name, 1);
    const size = Buffer.alloc(4);
    size.writeUInt32BE(resource.data.length);
    parts.push(head, name, size, resource.data);
    if (resource.data.length % 2 === 1) parts.push(Buffer.alloc(1));
  }
  return Buffer.concat(parts);
}

function pad(length: number): number {
  return length + (length % 2);
}
