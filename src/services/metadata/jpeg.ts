import {
  decodeIptc,
  encodeIptc,
  type ImageResource,
  IPTC_RESOURCE_ID,
  type IptcFields,
  parseImageResources,
  PHOTOSHOP_HEADER,
  serializeImageResources,
} from './iptc';
import { XMP_NAMESPACE } from './xmp';

export const SOI = 0xd8;
const SOS = 0xda;
const EOI = 0xd9;
export const APP1 = 0xe1;
export const APP13 = 0xed;
const MAX_SEGMENT_DATA = 0xffff - 2;

const XMP_HEADER = Buffer.from(`${XMP_NAMESPACE}\0`, 'latin1');
const EXIF_HEADER = Buffer.from('Exif\0\0', 'latin1');

export interface JpegSegment {
  marker: number;
  /** Payload without the marker and length bytes. */
  data: Buffer;
}

/** Header segments up to the first scan; `tail` holds SOS onwards untouched. */
export interface JpegFile {
  segments: JpegSegment[];
  tail: Buffer;
}

export function isJpeg(buffer: Buffer): boolean {
  return buffer.length >= 3 && buffer[0] === 0xff && buffer[1] === SOI && buffer[2] === 0xff;
}

function isStandalone(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

export function parseJpeg(buffer: Buffer): JpegFile {
  if (!isJpeg(buffer)) {
    throw new Error('Not a JPEG file');
  }

  const segments: JpegSegment[] = [];
  let offset = 2;

  while (offset < buffer.length) {
    if (buffer[offset] !== 0xff) {
      throw new Error(`Expected JPEG marker at offset ${offset}`);
    }
    while (buffer[offset + 1] === 0xff) offset++;
    const marker = buffer[offset + 1];

    if (marker === SOS || marker === EOI) {
      return { segments, tail: buffer.subarray(offset) };
    }
    if (isStandalone(marker)) {
      segments.push({ marker, data: Buffer.alloc(0) });
      offset += 2;
      continue;
    }
    if (offset + 4 > buffer.length) {
      throw new Error('Truncated JPEG segment header');
    }
    const length = buffer.readUInt16BE(offset + 2);
    if (length < 2 || offset + 2 + length > buffer.length) {
      throw new Error(`Invalid length ${length} for JPEG segment 0x${marker.toString(16)}`);
    }
    segments.push({ marker, data: buffer.subarray(offset + 4, offset + 2 + length) });
    offset += 2 + length;
  }

  throw new Error('JPEG ended before the first scan');
}

export function serializeJpeg(file: JpegFile): Buffer {
  const parts: Buffer[] = [Buffer.from([0xff, SOI])];
  for (const segment of file.segments) {
    if (isStandalone(segment.marker)) {
      parts.push(Buffer.from([0xff, segment.marker]));
      continue;
    }
    if (segment.data.length > MAX_SEGMENT_DATA) {
      throw new Error(`JPEG segment 0x${segment.marker.toString(16)} exceeds 64KB`);
    }
    const head = Buffer.from([0xff, segment.marker, 0, 0]);
    head.writeUInt16BE(segment.data.length + 2, 2);
    parts.push(head, segment.data);
  }
  parts.push(file.tail);
  return Buffer.concat(parts);
}

function startsWith(data: Buffer, header: Buffer): boolean {
  return data.length >= header.length && data.subarray(0, header.length).equals(header);
}

const isXmpSegment = (segment: JpegSegment) =>
  segment.marker === APP1 && startsWith(segment.data, XMP_HEADER);

const isPhotoshopSegment = (segment: JpegSegment) =>
  segment.marker === APP13 && startsWith(segment.data, PHOTOSHOP_HEADER);

/** Checks that an Exif block, when present, opens with a TIFF header. */
export function assertReadableExif(file: JpegFile): void {
  for (const segment of file.segments) {
    if (segment.marker !== APP1 || !startsWith(segment.data, EXIF_HEADER)) continue;
    const tiff = segment.data.subarray(EXIF_HEADER.length, EXIF_HEADER.length + 4).toString('latin1');
    if (tiff !== 'II*\0' && tiff !== 'MM\0*') {
      throw new Error('Malformed EXIF block');
    }
  }
}

/** Index right after the leading run of APPn segments. */
function insertionIndex(segments: JpegSegment[]): number {
  let index = 0;
  while (
    index < segments.length &&
    segments[index].marker >= 0xe0 &&
    segments[index].marker <= 0xef
  ) {
    index++;
  }
  return index;
}

/** Replaces any existing XMP segment with `packet`. */
export function setXmp(file: JpegFile, packet: string): JpegFile {
  const data = Buffer.concat([XMP_HEADER, Buffer.from(packet, 'utf8')]);
  if (data.length > MAX_SEGMENT_DATA) {
    throw new Error('XMP packet does not fit in a single APP1 segment');
  }

  const existing = file.segments.findIndex(isXmpSegment);
  const segments = file.segments.filter((segment) => !isXmpSegment(segment));
  const index = existing >= 0 ? existing : insertionIndex(segments);
  segments.splice(index, 0, { marker: APP1, data });
  return { segments, tail: file.tail };
}

export function getXmp(file: JpegFile): string | undefined {
  const segment = file.segments.find(isXmpSegment);
  return segment?.data.subarray(XMP_HEADER.length).toString('utf8');
}

/** Writes the IIM block, keeping every other Photoshop resource as it was. */
export function setIptc(file: JpegFile, fields: IptcFields): JpegFile {
  const index = file.segments.findIndex(isPhotoshopSegment);
  const resources: ImageResource[] =
    index >= 0
      ? parseImageResources(file.segments[index].data.subarray(PHOTOSHOP_HEADER.length))
      : [];

  const iptc: ImageResource = {
    id: IPTC_RESOURCE_ID,
    name: Buffer.alloc(0),
    data: encodeIptc(fields),
  };
  const position = resources.findIndex((resource) => resource.id === IPTC_RESOURCE_ID);
  if (position >= 0) resources[position] = iptc;
  else resources.push(iptc);

  const segment: JpegSegment = {
    marker: APP13,
    data: Buffer.concat([PHOTOSHOP_HEADER, serializeImageResources(resources)]),
  };
  const segments = [...file.segments];
  if (index >= 0) segments[index] = segment;
  else segments.splice(insertionIndex(segments), 0, segment);
  return { segments, tail: file.tail };
}

export function getIptc(file: JpegFile): IptcFields | undefined {
  const segment = file.segments.find(isPhotoshopSegment);
  if (!segment) return undefined;
  const resource = parseImageResources(segment.data.subarray(PHOTOSHOP_HEADER.length)).find(
    (candidate) => candidate.id === IPTC_RESOURCE_ID
  );
  return resource ? decodeIptc(resource.data) : undefined;
}
