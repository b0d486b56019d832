import type { TagRecord, VisionResult } from '../../types/image';

export interface InlineImage {
  data: Buffer;
  mimeType: string;
}

export interface GenerativeRequest {
  prompt: string;
  image: InlineImage;
  systemInstruction: string;
  /** Ask the model for a JSON document rather than free text. */
  json: boolean;
}

/** One generateContent round trip returning the answer's text. */
export interface GenerativeTransport {
  generate(request: GenerativeRequest): Promise<string>;
}

export interface GenerativeService {
  /** Never rejects: exhausted retries resolve to a default record carrying `generationError`. */
  generate(image: Buffer, mimeType: string, vision: VisionResult): Promise<TagRecord>;
}
