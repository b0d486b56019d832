import type { vision_v1 } from 'googleapis';
import type { VisionResult } from '../../types/image';

/** One `images:annotate` round trip; implemented over googleapis or a fake. */
export interface VisionTransport {
  annotate(
    request: vision_v1.Schema$AnnotateImageRequest
  ): Promise<vision_v1.Schema$AnnotateImageResponse>;
}

export interface VisionService {
  /** Never rejects: exhausted retries resolve to an empty result. */
  annotate(image: Buffer): Promise<VisionResult>;
}

export function emptyVisionResult(): VisionResult {
  return {
    labels: [],
    webEntities: [],
    colors: [],
    objects: [],
    landmarks: [],
  };
}
