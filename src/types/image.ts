/** Width and height in pixels; `[0, 0]` when the image could not be decoded. */
export type Dimensions = [number, number];

export interface ImageJob {
  sourcePath: string;
  extension: string;
  mimeType: string;
  sizeBytes: number;
}

export interface NormalizedImage {
  data: Buffer;
  mimeType: string;
  /** Dimensions of the buffer that is uploaded. */
  dimensions: Dimensions;
  originalDimensions: Dimensions;
  resized: boolean;
}

export interface ScoredLabel {
  description: string;
  score: number;
}

export interface DetectedObject {
  name: string;
  score: number;
}

export interface DominantColor {
  hex: string;
  score: number;
  pixelFraction: number;
}

export interface VisionResult {
  labels: ScoredLabel[];
  webEntities: string[];
  colors: DominantColor[];
  objects: DetectedObject[];
  landmarks: ScoredLabel[];
}

export interface TagRecord {
  title: string;
  description: string;
  comment: string;
  story: string;
  mainCategory: string;
  secondaryCategory: string;
  contentKeywords: string[];
  technicalCharacteristics: string[];
  /** Content keywords then technical characteristics, de-duplicated. */
  keywords: string[];
  /** Set when the generative call gave up and the record holds defaults. */
  generationError?: string;
}

export interface ProcessingSuccess {
  original_file: string;
  new_file: string;
  path: string;
  original_dimensions: Dimensions;
  upload_dimensions: Dimensions;
  title: string;
  description: string;
  comment: string;
  story: string;
  main_genre: string;
  secondary_genre: string;
  content_keywords: string[];
  technical_characteristics: string[];
  keywords: string[];
  generation_error?: string;
  backup_path?: string;
  metadata_written: boolean;
  processing_time: number;
}

export interface ProcessingFailure {
  original_file: string;
  path: string;
  error: string;
  error_type: string;
  error_details?: Record<string, unknown>;
  processing_time: number;
}

export type ProcessingResult = ProcessingSuccess | ProcessingFailure;

export function isFailure(result: ProcessingResult): result is ProcessingFailure {
  return 'error' in result;
}

export interface EmbeddedMetadata {
  format: 'jpeg' | 'png';
  title?: string;
  headline?: string;
  description?: string;
  keywords: string[];
  category?: string;
  supplementalCategories: string[];
  instructions?: string;
  iptc: {
    objectName?: string;
    headline?: string;
    caption?: string;
    keywords: string[];
    category?: string;
    supplementalCategory?: string;
  };
  /** Plain tEXt/iTXt chunks of a PNG, keyed by chunk keyword. */
  text: Record<string, string>;
}
