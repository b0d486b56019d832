/**
 * Error types shared by the tagger. Every error carries a stable `code` and
 * a `details` bag that ends up in the failed job's result entry.
 */

export class ImageTaggerError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    options: { code?: string; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code ?? new.target.name;
    this.details = options.details ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      error_type: this.name,
      error_code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigurationError extends ImageTaggerError {}

export class CredentialsError extends ImageTaggerError {}

export class ValidationError extends ImageTaggerError {
  constructor(message: string, public readonly field: string, value?: unknown) {
    super(message, {
      details: {
        field,
        value: value === undefined ? undefined : String(value),
      },
    });
  }
}

export class FileProcessingError extends ImageTaggerError {
  constructor(
    message: string,
    public readonly filePath: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, { details: { file_path: filePath, ...details } });
  }
}

export class FileNotFoundError extends FileProcessingError {}

export class UnsupportedFormatError extends FileProcessingError {}

export class FileSizeError extends FileProcessingError {
  constructor(filePath: string, sizeBytes: number, maxBytes: number) {
    super(
      `File too large: ${(sizeBytes / (1024 * 1024)).toFixed(2)}MB. Maximum allowed: ${(
        maxBytes /
        (1024 * 1024)
      ).toFixed(0)}MB`,
      filePath,
      { file_size: sizeBytes, max_size: maxBytes }
    );
  }
}

export type AnnotationService = 'vision' | 'generative';

export class AnnotationError extends ImageTaggerError {
  constructor(
    message: string,
    public readonly service: AnnotationService,
    public readonly statusCode?: number,
    public readonly retryable: boolean = true,
    cause?: unknown
  ) {
    super(message, {
      details: { service, status_code: statusCode, retryable },
      cause,
    });
  }
}

export class ResponseParseError extends ImageTaggerError {
  constructor(message: string, rawContent: string) {
    super(message, { details: { raw_content_preview: rawContent.slice(0, 500) } });
  }
}

export class RunInterruptedError extends ImageTaggerError {
  constructor(public readonly completed: number, public readonly total: number) {
    super(`Run interrupted after ${completed}/${total} images`, {
      details: { completed, total },
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node's fs errors expose the errno name on `code`. */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** HTTP status carried by a gaxios or @google/genai error, when there is one. */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

export function isRetryableStatus(status: number | undefined): boolean {
  return status === undefined || status === 408 || status === 429 || status >= 500;
}

export function toAnnotationError(
  error: unknown,
  service: AnnotationService
): AnnotationError {
  if (error instanceof AnnotationError) return error;
  const status = httpStatusOf(error);
  return new AnnotationError(
    `${service} request failed: ${errorMessage(error)}`,
    service,
    status,
    isRetryableStatus(status),
    error
  );
}
