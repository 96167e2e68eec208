// Error and diagnostic types

export type PiplErrorCode =
  | 'FORMAT_DETECTION'
  | 'STRUCTURAL_BOUNDS'
  | 'PROPERTY_VALIDATION'
  | 'DECODE_AMBIGUITY'
  | 'FILE_READ';

export class PiplError extends Error {
  readonly code: PiplErrorCode;

  constructor(code: PiplErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'PiplError';
  }
}

export class FormatDetectionError extends PiplError {
  constructor(message = 'No container signature matched', readonly path?: string) {
    super('FORMAT_DETECTION', message);
    this.name = 'FormatDetectionError';
  }
}

/** Thrown by the reader when an offset/length pair falls outside the buffer. */
export class StructuralBoundsError extends PiplError {
  constructor(readonly offset: number, readonly size: number, readonly bufferLength: number) {
    super(
      'STRUCTURAL_BOUNDS',
      `read of ${size} bytes at offset ${offset} exceeds buffer of ${bufferLength} bytes`
    );
    this.name = 'StructuralBoundsError';
  }
}

export class PropertyValidationError extends PiplError {
  constructor(message: string, readonly offset: number) {
    super('PROPERTY_VALIDATION', message);
    this.name = 'PropertyValidationError';
  }
}

/**
 * Not thrown: recorded when a decoder had to substitute a best-effort value.
 */
export class DecodeAmbiguityWarning extends PiplError {
  constructor(message: string) {
    super('DECODE_AMBIGUITY', message);
    this.name = 'DecodeAmbiguityWarning';
  }
}

export class FileReadError extends PiplError {
  constructor(readonly path: string, cause: unknown) {
    super('FILE_READ', `Cannot read ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'FileReadError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
