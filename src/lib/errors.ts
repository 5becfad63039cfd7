export type ScanErrorKind =
  | 'InvalidInput'
  | 'FetchFailure'
  | 'ProcessingFailure'
  | 'PersistFailure';

export interface ScanErrorOptions {
  cause?: unknown;
  /** The image source being processed, if any. */
  source?: string;
  /** The output file being written, if any. */
  outputPath?: string;
}

/**
 * Exit codes used by the CLI. Anything that is not a `ScanError` exits with 1.
 */
export const EXIT_CODES: Readonly<Record<ScanErrorKind, number>> = {
  InvalidInput: 2,
  FetchFailure: 3,
  ProcessingFailure: 4,
  PersistFailure: 5,
};

/**
 * The single error type raised by every pipeline stage. Callers branch on
 * `kind` rather than on the message text.
 */
export class ScanError extends Error {
  public readonly kind: ScanErrorKind;
  public readonly source?: string;
  public readonly outputPath?: string;

  constructor(kind: ScanErrorKind, message: string, options: ScanErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ScanError';
    this.kind = kind;
    this.source = options.source;
    this.outputPath = options.outputPath;
  }
}

export function isScanError(value: unknown): value is ScanError {
  return value instanceof ScanError;
}

export function exitCodeFor(error: unknown): number {
  return isScanError(error) ? EXIT_CODES[error.kind] : 1;
}

/**
 * Renders an unknown thrown value as a short message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
