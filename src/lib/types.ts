/**
 * Final disposition of one scan, as reported by the `ResultSink`.
 */
export type SinkOutcome =
  | { kind: 'empty' }
  | { kind: 'printed'; count: number }
  | { kind: 'written'; count: number; path: string };

/**
 * Input for a single pipeline run.
 */
export interface ScanRequest {
  /** Local file path or http(s) URL of the image. */
  source: string;
  /** File to receive the addresses. When omitted they are printed instead. */
  outputPath?: string;
  /** Aborts an in-flight download. */
  signal?: AbortSignal;
}

/**
 * Minimal writable surface used for console output, so tests can capture it.
 */
export interface TextOutput {
  write(chunk: string): unknown;
}

/**
 * A text recognition backend. `load` is idempotent and must be awaited before
 * `recognize`; `destroy` releases the backend's workers.
 */
export interface OcrEngine {
  readonly id: string;
  load(): Promise<void>;
  /**
   * @param image An encoded image (PNG from the preprocessor).
   * @returns The plain-text transcription.
   */
  recognize(image: Buffer): Promise<string>;
  destroy(): Promise<void>;
}
