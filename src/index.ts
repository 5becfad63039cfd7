/**
 * @module imgmail
 * This is the main library entry point.
 * It exports the pipeline stages so the scanner can be embedded in other tools.
 */

// --- Library Exports ---
export {
  VALID_IMAGE_EXTENSIONS,
  isRemoteSource,
  isValidImage,
  sourceExtension,
} from './lib/SourceValidator.js';
export { ImageFetcher } from './lib/ImageFetcher.js';
export type { FetchOptions, ImageFetcherOptions } from './lib/ImageFetcher.js';
export { ImagePreprocessor } from './lib/ImagePreprocessor.js';
export type { ImagePreprocessorOptions } from './lib/ImagePreprocessor.js';
export { TesseractEngine } from './lib/TesseractEngine.js';
export type { TesseractEngineOptions } from './lib/TesseractEngine.js';
export { TextExtractor, extractEmails } from './lib/TextExtractor.js';
export type { TextExtractorOptions } from './lib/TextExtractor.js';
export { ResultSink } from './lib/ResultSink.js';
export type { ResultSinkOptions } from './lib/ResultSink.js';
export { EmailScanner } from './lib/EmailScanner.js';
export type { EmailScannerOptions } from './lib/EmailScanner.js';
export { EXIT_CODES, ScanError, exitCodeFor, isScanError } from './lib/errors.js';
export type { ScanErrorKind, ScanErrorOptions } from './lib/errors.js';
export { createLogger } from './lib/logger.js';
export type { LogLevel, Logger, LoggerOptions } from './lib/logger.js';
export { loadConfig } from './lib/config.js';
export type { AppConfig } from './lib/config.js';
export type { OcrEngine, ScanRequest, SinkOutcome, TextOutput } from './lib/types.js';
