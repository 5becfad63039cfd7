import { ScanError } from './errors.js';
import type { ImageFetcher } from './ImageFetcher.js';
import type { Logger } from './logger.js';
import type { ResultSink } from './ResultSink.js';
import type { TextExtractor } from './TextExtractor.js';
import type { ScanRequest, SinkOutcome } from './types.js';

export interface EmailScannerOptions {
  fetcher: ImageFetcher;
  extractor: TextExtractor;
  sink: ResultSink;
  logger: Logger;
}

/**
 * Runs one image through fetch -> OCR -> extract -> emit.
 *
 * Stages run strictly in order and a failure stops the run: nothing is
 * recognised after a failed fetch and nothing is written after a failed
 * extraction. Errors surface as `ScanError`s, never retried.
 */
export class EmailScanner {
  private readonly fetcher: ImageFetcher;
  private readonly extractor: TextExtractor;
  private readonly sink: ResultSink;
  private readonly logger: Logger;

  constructor(options: EmailScannerOptions) {
    this.fetcher = options.fetcher;
    this.extractor = options.extractor;
    this.sink = options.sink;
    this.logger = options.logger.child({ component: 'scanner' });
  }

  async scan(request: ScanRequest): Promise<SinkOutcome> {
    const source = request.source.trim();
    if (!source) {
      throw new ScanError('InvalidInput', 'Missing input: an image path or URL is required.');
    }

    const outputPath = request.outputPath?.trim() || undefined;
    this.logger.debug({ source, outputPath }, 'Scan started');

    const bytes = await this.fetcher.fetch(source, { signal: request.signal });
    const emails = await this.extractor.extract(bytes, source);
    return this.sink.emit(emails, outputPath);
  }
}
