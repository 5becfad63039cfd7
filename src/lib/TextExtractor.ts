import { ScanError, describeError } from './errors.js';
import { ImagePreprocessor } from './ImagePreprocessor.js';
import type { Logger } from './logger.js';
import type { OcrEngine } from './types.js';

// Word characters are unicode letters, digits and underscore. The pattern is
// deliberately loose: it matches the shape of an address, not RFC 5322.
const EMAIL_REGEX = /[\p{L}\p{N}_.+-]+@[\p{L}\p{N}_-]+\.[\p{L}\p{N}_.-]+/gu;

/**
 * Collects every non-overlapping email-shaped substring of `text`, without
 * duplicates, in the order first seen.
 *
 * @example
 * extractEmails('mail a@b.io or A@b.io, again a@b.io'); // ['a@b.io', 'A@b.io']
 */
export function extractEmails(text: string): string[] {
  const unique = new Set<string>();
  for (const match of text.matchAll(EMAIL_REGEX)) {
    unique.add(match[0]);
  }
  return [...unique];
}

export interface TextExtractorOptions {
  engine: OcrEngine;
  logger: Logger;
  preprocessor?: ImagePreprocessor;
}

/**
 * Turns encoded image bytes into the unique addresses visible in the image.
 */
export class TextExtractor {
  private readonly engine: OcrEngine;
  private readonly logger: Logger;
  private readonly preprocessor: ImagePreprocessor;

  constructor(options: TextExtractorOptions) {
    this.engine = options.engine;
    this.logger = options.logger.child({ component: 'extractor' });
    this.preprocessor = options.preprocessor ?? new ImagePreprocessor();
  }

  /**
   * @param bytes Encoded image bytes.
   * @param source Where the bytes came from, attached to failures.
   */
  async extract(bytes: Buffer, source?: string): Promise<string[]> {
    let text: string;
    try {
      const image = await this.preprocessor.prepare(bytes);
      await this.engine.load();
      text = await this.engine.recognize(image);
    } catch (error) {
      throw new ScanError('ProcessingFailure', `Failed to process image: ${describeError(error)}`, {
        cause: error,
        source,
      });
    }

    this.logger.debug(
      { engine: this.engine.id, preprocessed: this.preprocessor.preprocessing, characters: text.length },
      'OCR complete'
    );

    const emails = extractEmails(text);
    this.logger.info({ count: emails.length }, `Extracted ${emails.length} email(s).`);
    return emails;
  }
}
