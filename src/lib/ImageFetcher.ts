import { readFile } from 'fs/promises';
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from './config.js';
import { ScanError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import { isRemoteSource, isValidImage } from './SourceValidator.js';

export interface ImageFetcherOptions {
  logger: Logger;
  /** Abort a download that takes longer than this. */
  timeoutMs?: number;
  userAgent?: string;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Produces the raw bytes of an image, either from disk or over HTTP(S).
 *
 * Failures never escape as raw errors: an unsupported extension becomes an
 * `InvalidInput` `ScanError`, every I/O problem a `FetchFailure` that carries
 * the source and the original cause.
 */
export class ImageFetcher {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: ImageFetcherOptions) {
    this.logger = options.logger.child({ component: 'fetcher' });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Retrieves the image named by `source`.
   * @param source A local file path or an http(s) URL.
   * @returns The encoded image bytes, exactly as stored.
   */
  async fetch(source: string, options: FetchOptions = {}): Promise<Buffer> {
    if (!isValidImage(source)) {
      throw new ScanError('InvalidInput', 'Invalid file type. Provide a valid image file.', {
        source,
      });
    }

    try {
      const bytes = isRemoteSource(source)
        ? await this.download(source, options.signal)
        : await this.readLocal(source);
      this.logger.info({ source, bytes: bytes.length }, 'Image retrieved');
      return bytes;
    } catch (error) {
      throw new ScanError('FetchFailure', `Failed to retrieve image: ${describeError(error)}`, {
        cause: error,
        source,
      });
    }
  }

  private async readLocal(source: string): Promise<Buffer> {
    this.logger.info({ source }, 'Reading image file');
    return readFile(source);
  }

  /**
   * Performs a single HTTP(S) GET using native fetch, bounded by the
   * configured timeout and by the caller's signal.
   */
  private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    this.logger.info({ source: url }, 'Downloading image');

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(new Error(`Request timed out after ${this.timeoutMs}ms`)),
      this.timeoutMs
    );
    const onAbort = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.userAgent,
        },
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new Error(`Request Failed. Status Code: ${response.status}`);
      }

      return Buffer.from(await response.arrayBuffer());
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
