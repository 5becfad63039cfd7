import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { ScanError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { SinkOutcome, TextOutput } from './types.js';

export interface ResultSinkOptions {
  logger: Logger;
  /** Receives one address per line in console mode. Defaults to stdout. */
  stdout?: TextOutput;
}

/**
 * Final stage: prints the addresses or writes them to a file.
 */
export class ResultSink {
  private readonly logger: Logger;
  private readonly stdout: TextOutput;

  constructor(options: ResultSinkOptions) {
    this.logger = options.logger.child({ component: 'sink' });
    this.stdout = options.stdout ?? process.stdout;
  }

  /**
   * @param emails Addresses to emit. An empty list writes nothing.
   * @param outputPath Target file, overwritten if present. Omit to print.
   */
  async emit(emails: readonly string[], outputPath?: string): Promise<SinkOutcome> {
    if (emails.length === 0) {
      this.logger.info('No emails found.');
      return { kind: 'empty' };
    }

    if (outputPath === undefined) {
      for (const email of emails) {
        this.stdout.write(`${email}\n`);
      }
      return { kind: 'printed', count: emails.length };
    }

    const resolved = path.resolve(outputPath);
    try {
      await mkdir(path.dirname(resolved), { recursive: true });
      await writeFile(resolved, emails.join('\n'), 'utf8');
    } catch (error) {
      throw new ScanError('PersistFailure', `Failed to save emails: ${describeError(error)}`, {
        cause: error,
        outputPath,
      });
    }

    this.logger.info({ path: resolved, count: emails.length }, `Emails saved to ${resolved}`);
    return { kind: 'written', count: emails.length, path: resolved };
  }
}
