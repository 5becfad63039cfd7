/**
 * @module cli
 * Command-line front end: turns argv (or interactive answers) into a single
 * scan, and maps the outcome to a process exit code.
 */

import { createInterface } from 'readline/promises';
import { parseArgs } from 'util';
import type { DestinationStream } from 'pino';
import { type AppConfig, loadConfig } from './lib/config.js';
import { EmailScanner } from './lib/EmailScanner.js';
import { ScanError, describeError, exitCodeFor, isScanError } from './lib/errors.js';
import { ImageFetcher } from './lib/ImageFetcher.js';
import { ImagePreprocessor } from './lib/ImagePreprocessor.js';
import { type Logger, createLogger } from './lib/logger.js';
import { ResultSink } from './lib/ResultSink.js';
import { TesseractEngine } from './lib/TesseractEngine.js';
import { TextExtractor } from './lib/TextExtractor.js';
import type { OcrEngine, ScanRequest, TextOutput } from './lib/types.js';

export const USAGE = `Usage: imgmail [source] [output] [options]

Extract email addresses from an image file or URL using OCR.

Arguments:
  source               Image path or http(s) URL (.png .jpg .jpeg .bmp .tiff .webp)
  output               File to write the addresses to; printed when omitted

Options:
  -o, --output <file>  Same as the output argument
      --raw            Skip preprocessing and OCR the decoded image as is
      --lang <codes>   Tesseract language(s), e.g. eng or eng+deu
      --timeout <ms>   Download timeout in milliseconds
  -h, --help           Show this help
`;

export interface CliArgs {
  source?: string;
  output?: string;
  raw: boolean;
  lang?: string;
  timeoutMs?: number;
  help: boolean;
}

/** Asks the user one question and resolves with the trimmed answer. */
export type Prompt = (question: string) => Promise<string>;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: TextOutput;
  /** Log sink; stderr when omitted. */
  logDestination?: DestinationStream;
  /** Whether missing arguments may be asked for. Defaults to `stdin.isTTY`. */
  interactive?: boolean;
  prompt?: Prompt;
  createEngine?: (config: AppConfig, logger: Logger) => OcrEngine;
  signal?: AbortSignal;
}

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: 'string', short: 'o' },
        raw: { type: 'boolean', default: false },
        lang: { type: 'string' },
        timeout: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new ScanError('InvalidInput', describeError(error), { cause: error });
  }
}

/**
 * Parses command-line arguments. A leading `--` forwarded by npm scripts is
 * dropped.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = argv[0] === '--' ? argv.slice(1) : [...argv];
  const { values, positionals } = readArgs(args);
  if (positionals.length > 2) {
    throw new ScanError('InvalidInput', `Unexpected argument: ${positionals[2]}`);
  }
  if (values.output !== undefined && positionals[1] !== undefined) {
    throw new ScanError('InvalidInput', 'Output given both as an argument and with --output.');
  }

  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    timeoutMs = Number(values.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ScanError('InvalidInput', `Invalid --timeout: ${values.timeout}`);
    }
  }

  return {
    source: positionals[0],
    output: values.output ?? positionals[1],
    raw: values.raw ?? false,
    lang: values.lang,
    timeoutMs,
    help: values.help ?? false,
  };
}

/**
 * Applies command-line overrides on top of the environment configuration.
 */
export function applyOverrides(config: AppConfig, args: CliArgs): AppConfig {
  return {
    ...config,
    preprocess: args.raw ? false : config.preprocess,
    ocrLanguage: args.lang ?? config.ocrLanguage,
    fetchTimeoutMs: args.timeoutMs ?? config.fetchTimeoutMs,
  };
}

function createTerminalPrompt(): Prompt {
  return async (question) => {
    // Prompts go to stderr so stdout only ever carries addresses.
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  };
}

async function resolveRequest(args: CliArgs, deps: CliDeps): Promise<ScanRequest> {
  if (args.source !== undefined) {
    return { source: args.source, outputPath: args.output, signal: deps.signal };
  }

  const interactive = deps.interactive ?? Boolean(process.stdin.isTTY);
  if (!interactive) {
    throw new ScanError('InvalidInput', 'Missing input: an image path or URL is required.');
  }

  const ask = deps.prompt ?? createTerminalPrompt();
  const source = await ask('Enter the URL or file path of the image: ');
  const output =
    args.output ??
    (await ask('Enter the file path to save the extracted emails (leave blank to print): '));

  return { source, outputPath: output || undefined, signal: deps.signal };
}

function defaultEngine(config: AppConfig, logger: Logger): OcrEngine {
  return new TesseractEngine({
    logger,
    language: config.ocrLanguage,
    langPath: config.ocrLangPath,
    cachePath: config.ocrCachePath,
  });
}

/**
 * Runs the CLI once and resolves with the exit code. Every failure is logged
 * here, once; nothing is thrown to the caller.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  let logger = createLogger({ destination: deps.logDestination });
  let engine: OcrEngine | undefined;

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      stdout.write(USAGE);
      return 0;
    }

    const config = applyOverrides(loadConfig(deps.env ?? process.env), args);
    logger = createLogger({ level: config.logLevel, destination: deps.logDestination });

    const request = await resolveRequest(args, deps);
    engine = (deps.createEngine ?? defaultEngine)(config, logger);

    const scanner = new EmailScanner({
      logger,
      fetcher: new ImageFetcher({
        logger,
        timeoutMs: config.fetchTimeoutMs,
        userAgent: config.userAgent,
      }),
      extractor: new TextExtractor({
        logger,
        engine,
        preprocessor: new ImagePreprocessor({ enabled: config.preprocess }),
      }),
      sink: new ResultSink({ logger, stdout }),
    });

    await scanner.scan(request);
    return 0;
  } catch (error) {
    logger.error(
      isScanError(error)
        ? { kind: error.kind, source: error.source, outputPath: error.outputPath, err: error.cause }
        : { err: error },
      describeError(error)
    );
    return exitCodeFor(error);
  } finally {
    await engine?.destroy().catch((error: unknown) => {
      logger.warn({ err: error }, 'Failed to stop OCR engine');
    });
  }
}
