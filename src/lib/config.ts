import { z } from 'zod';
import { ScanError } from './errors.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30000; // 30 seconds
export const DEFAULT_USER_AGENT = 'imgmail/1.0.0';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  OCR_LANG: z
    .string()
    .regex(/^[a-z_]+(\+[a-z_]+)*$/i, 'expected language codes joined by "+"')
    .default('eng'),
  OCR_LANG_PATH: z.string().min(1).optional(),
  OCR_CACHE_PATH: z.string().min(1).optional(),
  OCR_PREPROCESS: booleanFlag.default('true'),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  logLevel: Env['LOG_LEVEL'];
  fetchTimeoutMs: number;
  userAgent: string;
  ocrLanguage: string;
  ocrLangPath?: string;
  ocrCachePath?: string;
  preprocess: boolean;
}

/**
 * Reads configuration from the environment. Empty strings count as unset so
 * a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ScanError('InvalidInput', `Invalid configuration: ${details}`, {
      cause: parsed.error,
    });
  }

  const data = parsed.data;
  return {
    logLevel: data.LOG_LEVEL,
    fetchTimeoutMs: data.FETCH_TIMEOUT_MS,
    userAgent: data.USER_AGENT,
    ocrLanguage: data.OCR_LANG,
    ocrLangPath: data.OCR_LANG_PATH,
    ocrCachePath: data.OCR_CACHE_PATH,
    preprocess: data.OCR_PREPROCESS,
  };
}
