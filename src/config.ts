import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultEnvPath = path.resolve(__dirname, '..', '.env');

const MB = 1024 * 1024;

const toBool = (val: string) => val.toLowerCase() === 'true';
const toInt = (val: string) => parseInt(val, 10);

const envSchema = z
  .object({
    TELEGRAM_TOKEN: z.string().min(1, 'Please set TELEGRAM_TOKEN environment variable'),
    // Multi-line cookies.txt content (DO NOT COMMIT)
    YTDLP_COOKIES_CONTENT: z.string().optional(),
    YTDLP_COOKIES_FILE: z.string().default(path.join(os.tmpdir(), 'cookies.txt')),
    YTDLP_PATH: z.string().default('yt-dlp'),
    YTDLP_RETRIES: z
      .string()
      .default('3')
      .transform(toInt)
      .pipe(z.number().int().nonnegative()),
    YTDLP_MAX_HEIGHT: z
      .string()
      .default('360')
      .transform(toInt)
      .pipe(z.number().int().positive()),
    // 0 = no deadline; yt-dlp runs to completion or failure
    YTDLP_TIMEOUT_MS: z
      .string()
      .default('0')
      .transform(toInt)
      .pipe(z.number().int().nonnegative()),
    SCRATCH_DIR: z.string().default(os.tmpdir()),
    // Bot API upload ceiling for a single document
    UPLOAD_LIMIT_BYTES: z
      .string()
      .default(String(50 * MB))
      .transform(toInt)
      .pipe(z.number().int().positive()),
    // Kept below the ceiling to leave room for multipart overhead
    PART_SIZE_BYTES: z
      .string()
      .default(String(48 * MB))
      .transform(toInt)
      .pipe(z.number().int().positive()),
    LOG_VERBOSE: z.string().default('false').transform(toBool),
  })
  .refine((cfg) => cfg.PART_SIZE_BYTES < cfg.UPLOAD_LIMIT_BYTES, {
    message: 'PART_SIZE_BYTES must be smaller than UPLOAD_LIMIT_BYTES',
    path: ['PART_SIZE_BYTES'],
  });

export type Config = z.infer<typeof envSchema>;

/**
 * Load a `.env` file into `process.env`. Existing variables win.
 */
export function loadEnvFile(envPath = process.env.CLIPCOURIER_ENV_PATH || defaultEnvPath): void {
  loadEnv({ path: envPath });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid environment configuration:\n${details}`);
  }
  return parsed.data;
}

export function toMegabytes(bytes: number): number {
  return Math.floor(bytes / MB);
}
