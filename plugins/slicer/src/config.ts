import { z } from 'zod';
import { EnvironmentError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface SlicerSettings {
  targetUrl?: string;
  failureSelector?: string;
  pollIntervalMs: number;
  fieldTimeoutMs: number;
  spinnerTimeoutMs: number;
  downloadTimeoutMs: number;
  downloadCheckMs: number;
  logLevel: LogLevel;
  chromePath?: string;
}

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SLICER_TARGET_URL: z.string().url().optional(),
  SLICER_FAILURE_SELECTOR: z.string().min(1).optional(),
  SLICER_POLL_INTERVAL_MS: millis(3_000),
  SLICER_FIELD_TIMEOUT_MS: millis(10_000),
  SLICER_SPINNER_TIMEOUT_MS: millis(30_000),
  SLICER_DOWNLOAD_TIMEOUT_MS: millis(60_000),
  SLICER_DOWNLOAD_CHECK_MS: millis(500),
  SLICER_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CHROME_PATH: z.string().min(1).optional(),
});

/**
 * Reads settings from the environment (after dotenv has loaded `.env`).
 * Empty strings count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): SlicerSettings {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new EnvironmentError(`Invalid configuration: ${keys.join('; ')}`);
  }

  const parsed = result.data;
  return {
    targetUrl: parsed.SLICER_TARGET_URL,
    failureSelector: parsed.SLICER_FAILURE_SELECTOR,
    pollIntervalMs: parsed.SLICER_POLL_INTERVAL_MS,
    fieldTimeoutMs: parsed.SLICER_FIELD_TIMEOUT_MS,
    spinnerTimeoutMs: parsed.SLICER_SPINNER_TIMEOUT_MS,
    downloadTimeoutMs: parsed.SLICER_DOWNLOAD_TIMEOUT_MS,
    downloadCheckMs: parsed.SLICER_DOWNLOAD_CHECK_MS,
    logLevel: parsed.SLICER_LOG_LEVEL,
    chromePath: parsed.CHROME_PATH,
  };
}

export const DEFAULT_SETTINGS: SlicerSettings = loadSettings({});
