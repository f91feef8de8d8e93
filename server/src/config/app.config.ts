import os from 'os';
import { z } from 'zod';

export interface AppConfig {
  port: number;
  /** Max catalog entries resized/written at once */
  concurrency: number;
  /** Accept webp in addition to jpg/jpeg/png/gif */
  extendedFormats: boolean;
  /** false = same origin only */
  corsOrigins: string[] | false;
}

const DEV_ORIGINS = ['http://localhost:4200', 'http://localhost:8084'];

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const csvToList = (value: string): string[] =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const portSchema = z.coerce.number().int().min(1).max(65535);
const concurrencySchema = z.coerce.number().int().min(1);
const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value))
  .transform((value) => TRUE_VALUES.includes(value));
const originsSchema = z.string().transform(csvToList);

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(4, os.availableParallelism()));
}

/**
 * Build the app config from environment variables.
 * Each key is parsed on its own; a malformed value falls back to its default with a warning.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // In production the API is served from the same origin as the UI
  const defaultOrigins = env.NODE_ENV === 'production' ? false : DEV_ORIGINS;

  return {
    port: readSetting(env, 'PORT', portSchema, 3001),
    concurrency: readSetting(env, 'EMOTE_CONCURRENCY', concurrencySchema, defaultConcurrency()),
    extendedFormats: readSetting(env, 'EMOTE_EXTENDED_FORMATS', flagSchema, true),
    corsOrigins: readSetting<typeof originsSchema, string[] | false>(
      env,
      'CORS_ORIGINS',
      originsSchema,
      defaultOrigins
    ),
  };
}

function readSetting<S extends z.ZodTypeAny, F = z.output<S>>(
  env: NodeJS.ProcessEnv,
  key: string,
  schema: S,
  fallback: F
): z.output<S> | F {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Config] Ignoring ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}
