import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

// server/data beside the sources, or the same folder seen from dist/server/src
const DEFAULT_DATA_DIR =
  [path.resolve(__dirname, '..', 'data'), path.resolve(__dirname, '..', '..', '..', 'server', 'data')].find((dir) =>
    fs.existsSync(dir),
  ) ?? path.resolve(__dirname, '..', 'data');

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

// `PORT=` in a .env file would otherwise coerce to 0.
const blankAsUnset = (value: unknown) => (typeof value === 'string' && !value.trim() ? undefined : value);

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65535).default(3001)),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
  VIN_DECODE_BASE_URL: z.string().url().default('https://vpic.nhtsa.dot.gov/api'),
  VIN_DECODE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  PRICING_BASE_URL: z.string().url().default('https://api.partstech.com'),
  PRICING_USERNAME: optionalText,
  PRICING_API_KEY: optionalText,
  PRICING_SEARCH_PATH: z.string().startsWith('/').default('/punchout/quote/create'),
  PRICING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export interface PricingConfig {
  baseUrl: string;
  searchPath: string;
  timeoutMs: number;
  /** Absent when either credential is missing; the client then stays offline. */
  credentials?: { username: string; apiKey: string };
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  dataDir: string;
  vinDecode: { baseUrl: string; timeoutMs: number };
  pricing: PricingConfig;
}

/**
 * Reads settings from the environment (after `.env` has been applied).
 * Throws a ZodError naming the offending variables when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const { PRICING_USERNAME: username, PRICING_API_KEY: apiKey } = parsed;

  return Object.freeze({
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    dataDir: path.resolve(parsed.DATA_DIR),
    vinDecode: {
      baseUrl: parsed.VIN_DECODE_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: parsed.VIN_DECODE_TIMEOUT_MS,
    },
    pricing: {
      baseUrl: parsed.PRICING_BASE_URL.replace(/\/+$/, ''),
      searchPath: parsed.PRICING_SEARCH_PATH,
      timeoutMs: parsed.PRICING_TIMEOUT_MS,
      credentials: username && apiKey ? { username, apiKey } : undefined,
    },
  });
}
