import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { Config } from '../types/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

// Asia/Tehran has had no DST since 2022
const TEHRAN_OFFSET_MINUTES = 3 * 60 + 30;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

function text(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().trim().default(fallback));
}

function milliseconds(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));
}

const EnvSchema = z.object({
  DATA_DIR: optionalText,
  GOOGLE_CLIENT_ID: optionalText,
  GOOGLE_CLIENT_SECRET: optionalText,
  GOOGLE_REDIRECT_URI: text('urn:ietf:wg:oauth:2.0:oob'),
  GOOGLE_CALENDAR_ID: text('primary'),
  QUERA_BASE_URL: text('https://quera.org'),
  SYNC_INTERVAL_MS: milliseconds(3 * HOUR),
  SYNC_INITIAL_DELAY_MS: milliseconds(10_000),
  SYNC_REQUEST_TIMEOUT_MS: milliseconds(30_000),
  SYNC_WATCH_INTERVAL_MS: milliseconds(15_000),
  SYNC_LEASE_MS: milliseconds(15 * MINUTE),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
  LOG_LEVEL: text('info'),
  LOG_TO_FILE: z
    .string()
    .optional()
    .transform((value) => value !== 'false'),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  const dataDir = path.resolve(vars.DATA_DIR ?? path.join(projectRoot, 'data'));

  return {
    google: {
      clientId: vars.GOOGLE_CLIENT_ID,
      clientSecret: vars.GOOGLE_CLIENT_SECRET,
      redirectUri: vars.GOOGLE_REDIRECT_URI,
      calendarId: vars.GOOGLE_CALENDAR_ID,
    },
    quera: {
      baseUrl: vars.QUERA_BASE_URL,
    },
    sync: {
      intervalMs: vars.SYNC_INTERVAL_MS,
      initialDelayMs: vars.SYNC_INITIAL_DELAY_MS,
      requestTimeoutMs: vars.SYNC_REQUEST_TIMEOUT_MS,
      watchIntervalMs: vars.SYNC_WATCH_INTERVAL_MS,
      leaseMs: vars.SYNC_LEASE_MS,
      lookaroundDays: 90,
      utcOffsetMinutes: TEHRAN_OFFSET_MINUTES,
      timeZone: 'Asia/Tehran',
    },
    server: {
      port: vars.PORT,
    },
    log: {
      level: vars.LOG_LEVEL,
      toFile: vars.LOG_TO_FILE,
    },
    paths: {
      dataDir,
      database: path.join(dataDir, 'state.db'),
    },
  };
}
