import { AppConfig } from '../types/playlist';
import { z } from 'zod';

// Helpers to coerce and validate env values
const intInRange = (min: number, max: number, def: number) =>
  z.preprocess((v) => {
    if (typeof v === 'number') return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
    return def;
  }, z.number().int().min(min).max(max));

const nonBlank = (def: string) =>
  z.preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? v.trim() : def), z.string().min(1));

const allowedLogLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const EnvSchema = z.object({
  SITE_HOST: nonBlank('www.youtube.com').refine((v) => /^[a-z0-9.-]+(:\d+)?$/i.test(v), {
    message: 'SITE_HOST must be a bare host name (no scheme or path)',
  }),
  WATCH_QUERY_PARAM: z.enum(['id', 'v']).optional().default('id'),

  // Protocol constants for the continuation endpoint
  CLIENT_NAME: nonBlank('1'),
  CLIENT_VERSION: nonBlank('2.20200720.00.02'),

  HTTP_TIMEOUT_SECONDS: intInRange(1, 120, 20).optional().default(20),
  HTTP_USER_AGENT: nonBlank('Mozilla/5.0'),

  MAX_CONTINUATION_PAGES: intInRange(1, 10000, 500).optional().default(500),

  LOG_LEVEL: z.string().optional(),
  LOG_DIR: z.string().optional(),
  LOG_MAX_SIZE_MB: intInRange(1, 200, 10).optional().default(10),
  LOG_MAX_FILES: intInRange(1, 20, 3).optional().default(3),
});

function isLogLevel(value: string): value is (typeof allowedLogLevels)[number] {
  return (allowedLogLevels as readonly string[]).includes(value);
}

export function loadAppConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const env = parsed.data;
  const nodeEnv = (source.NODE_ENV || '').toLowerCase();
  const defaultLogLevel = nodeEnv === 'production' ? 'info' : 'debug';
  const inputLevel = env.LOG_LEVEL ? env.LOG_LEVEL.trim().toLowerCase() : defaultLogLevel;
  const level = isLogLevel(inputLevel) ? inputLevel : defaultLogLevel;
  const logDir = env.LOG_DIR?.trim();

  const cfg: AppConfig = {
    site: {
      host: env.SITE_HOST,
      watchParam: env.WATCH_QUERY_PARAM,
      clientName: env.CLIENT_NAME,
      clientVersion: env.CLIENT_VERSION,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
      userAgent: env.HTTP_USER_AGENT,
    },
    pagination: {
      maxPages: env.MAX_CONTINUATION_PAGES,
    },
    logging: {
      level,
      ...(logDir ? { dir: logDir } : {}),
      maxSizeBytes: env.LOG_MAX_SIZE_MB * 1024 * 1024,
      maxFiles: env.LOG_MAX_FILES,
    },
  };

  return cfg;
}
