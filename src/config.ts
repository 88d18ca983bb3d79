import { z } from 'zod';
import { isValidTimeZone } from './lib/dates';

const hour = z.coerce.number().int().min(0).max(23);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017/whoop-health-coach'),

  TELEGRAM_TOKEN: z.string().min(1),
  BOT_MODE: z.enum(['webhook', 'polling']).default('webhook'),
  PUBLIC_URL: z.string().url().transform(url => url.replace(/\/+$/, '')),

  WHOOP_CLIENT_ID: z.string().min(1),
  WHOOP_CLIENT_SECRET: z.string().min(1),
  WHOOP_SCOPE: z.string().default('offline read:profile read:recovery read:sleep read:workout'),
  WHOOP_API_BASE_URL: z.string().url().default('https://api.prod.whoop.com/developer/v1'),
  WHOOP_AUTH_URL: z.string().url().default('https://api.prod.whoop.com/oauth/oauth2/auth'),
  WHOOP_TOKEN_URL: z.string().url().default('https://api.prod.whoop.com/oauth/oauth2/token'),
  WHOOP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WHOOP_SYNC_LIMIT: z.coerce.number().int().min(1).max(25).default(10),

  SYNC_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  SYNC_TIMEZONE: z.string().default('UTC').refine(isValidTimeZone, 'Unknown IANA time zone'),

  GROQ_API_KEY: z.string().optional(),
  GROQ_MODEL: z.string().default('llama-3.3-70b-versatile'),

  SCHEDULER_SECRET: z.string().optional(),
  CHECKIN_MIN_HOURS: z.coerce.number().positive().default(4),
  QUIET_HOURS_START: hour.default(22),
  QUIET_HOURS_END: hour.default(7),
});

export interface AppConfig {
  port: number;
  mongoUri: string;
  telegram: {
    token: string;
    mode: 'webhook' | 'polling';
    webhookPath: string;
  };
  publicUrl: string;
  whoop: {
    clientId: string;
    clientSecret: string;
    scope: string[];
    redirectUri: string;
    apiBaseUrl: string;
    authUrl: string;
    tokenUrl: string;
    requestTimeoutMs: number;
    syncLimit: number;
  };
  sync: {
    concurrency: number;
    timeZone: string;
  };
  groq: {
    apiKey?: string;
    model: string;
  };
  scheduler: {
    secret?: string;
  };
  checkIn: {
    minHoursBetweenMessages: number;
    quietHoursStart: number;
    quietHoursEnd: number;
  };
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  return Object.fromEntries(Object.entries(env).map(([key, value]) => [key, value === '' ? undefined : value]));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    mongoUri: e.MONGODB_URI,
    telegram: {
      token: e.TELEGRAM_TOKEN,
      mode: e.BOT_MODE,
      webhookPath: '/webhook',
    },
    publicUrl: e.PUBLIC_URL,
    whoop: {
      clientId: e.WHOOP_CLIENT_ID,
      clientSecret: e.WHOOP_CLIENT_SECRET,
      scope: e.WHOOP_SCOPE.split(/\s+/).filter(Boolean),
      redirectUri: `${e.PUBLIC_URL}/whoop/callback`,
      apiBaseUrl: e.WHOOP_API_BASE_URL.replace(/\/+$/, ''),
      authUrl: e.WHOOP_AUTH_URL,
      tokenUrl: e.WHOOP_TOKEN_URL,
      requestTimeoutMs: e.WHOOP_REQUEST_TIMEOUT_MS,
      syncLimit: e.WHOOP_SYNC_LIMIT,
    },
    sync: {
      concurrency: e.SYNC_CONCURRENCY,
      timeZone: e.SYNC_TIMEZONE,
    },
    groq: {
      apiKey: e.GROQ_API_KEY,
      model: e.GROQ_MODEL,
    },
    scheduler: {
      secret: e.SCHEDULER_SECRET,
    },
    checkIn: {
      minHoursBetweenMessages: e.CHECKIN_MIN_HOURS,
      quietHoursStart: e.QUIET_HOURS_START,
      quietHoursEnd: e.QUIET_HOURS_END,
    },
  };
}
