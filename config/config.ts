import { z } from 'zod';

export const CONTENT_FORMATS = ['html', 'text'] as const;
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const ConfigSchema = z.object({
  wiki: z.object({
    apiUrl: z.string().url(),
    permalinkBase: z.string().url(),
    userAgent: z.string().min(1),
    revisionFloor: z.string().min(1),
    maxLagSeconds: z.number().int().nonnegative(),
  }),
  revisionLookup: z.object({
    enforcerBaseUrl: z.string().url().optional(),
  }),
  http: z.object({
    timeoutMs: z.number().int().positive(),
  }),
  content: z.object({
    defaultFormat: z.enum(CONTENT_FORMATS),
    maxTextChars: z.number().int().positive(),
    truncationMarker: z.string(),
  }),
  asOf: z.object({
    requireTimestamp: z.boolean(),
  }),
  observability: z.object({
    logLevel: z.enum(LOG_LEVELS),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

export const DEFAULT_CONFIG: AppConfig = {
  wiki: {
    apiUrl: 'https://en.wikipedia.org/w/api.php',
    permalinkBase: 'https://en.wikipedia.org/w/index.php',
    // Wikimedia rejects generic clients with 403; operators should put a contact address here.
    userAgent: 'wiki-asof/0.1 (as-of revision reader; operator@example.org)',
    revisionFloor: '2001-01-01T00:00:00Z',
    maxLagSeconds: 5,
  },
  revisionLookup: {},
  http: {
    timeoutMs: 30_000,
  },
  content: {
    defaultFormat: 'html',
    maxTextChars: 20_000,
    truncationMarker: '\n\n[truncated]',
  },
  asOf: {
    requireTimestamp: false,
  },
  observability: {
    logLevel: 'info',
  },
};

type Env = Record<string, string | undefined>;

const stringFromEnv = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  // NaN is left for ConfigSchema to reject.
  return Number(value.trim());
};

// Unrecognised spellings pass through as strings so ConfigSchema rejects them.
const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return value;
};

/**
 * Merges section-level overrides onto the defaults and validates the result.
 * Tests build their configuration through this instead of the environment.
 */
export const createConfig = (overrides: ConfigOverrides = {}): AppConfig =>
  ConfigSchema.parse({
    wiki: { ...DEFAULT_CONFIG.wiki, ...overrides.wiki },
    revisionLookup: { ...DEFAULT_CONFIG.revisionLookup, ...overrides.revisionLookup },
    http: { ...DEFAULT_CONFIG.http, ...overrides.http },
    content: { ...DEFAULT_CONFIG.content, ...overrides.content },
    asOf: { ...DEFAULT_CONFIG.asOf, ...overrides.asOf },
    observability: { ...DEFAULT_CONFIG.observability, ...overrides.observability },
  });

export const loadConfig = (env: Env = process.env): AppConfig => {
  const defaults = DEFAULT_CONFIG;

  const rawConfig = {
    wiki: {
      apiUrl: stringFromEnv(env.WIKI_API_URL) ?? defaults.wiki.apiUrl,
      permalinkBase: stringFromEnv(env.WIKI_PERMALINK_BASE) ?? defaults.wiki.permalinkBase,
      userAgent: stringFromEnv(env.WIKI_USER_AGENT) ?? defaults.wiki.userAgent,
      revisionFloor: stringFromEnv(env.WIKI_REVISION_FLOOR) ?? defaults.wiki.revisionFloor,
      maxLagSeconds: numberFromEnv(env.WIKI_MAXLAG, defaults.wiki.maxLagSeconds),
    },
    revisionLookup: {
      enforcerBaseUrl: stringFromEnv(env.OLDID_ENFORCER_BASE),
    },
    http: {
      timeoutMs: numberFromEnv(env.WIKI_TIMEOUT_MS, defaults.http.timeoutMs),
    },
    content: {
      defaultFormat: (stringFromEnv(env.WIKI_CONTENT_FORMAT) ?? defaults.content.defaultFormat).toLowerCase(),
      maxTextChars: numberFromEnv(env.WIKI_MAX_TEXT_CHARS, defaults.content.maxTextChars),
      truncationMarker: defaults.content.truncationMarker,
    },
    asOf: {
      requireTimestamp: booleanFromEnv(env.WIKI_REQUIRE_TIMESTAMP, defaults.asOf.requireTimestamp),
    },
    observability: {
      logLevel: (stringFromEnv(env.LOG_LEVEL) ?? defaults.observability.logLevel).toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};
