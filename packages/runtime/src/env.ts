import { z } from 'zod';

export const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const RuntimeConfigSchema = z.object({
  serviceName: z.string().min(1),
  logLevel: LogLevelSchema,
  baseUrl: z.string(),
  apiTimeoutMs: z.number().int().positive(),
  retryAttempts: z.number().int().nonnegative(),
  debounceDelayMs: z.number().int().nonnegative(),
  notificationDurationMs: z.number().int().nonnegative(),
  notificationGraceMs: z.number().int().nonnegative()
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly field: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  forceRefresh?: boolean;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<RuntimeConfig>;
}

let cachedConfig: RuntimeConfig | undefined;

export function loadConfig(options: LoadConfigOptions = {}): RuntimeConfig {
  const canUseCache = !options.forceRefresh && !options.env && !options.overrides;
  if (canUseCache && cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const candidate = {
    serviceName: env.APP_NAME ?? 'frontdesk',
    logLevel: (env.LOG_LEVEL ?? 'INFO').toUpperCase(),
    baseUrl: env.FRONTDESK_BASE_URL ?? '',
    apiTimeoutMs: parseOptionalInt(env.FRONTDESK_API_TIMEOUT_MS) ?? 30_000,
    retryAttempts: parseOptionalInt(env.FRONTDESK_RETRY_ATTEMPTS) ?? 3,
    debounceDelayMs: parseOptionalInt(env.FRONTDESK_DEBOUNCE_DELAY_MS) ?? 300,
    notificationDurationMs: parseOptionalInt(env.FRONTDESK_NOTIFICATION_DURATION_MS) ?? 3000,
    notificationGraceMs: parseOptionalInt(env.FRONTDESK_NOTIFICATION_GRACE_MS) ?? 300,
    ...options.overrides
  };

  const parsed = RuntimeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'unknown';
    throw new ConfigError(`Invalid runtime configuration for ${field}: ${issue?.message}`, field);
  }

  if (canUseCache) {
    cachedConfig = parsed.data;
  }
  return parsed.data;
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
