import { Provider } from '@nestjs/common';
import { z } from 'zod';

export interface AppConfig {
  port: number;
  /** Base URL of the train-data provider, without a trailing slash. */
  providerBaseUrl: string;
  refreshIntervalMs: number;
  /** IANA zone used for every clock label on the rendered image. */
  timeZone: string;
  /** Optional replacement for the bundled pixel font. */
  fontPath: string | null;
}

export const APP_CONFIG = Symbol('APP_CONFIG');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  PROVIDER_BASE_URL: z.string().url().default('https://api-v3.amtraker.com/v3'),
  REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  TIME_ZONE: z
    .string()
    .default('America/New_York')
    .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' }),
  FONT_PATH: z.string().min(1).optional(),
});

function isKnownTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${details}`);
  }
  return {
    port: parsed.data.PORT,
    providerBaseUrl: parsed.data.PROVIDER_BASE_URL.replace(/\/+$/, ''),
    refreshIntervalMs: parsed.data.REFRESH_INTERVAL_MS,
    timeZone: parsed.data.TIME_ZONE,
    fontPath: parsed.data.FONT_PATH ?? null,
  };
}

export const appConfigProvider: Provider = {
  provide: APP_CONFIG,
  useFactory: (): AppConfig => loadConfig(),
};
