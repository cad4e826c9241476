import os from 'node:os';
import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const fieldLayoutSchema = z.enum(['nested', 'flattened', 'auto']);

export type FieldLayout = z.infer<typeof fieldLayoutSchema>;

const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1)
});

const configSchema = z.object({
  logLevel: logLevelSchema,
  pollIntervalMs: z.number().int().positive(),
  sensor: z.object({
    id: z.string().min(1),
    site: z.string().min(1)
  }),
  kismet: z.object({
    baseUrl: z.string().url(),
    windowSeconds: z.number().int().positive(),
    timeoutMs: z.number().int().positive(),
    fieldLayout: fieldLayoutSchema,
    credentials: credentialsSchema.nullable()
  }),
  elasticsearch: z.object({
    node: z.string().url(),
    index: z.string().min(1),
    pipeline: z.string().min(1).nullable(),
    credentials: credentialsSchema.nullable(),
    verifyCertificates: z.boolean(),
    requestTimeoutMs: z.number().int().positive()
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

type Environment = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function optionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parseCredentials(
  username: string | undefined,
  password: string | undefined
): { username: string; password: string } | null {
  const user = optionalString(username);
  const pass = optionalString(password);
  // Basic auth is only sent when both halves are configured.
  if (!user || !pass) {
    return null;
  }
  return { username: user, password: pass };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object') {
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Reads the collector configuration from the environment. Called once at
 * startup; the returned object is frozen and handed to every component.
 */
export function loadServiceConfig(env: Environment = process.env): Readonly<ServiceConfig> {
  const candidateConfig = {
    logLevel: (env.LOG_LEVEL ?? 'info').trim().toLowerCase(),
    pollIntervalMs: parseNumber(env.POLL_INTERVAL_SEC, 10) * 1000,
    sensor: {
      id: optionalString(env.SENSOR_ID) ?? os.hostname(),
      site: optionalString(env.SENSOR_SITE) ?? 'lab'
    },
    kismet: {
      baseUrl: optionalString(env.KISMET_URL) ?? 'http://localhost:2501',
      windowSeconds: parseNumber(env.KISMET_WINDOW_SEC, 10),
      timeoutMs: parseNumber(env.KISMET_TIMEOUT_MS, 5_000),
      fieldLayout: (env.KISMET_FIELD_LAYOUT ?? 'auto').trim().toLowerCase(),
      credentials: parseCredentials(env.KISMET_USERNAME, env.KISMET_PASSWORD)
    },
    elasticsearch: {
      node: optionalString(env.ES_URL) ?? 'http://localhost:9200',
      index: optionalString(env.ES_INDEX) ?? 'wids-wireless-features',
      pipeline: optionalString(env.ES_PIPELINE),
      credentials: parseCredentials(env.ES_USERNAME, env.ES_PASSWORD),
      verifyCertificates: parseBoolean(env.ES_VERIFY_CERTS, true),
      requestTimeoutMs: parseNumber(env.ES_REQUEST_TIMEOUT_MS, 30_000)
    }
  };

  return deepFreeze(configSchema.parse(candidateConfig));
}
