import {tmpdir} from 'node:os';

import {DEFAULT_MEMORY_THRESHOLD_BYTES} from '@gatewire/form-decoder';
import {LogLevelSchema, type LogLevel} from '@gatewire/logging';
import {z} from 'zod';

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive());

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    GATEWIRE_SERVICE_NAME: z.string().min(1).default('gatewire'),
    GATEWIRE_LOG_LEVEL: LogLevelSchema.optional(),
    GATEWIRE_MAX_BODY_BYTES: numberFromEnv.default(10 * 1024 * 1024),
    GATEWIRE_MULTIPART_MEMORY_LIMIT_BYTES: numberFromEnv.default(DEFAULT_MEMORY_THRESHOLD_BYTES),
    GATEWIRE_UPLOAD_TMP_DIR: optionalString,
    GATEWIRE_DEFAULT_CHARSET: z.string().min(1).default('utf-8'),
    GATEWIRE_DEBUG: booleanFromEnv.optional()
  })
  .strict();

/** Per-request limits and defaults consumed by the request context. */
export type RequestHandlingConfig = {
  maxBodyBytes: number;
  multipartMemoryLimitBytes: number;
  uploadTempDirectory: string;
  defaultCharset: string;
  debug: boolean;
};

export type WebApiConfig = RequestHandlingConfig & {
  serviceName: string;
  nodeEnv: 'development' | 'test' | 'production';
  logging: {
    level: LogLevel;
  };
};

export const defaultRequestHandlingConfig = (): RequestHandlingConfig => ({
  maxBodyBytes: 10 * 1024 * 1024,
  multipartMemoryLimitBytes: DEFAULT_MEMORY_THRESHOLD_BYTES,
  uploadTempDirectory: tmpdir(),
  defaultCharset: 'utf-8',
  debug: false
});

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  GATEWIRE_SERVICE_NAME: env.GATEWIRE_SERVICE_NAME,
  GATEWIRE_LOG_LEVEL: env.GATEWIRE_LOG_LEVEL,
  GATEWIRE_MAX_BODY_BYTES: env.GATEWIRE_MAX_BODY_BYTES,
  GATEWIRE_MULTIPART_MEMORY_LIMIT_BYTES: env.GATEWIRE_MULTIPART_MEMORY_LIMIT_BYTES,
  GATEWIRE_UPLOAD_TMP_DIR: env.GATEWIRE_UPLOAD_TMP_DIR,
  GATEWIRE_DEFAULT_CHARSET: env.GATEWIRE_DEFAULT_CHARSET,
  GATEWIRE_DEBUG: env.GATEWIRE_DEBUG
});

const assertCharset = (charset: string) => {
  try {
    new TextDecoder(charset);
  } catch {
    throw new Error(`GATEWIRE_DEFAULT_CHARSET is not a supported charset: ${charset}`);
  }
};

export const loadWebApiConfig = (env: NodeJS.ProcessEnv = process.env): WebApiConfig => {
  const parsed = envSchema.parse(toEnvInput(env));
  assertCharset(parsed.GATEWIRE_DEFAULT_CHARSET);

  const debug = parsed.GATEWIRE_DEBUG ?? parsed.NODE_ENV === 'development';
  const defaultLevel: LogLevel = parsed.NODE_ENV === 'test' ? 'silent' : debug ? 'debug' : 'info';

  return {
    serviceName: parsed.GATEWIRE_SERVICE_NAME,
    nodeEnv: parsed.NODE_ENV,
    logging: {
      level: parsed.GATEWIRE_LOG_LEVEL ?? defaultLevel
    },
    maxBodyBytes: parsed.GATEWIRE_MAX_BODY_BYTES,
    multipartMemoryLimitBytes: parsed.GATEWIRE_MULTIPART_MEMORY_LIMIT_BYTES,
    uploadTempDirectory: parsed.GATEWIRE_UPLOAD_TMP_DIR ?? tmpdir(),
    defaultCharset: parsed.GATEWIRE_DEFAULT_CHARSET,
    debug
  };
};
