import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {
  LogEventInputSchema,
  LogEventSchema,
  LogLevelSchema,
  type EmittableLogLevel,
  type LogEvent,
  type LogEventInput,
  type LogLevel
} from './contracts';
import {sanitizeForLog} from './redaction';

const toLevelOrder = (level: LogLevel | EmittableLogLevel) => {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'fatal':
      return 50;
    case 'silent':
      return 90;
  }
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  toLevelOrder(eventLevel) >= toLevelOrder(configuredLevel);

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: StructuredLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;
  const sanitizedMetadata = sanitizeForLog({
    value: input.metadata ?? {},
    extraSensitiveKeys: options.extraSensitiveKeys
  });

  return LogEventSchema.parse({
    ts: (options.now ?? (() => new Date()))().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    ...(context?.remote_addr ? {remote_addr: context.remote_addr} : {}),
    metadata: sanitizedMetadata
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const parsedOptions = {
    ...options,
    level: LogLevelSchema.parse(options.level),
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogEventInput) => {
    const parsedInput = LogEventInputSchema.safeParse(rawInput);
    if (!parsedInput.success) {
      return;
    }

    const input = parsedInput.data;
    if (!shouldEmit({configuredLevel: parsedOptions.level, eventLevel: input.level})) {
      return;
    }

    try {
      const envelope = createEnvelope({
        input,
        options: parsedOptions,
        context: getLogContext()
      });
      chooseStream({level: input.level, writer: parsedOptions.writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break request handling.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
