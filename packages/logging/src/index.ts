export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  setLogContextFields,
  type LogContext
} from './context';
export {
  EmittableLogLevelSchema,
  LogEventInputSchema,
  LogEventSchema,
  LogLevelSchema,
  type EmittableLogLevel,
  type LogEvent,
  type LogEventInput,
  type LogLevel
} from './contracts';
export {
  createNoopLogger,
  createStructuredLogger,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog} from './redaction';
