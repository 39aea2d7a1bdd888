import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const LogIdSchema = z.string().min(1).max(128);

export const LogContextSchema = z
  .object({
    correlation_id: LogIdSchema.optional(),
    request_id: LogIdSchema.optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    remote_addr: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const PartialLogContextSchema = LogContextSchema.partial();

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Runs `operation` with its own copy of the log context. Fields missing from
 * `context` are inherited from the enclosing scope, if any.
 */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T => {
  const inherited = logContextStorage.getStore() ?? {};
  return logContextStorage.run({...inherited, ...LogContextSchema.parse(context)}, operation);
};

export const getLogContext = (): LogContext | undefined => logContextStorage.getStore();

/** Updates fields of the current scope only; outside any scope it does nothing. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const current = logContextStorage.getStore();
  if (current === undefined) {
    return undefined;
  }

  return Object.assign(current, PartialLogContextSchema.parse(fields));
};
