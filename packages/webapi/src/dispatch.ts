import {randomUUID} from 'node:crypto';

import {createNoopLogger, runWithLogContext, type StructuredLogger} from '@gatewire/logging';

import type {GatewayEnvironment, RequestContextOptions} from './contracts';
import {createRequestContext, type RequestContext} from './context';
import type {HeaderPair} from './headers';
import {internalError, isHttpOutcome, STATUS_DEFINITIONS, type HttpOutcome} from './outcomes';
import {runWithRequestContext} from './storage';

export type HandlerResult = HttpOutcome | string | Uint8Array | null | undefined | void;

export type RequestHandler = (ctx: RequestContext) => HandlerResult | Promise<HandlerResult>;

export type GatewayResponse = {
  status: string;
  statusCode: number;
  headers: HeaderPair[];
  body: Buffer;
};

export type DispatchRequestInput = RequestContextOptions & {
  environment: GatewayEnvironment;
  handler: RequestHandler;
  requestId?: string;
};

const toBody = (result: HandlerResult): Buffer => {
  if (isHttpOutcome(result)) {
    return Buffer.from(result.body, 'utf8');
  }
  if (typeof result === 'string') {
    return Buffer.from(result, 'utf8');
  }
  if (result instanceof Uint8Array) {
    return Buffer.from(result);
  }

  return Buffer.alloc(0);
};

const describeError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > 0 ? message : 'unknown error';
};

const errorCodeOf = (error: unknown) => {
  if (typeof error === 'object' && error !== null) {
    const code = Reflect.get(error, 'code');
    if (typeof code === 'string' && code.length > 0) {
      return code;
    }
  }

  return 'unhandled_error';
};

const recoverWithInternalError = ({ctx, logger}: {ctx: RequestContext; logger: StructuredLogger}) => {
  // Headers queued before the failure belong to a response that is no longer sent.
  ctx.headers.splice(0);
  try {
    return internalError(ctx);
  } catch (error) {
    logger.error({
      event: 'request.error_page_failed',
      component: 'webapi.dispatch',
      reason_code: errorCodeOf(error),
      message: describeError(error)
    });
    ctx.headers.splice(0);
    return internalError(ctx, STATUS_DEFINITIONS[500].message);
  }
};

/**
 * Runs `handler` for one gateway request: creates and binds the request
 * context, converts the handler's result into a response and tears the
 * context down on every path. Errors other than invalid environments are
 * logged and answered with a 500.
 */
export const dispatchRequest = async ({
  environment,
  handler,
  requestId,
  ...options
}: DispatchRequestInput): Promise<GatewayResponse> => {
  const logger = options.logger ?? createNoopLogger();
  const now = options.now ?? (() => new Date());
  const ctx = createRequestContext(environment, {...options, logger});
  const startedAt = now().getTime();

  const logContext = {
    request_id: requestId ?? randomUUID(),
    route: ctx.path,
    method: ctx.method,
    ...(ctx.ip ? {remote_addr: ctx.ip} : {})
  };

  return runWithLogContext(logContext, () =>
    runWithRequestContext(ctx, async (): Promise<GatewayResponse> => {
      try {
        let body: Buffer;
        try {
          body = toBody(await handler(ctx));
        } catch (error) {
          logger.error({
            event: 'request.failed',
            component: 'webapi.dispatch',
            reason_code: errorCodeOf(error),
            message: describeError(error),
            metadata: {error_name: error instanceof Error ? error.name : typeof error}
          });
          body = toBody(recoverWithInternalError({ctx, logger}));
        }

        const statusCode = Number.parseInt(ctx.status, 10);
        logger.info({
          event: 'request.completed',
          component: 'webapi.dispatch',
          ...(statusCode >= 100 && statusCode <= 599 ? {status_code: statusCode} : {}),
          duration_ms: Math.max(0, now().getTime() - startedAt)
        });

        return {status: ctx.status, statusCode, headers: [...ctx.headers], body};
      } finally {
        await ctx.close().catch((error: unknown) =>
          logger.error({
            event: 'request.cleanup_failed',
            component: 'webapi.dispatch',
            reason_code: errorCodeOf(error),
            message: describeError(error)
          })
        );
      }
    })
  );
};
