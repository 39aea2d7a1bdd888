import {AsyncLocalStorage} from 'node:async_hooks';

import type {RequestContext} from './context';

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/** Binds `ctx` to every task started by `operation`; the binding ends when it settles. */
export const runWithRequestContext = <T>(ctx: RequestContext, operation: () => T): T =>
  requestContextStorage.run(ctx, operation);

export const getRequestContext = (): RequestContext | undefined => requestContextStorage.getStore();
