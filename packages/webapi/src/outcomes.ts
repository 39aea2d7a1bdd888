import type {ApplicationScope} from './contracts';
import type {RequestContext} from './context';
import type {HeaderPair} from './headers';

export const SUCCESS_CODES = [200, 201, 202, 204] as const;
export const REDIRECT_CODES = [301, 302, 303, 307] as const;
export const ERROR_CODES = [400, 401, 403, 404, 405, 406, 409, 410, 412, 415, 451, 500] as const;

export type SuccessCode = (typeof SUCCESS_CODES)[number];
export type RedirectCode = (typeof REDIRECT_CODES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];
export type StatusCode = SuccessCode | RedirectCode | 304 | ErrorCode;

export type OutcomeKind = 'success' | 'redirect' | 'not_modified' | 'error';

type StatusDefinition = {
  kind: OutcomeKind;
  reason: string;
  message: string;
  headers: readonly HeaderPair[];
};

const HTML: readonly HeaderPair[] = [{name: 'Content-Type', value: 'text/html'}];

export const STATUS_DEFINITIONS: Readonly<Record<StatusCode, StatusDefinition>> = {
  200: {kind: 'success', reason: 'OK', message: '', headers: []},
  201: {kind: 'success', reason: 'Created', message: 'Created', headers: []},
  202: {kind: 'success', reason: 'Accepted', message: 'Accepted', headers: []},
  204: {kind: 'success', reason: 'No Content', message: 'No Content', headers: []},
  301: {kind: 'redirect', reason: 'Moved Permanently', message: '', headers: HTML},
  302: {kind: 'redirect', reason: 'Found', message: '', headers: HTML},
  303: {kind: 'redirect', reason: 'See Other', message: '', headers: HTML},
  304: {kind: 'not_modified', reason: 'Not Modified', message: '', headers: []},
  307: {kind: 'redirect', reason: 'Temporary Redirect', message: '', headers: HTML},
  400: {kind: 'error', reason: 'Bad Request', message: 'bad request', headers: HTML},
  401: {kind: 'error', reason: 'Unauthorized', message: 'unauthorized', headers: HTML},
  403: {kind: 'error', reason: 'Forbidden', message: 'forbidden', headers: HTML},
  404: {
    kind: 'error',
    reason: 'Not Found',
    message: 'not found',
    headers: [{name: 'Content-Type', value: 'text/html; charset=utf-8'}]
  },
  405: {kind: 'error', reason: 'Method Not Allowed', message: 'method not allowed', headers: HTML},
  406: {kind: 'error', reason: 'Not Acceptable', message: 'not acceptable', headers: HTML},
  409: {kind: 'error', reason: 'Conflict', message: 'conflict', headers: HTML},
  410: {kind: 'error', reason: 'Gone', message: 'gone', headers: HTML},
  412: {kind: 'error', reason: 'Precondition Failed', message: 'precondition failed', headers: HTML},
  415: {kind: 'error', reason: 'Unsupported Media Type', message: 'unsupported media type', headers: HTML},
  451: {
    kind: 'error',
    reason: 'Unavailable For Legal Reasons',
    message: 'unavailable for legal reasons',
    headers: HTML
  },
  500: {kind: 'error', reason: 'Internal Server Error', message: 'internal server error', headers: HTML}
};

type OutcomeShape<K extends OutcomeKind, C extends StatusCode> = Readonly<{
  kind: K;
  code: C;
  reason: string;
  statusLine: string;
  headers: readonly HeaderPair[];
  body: string;
}>;

export type SuccessOutcome = OutcomeShape<'success', SuccessCode>;
export type RedirectOutcome = OutcomeShape<'redirect', RedirectCode> & Readonly<{location: string}>;
export type NotModifiedOutcome = OutcomeShape<'not_modified', 304>;
export type ErrorOutcome = OutcomeShape<'error', ErrorCode>;

export type HttpOutcome = SuccessOutcome | RedirectOutcome | NotModifiedOutcome | ErrorOutcome;

export const statusLineFor = (code: StatusCode) => `${code} ${STATUS_DEFINITIONS[code].reason}`;

export const isStatusCode = (value: number): value is StatusCode =>
  Object.prototype.hasOwnProperty.call(STATUS_DEFINITIONS, String(value));

/** Sets the status, queues the outcome's headers on the context and returns the frozen parts. */
const settle = <C extends StatusCode>(
  ctx: RequestContext,
  code: C,
  {headers, body}: {headers: readonly HeaderPair[]; body: string}
) => {
  const statusLine = statusLineFor(code);
  ctx.setStatus(statusLine);
  for (const header of headers) {
    ctx.header(header.name, header.value);
  }

  return {
    code,
    reason: STATUS_DEFINITIONS[code].reason,
    statusLine,
    headers: Object.freeze(headers.map(header => Object.freeze({...header}))),
    body
  };
};

const success = (ctx: RequestContext, code: SuccessCode, body?: string): SuccessOutcome =>
  Object.freeze({
    kind: 'success',
    ...settle(ctx, code, {headers: STATUS_DEFINITIONS[code].headers, body: body ?? STATUS_DEFINITIONS[code].message})
  });

export const ok = (ctx: RequestContext, body?: string) => success(ctx, 200, body);
export const created = (ctx: RequestContext, body?: string) => success(ctx, 201, body);
export const accepted = (ctx: RequestContext, body?: string) => success(ctx, 202, body);
export const noContent = (ctx: RequestContext, body?: string) => success(ctx, 204, body);

const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:/iu;

const removeDotSegments = (path: string) => {
  const output: string[] = [];
  const segments = path.split('/').slice(1);
  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;
    if (segment === '..') {
      output.pop();
      if (last) {
        output.push('');
      }
    } else if (segment === '.') {
      if (last) {
        output.push('');
      }
    } else {
      output.push(segment);
    }
  });

  return `/${output.join('/')}`;
};

/**
 * Joins `url` against the current request path. Targets with a scheme are
 * kept as they are; every other target is a path on this site and gets the
 * application home (or the site root when `absolute`) prepended, including
 * ones that start with `//` or `/\`.
 */
export const resolveRedirectTarget = (ctx: RequestContext, url: string, {absolute = false} = {}) => {
  if (SCHEME_PATTERN.test(url)) {
    return url;
  }

  const cut = url.search(/[?#]/u);
  const path = cut === -1 ? url : url.slice(0, cut);
  const suffix = cut === -1 ? '' : url.slice(cut);
  const current = ctx.path.startsWith('/') ? ctx.path : `/${ctx.path}`;

  let joined: string;
  if (path === '') {
    joined = current;
  } else if (path.startsWith('/')) {
    joined = path;
  } else {
    joined = `${current.slice(0, current.lastIndexOf('/') + 1)}${path}`;
  }

  const home = absolute ? ctx.realHome : ctx.home;
  return `${home}${removeDotSegments(joined)}${suffix}`;
};

export type RedirectOptions = {
  /** Resolve site-relative targets against the site root instead of the application home. */
  absolute?: boolean;
};

const redirectWith =
  (code: RedirectCode) =>
  (ctx: RequestContext, url: string, options: RedirectOptions = {}): RedirectOutcome => {
    const location = resolveRedirectTarget(ctx, url, options);
    return Object.freeze({
      kind: 'redirect',
      location,
      ...settle(ctx, code, {
        headers: [...STATUS_DEFINITIONS[code].headers, {name: 'Location', value: location}],
        body: STATUS_DEFINITIONS[code].message
      })
    });
  };

export const redirect = redirectWith(301);
export const found = redirectWith(302);
export const seeOther = redirectWith(303);
export const tempRedirect = redirectWith(307);

export const notModified = (ctx: RequestContext): NotModifiedOutcome =>
  Object.freeze({kind: 'not_modified', ...settle(ctx, 304, {headers: [], body: ''})});

const failure = (
  ctx: RequestContext,
  code: ErrorCode,
  message: string | undefined,
  extraHeaders: readonly HeaderPair[] = []
): ErrorOutcome =>
  Object.freeze({
    kind: 'error',
    ...settle(ctx, code, {
      headers: [...STATUS_DEFINITIONS[code].headers, ...extraHeaders],
      body: message || STATUS_DEFINITIONS[code].message
    })
  });

export const badRequest = (ctx: RequestContext, message?: string) => failure(ctx, 400, message);
export const unauthorized = (ctx: RequestContext, message?: string) => failure(ctx, 401, message);
export const forbidden = (ctx: RequestContext, message?: string) => failure(ctx, 403, message);
export const notAcceptable = (ctx: RequestContext, message?: string) => failure(ctx, 406, message);
export const conflict = (ctx: RequestContext, message?: string) => failure(ctx, 409, message);
export const gone = (ctx: RequestContext, message?: string) => failure(ctx, 410, message);
export const preconditionFailed = (ctx: RequestContext, message?: string) => failure(ctx, 412, message);
export const unsupportedMediaType = (ctx: RequestContext, message?: string) => failure(ctx, 415, message);

const ALLOWABLE_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE'] as const;

/**
 * 405 with an `Allow` header naming the methods `handler` implements, or
 * every allowable method when no handler is given.
 */
export const methodNotAllowed = (ctx: RequestContext, handler?: object): ErrorOutcome => {
  const methods = handler
    ? ALLOWABLE_METHODS.filter(method => typeof Reflect.get(handler, method) === 'function')
    : ALLOWABLE_METHODS;

  return failure(ctx, 405, undefined, [{name: 'Allow', value: methods.join(', ')}]);
};

type DelegatedProducer = 'notFound' | 'unavailableForLegalReasons' | 'internalError';

const delegating = new WeakSet<RequestContext>();

/**
 * Uses the innermost application's producer when no message is given.
 * Calls made from inside a producer fall back to the default outcome.
 */
const delegated = (producer: DelegatedProducer, code: ErrorCode) => (ctx: RequestContext, message?: string) => {
  const scope: ApplicationScope | undefined = ctx.currentApplication();
  const produce = scope?.[producer];
  if (message || !produce || delegating.has(ctx)) {
    return failure(ctx, code, message);
  }

  delegating.add(ctx);
  try {
    return produce(ctx);
  } finally {
    delegating.delete(ctx);
  }
};

export const notFound = delegated('notFound', 404);
export const unavailableForLegalReasons = delegated('unavailableForLegalReasons', 451);
export const internalError = delegated('internalError', 500);

const OUTCOME_KINDS: readonly unknown[] = ['success', 'redirect', 'not_modified', 'error'];

export const isHttpOutcome = (value: unknown): value is HttpOutcome => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const code = Reflect.get(value, 'code');
  return (
    OUTCOME_KINDS.includes(Reflect.get(value, 'kind')) &&
    typeof code === 'number' &&
    isStatusCode(code) &&
    typeof Reflect.get(value, 'statusLine') === 'string' &&
    Array.isArray(Reflect.get(value, 'headers')) &&
    typeof Reflect.get(value, 'body') === 'string'
  );
};
