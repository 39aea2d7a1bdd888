export {
  defaultRequestHandlingConfig,
  loadWebApiConfig,
  type RequestHandlingConfig,
  type WebApiConfig
} from './config';
export {
  createRequestContext,
  RequestContext,
  type FieldLookupResult,
  type FieldQuery,
  type FieldValues,
  type InputQuery,
  type InputValue,
  type RawFieldValue,
  type UnicodeOption
} from './context';
export {
  GatewayEnvironmentSchema,
  GatewayVariablesSchema,
  INPUT_SOURCES,
  type ApplicationScope,
  type GatewayEnvironment,
  type InputSource,
  type OutcomeProducer,
  type RequestContextOptions
} from './contracts';
export {
  dispatchRequest,
  type DispatchRequestInput,
  type GatewayResponse,
  type HandlerResult,
  type RequestHandler
} from './dispatch';
export {
  InvalidCookieError,
  InvalidEnvironmentError,
  InvalidHeaderError,
  RequestBodyError,
  webApiErrorCodes,
  type MissingFieldError,
  type WebApiErrorCode
} from './errors';
export {emitHeader, type EmitHeaderOptions, type HeaderPair} from './headers';
export {
  accepted,
  badRequest,
  conflict,
  created,
  ERROR_CODES,
  forbidden,
  found,
  gone,
  internalError,
  isHttpOutcome,
  isStatusCode,
  methodNotAllowed,
  noContent,
  notAcceptable,
  notFound,
  notModified,
  ok,
  preconditionFailed,
  redirect,
  REDIRECT_CODES,
  resolveRedirectTarget,
  seeOther,
  STATUS_DEFINITIONS,
  statusLineFor,
  SUCCESS_CODES,
  tempRedirect,
  unauthorized,
  unavailableForLegalReasons,
  unsupportedMediaType,
  type ErrorCode,
  type ErrorOutcome,
  type HttpOutcome,
  type NotModifiedOutcome,
  type OutcomeKind,
  type RedirectCode,
  type RedirectOptions,
  type RedirectOutcome,
  type StatusCode,
  type SuccessCode,
  type SuccessOutcome
} from './outcomes';
export {getRequestContext, runWithRequestContext} from './storage';

export const packageName = 'webapi';
