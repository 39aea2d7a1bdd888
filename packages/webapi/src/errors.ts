import type {CookieCodecError} from '@gatewire/cookie-codec';

export const webApiErrorCodes = [
  'invalid_environment',
  'invalid_header',
  'invalid_cookie',
  'missing_field',
  'body_too_large',
  'body_read_failed'
] as const;

export type WebApiErrorCode = (typeof webApiErrorCodes)[number];

/** Raised when a header name or value would split the response. */
export class InvalidHeaderError extends Error {
  public readonly code = 'invalid_header';
  public readonly headerName: string;

  public constructor(headerName: string) {
    super(`Invalid characters in header "${JSON.stringify(headerName).slice(1, -1)}"`);
    this.name = 'InvalidHeaderError';
    this.headerName = headerName;
  }
}

export class InvalidCookieError extends Error {
  public readonly code = 'invalid_cookie';
  public readonly reason: CookieCodecError;

  public constructor(reason: CookieCodecError) {
    super(reason.message);
    this.name = 'InvalidCookieError';
    this.reason = reason;
  }
}

export class RequestBodyError extends Error {
  public readonly code: 'body_too_large' | 'body_read_failed';

  public constructor({code, message}: {code: 'body_too_large' | 'body_read_failed'; message: string}) {
    super(message);
    this.name = 'RequestBodyError';
    this.code = code;
  }
}

export class InvalidEnvironmentError extends Error {
  public readonly code = 'invalid_environment';

  public constructor(message: string) {
    super(message);
    this.name = 'InvalidEnvironmentError';
  }
}

export type MissingFieldError = {
  code: 'missing_field';
  field: string;
  message: string;
};
