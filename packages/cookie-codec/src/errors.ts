export const cookieCodecErrorCodes = [
  'invalid_input',
  'cookie_header_malformed',
  'cookie_name_invalid',
  'cookie_attribute_invalid'
] as const;

export type CookieCodecErrorCode = (typeof cookieCodecErrorCodes)[number];

export type CookieCodecError = {
  code: CookieCodecErrorCode;
  message: string;
};

export type CookieCodecSuccess<T> = {ok: true; value: T};
export type CookieCodecFailure = {ok: false; error: CookieCodecError};
export type CookieCodecResult<T> = CookieCodecSuccess<T> | CookieCodecFailure;

export const ok = <T>(value: T): CookieCodecSuccess<T> => ({ok: true, value});

export const err = (code: CookieCodecErrorCode, message: string): CookieCodecFailure => ({
  ok: false,
  error: {code, message}
});
