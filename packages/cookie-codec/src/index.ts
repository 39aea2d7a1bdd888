export {
  EXPIRED_COOKIE_DATE,
  SAME_SITE_VALUES,
  SetCookieInputSchema,
  type CookieEncodingContext,
  type CookieRecord,
  type ParsedSetCookieInput,
  type SameSite,
  type SetCookieInput
} from './contracts';
export {decodeCookies, parseCookieHeaderStrict} from './decode';
export {encodeCookie} from './encode';
export {
  cookieCodecErrorCodes,
  err,
  ok,
  type CookieCodecError,
  type CookieCodecErrorCode,
  type CookieCodecFailure,
  type CookieCodecResult,
  type CookieCodecSuccess
} from './errors';
export {percentDecode} from './percent';

export const packageName = 'cookie-codec';
