import {serialize} from 'cookie';

import {
  EXPIRED_COOKIE_DATE,
  SAME_SITE_VALUES,
  SetCookieInputSchema,
  type CookieEncodingContext,
  type SameSite,
  type SetCookieInput
} from './contracts';
import {err, ok, type CookieCodecResult} from './errors';

const COOKIE_NAME_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

const resolveExpires = ({expires, now}: {expires: Date | number | undefined; now: () => Date}) => {
  if (expires === undefined || expires instanceof Date) {
    return expires;
  }

  if (expires < 0) {
    return EXPIRED_COOKIE_DATE;
  }

  return new Date(now().getTime() + expires * 1000);
};

const resolveSameSite = (sameSite: string | undefined): SameSite | undefined => {
  const normalized = sameSite?.toLowerCase();
  return SAME_SITE_VALUES.find(candidate => candidate === normalized);
};

/**
 * Builds a Set-Cookie header value. The value is percent-encoded and only
 * the attributes that were asked for are emitted; an unrecognized SameSite
 * value is dropped.
 */
export const encodeCookie = (
  input: SetCookieInput,
  context: CookieEncodingContext
): CookieCodecResult<string> => {
  const parsedInput = SetCookieInputSchema.safeParse(input);
  if (!parsedInput.success) {
    return err('invalid_input', parsedInput.error.message);
  }

  const cookie = parsedInput.data;
  if (!COOKIE_NAME_REGEX.test(cookie.name)) {
    return err('cookie_name_invalid', `Invalid cookie name: ${cookie.name}`);
  }

  const sameSite = resolveSameSite(cookie.sameSite);
  try {
    return ok(
      serialize(cookie.name, cookie.value, {
        encode: encodeURIComponent,
        expires: resolveExpires({expires: cookie.expires, now: context.now ?? (() => new Date())}),
        path: cookie.path ?? `${context.homePath}/`,
        ...(cookie.domain ? {domain: cookie.domain} : {}),
        ...(cookie.secure ? {secure: true} : {}),
        ...(cookie.httpOnly ? {httpOnly: true} : {}),
        ...(sameSite ? {sameSite} : {})
      })
    );
  } catch (error) {
    return err('cookie_attribute_invalid', error instanceof Error ? error.message : String(error));
  }
};
