import type {CookieRecord} from './contracts';
import {err, ok, type CookieCodecResult} from './errors';
import {percentDecode} from './percent';

const COOKIE_NAME_CHAR_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]$/;
const UNQUOTED_VALUE_INVALID_REGEX = /[\s"\\\u0000-\u001f\u007f]/u;
const OCTAL_ESCAPE_REGEX = /^[0-3][0-7]{2}$/;
const PAIR_DELIMITER = ';';

type CookiePair = [name: string, value: string];

const isLinearWhitespace = (char: string) => char === ' ' || char === '\t';

const skipWhitespace = (header: string, start: number) => {
  let index = start;
  while (index < header.length && isLinearWhitespace(header.charAt(index))) {
    index += 1;
  }
  return index;
};

const readQuotedValue = (
  header: string,
  start: number
): CookieCodecResult<{value: string; next: number}> => {
  let value = '';
  let index = start + 1;

  while (index < header.length) {
    const char = header.charAt(index);
    if (char === '"') {
      return ok({value, next: index + 1});
    }

    if (char === '\\') {
      const octal = header.slice(index + 1, index + 4);
      if (OCTAL_ESCAPE_REGEX.test(octal)) {
        value += String.fromCharCode(Number.parseInt(octal, 8));
        index += 4;
        continue;
      }

      if (index + 1 >= header.length) {
        break;
      }
      value += header.charAt(index + 1);
      index += 2;
      continue;
    }

    value += char;
    index += 1;
  }

  return err('cookie_header_malformed', 'Unterminated quoted cookie value');
};

/**
 * Parses a Cookie header against the RFC 6265 cookie-pair grammar, with
 * quoted-string values. `$`-prefixed RFC 2965 attributes are skipped. Any
 * deviation fails the whole header.
 */
export const parseCookieHeaderStrict = (header: string): CookieCodecResult<CookiePair[]> => {
  const pairs: CookiePair[] = [];
  let index = 0;

  while (index < header.length) {
    index = skipWhitespace(header, index);
    if (index >= header.length) {
      break;
    }
    if (header.charAt(index) === PAIR_DELIMITER) {
      index += 1;
      continue;
    }

    const nameStart = index;
    while (index < header.length && COOKIE_NAME_CHAR_REGEX.test(header.charAt(index))) {
      index += 1;
    }
    const name = header.slice(nameStart, index);
    if (name.length === 0) {
      return err('cookie_header_malformed', `Invalid cookie name at offset ${nameStart}`);
    }

    index = skipWhitespace(header, index);
    if (header.charAt(index) !== '=') {
      return err('cookie_header_malformed', `Cookie "${name}" has no value`);
    }
    index = skipWhitespace(header, index + 1);

    let value: string;
    if (header.charAt(index) === '"') {
      const quoted = readQuotedValue(header, index);
      if (!quoted.ok) {
        return quoted;
      }
      value = quoted.value.value;
      index = quoted.value.next;
    } else {
      const delimiterIndex = header.indexOf(PAIR_DELIMITER, index);
      const valueEnd = delimiterIndex === -1 ? header.length : delimiterIndex;
      value = header.slice(index, valueEnd).trimEnd();
      if (UNQUOTED_VALUE_INVALID_REGEX.test(value)) {
        return err('cookie_header_malformed', `Cookie "${name}" has an invalid value`);
      }
      index += value.length;
    }

    index = skipWhitespace(header, index);
    if (index < header.length && header.charAt(index) !== PAIR_DELIMITER) {
      return err('cookie_header_malformed', `Unexpected character after cookie "${name}"`);
    }

    if (!name.startsWith('$')) {
      pairs.push([name, value]);
    }
  }

  return ok(pairs);
};

const parseQuotedHeader = (header: string): CookiePair[] => {
  const strict = parseCookieHeaderStrict(header);
  if (strict.ok) {
    return strict.value;
  }

  // Salvage whatever segments parse on their own.
  return header.split(PAIR_DELIMITER).flatMap(segment => {
    const parsedSegment = parseCookieHeaderStrict(segment);
    return parsedSegment.ok ? parsedSegment.value : [];
  });
};

const parseSimpleHeader = (header: string): CookiePair[] =>
  header.split(PAIR_DELIMITER).flatMap((segment): CookiePair[] => {
    const separatorIndex = segment.indexOf('=');
    if (separatorIndex === -1) {
      return [];
    }

    const name = segment.slice(0, separatorIndex).trim();
    if (name.length === 0) {
      return [];
    }

    return [[name, segment.slice(separatorIndex + 1).trim()]];
  });

/**
 * Decodes an inbound Cookie header into name/value pairs. Attributes are
 * dropped, values are percent-decoded and later duplicates win. Malformed
 * input yields whatever could be recovered, possibly nothing.
 */
export const decodeCookies = (header: string | undefined): CookieRecord => {
  if (!header) {
    return {};
  }

  const pairs = header.includes('"') ? parseQuotedHeader(header) : parseSimpleHeader(header);
  const cookies = new Map<string, string>();
  for (const [name, value] of pairs) {
    cookies.set(name, percentDecode(value));
  }

  return Object.fromEntries(cookies);
};
