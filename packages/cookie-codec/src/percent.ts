const HEX_PAIR_REGEX = /^[0-9A-Fa-f]{2}$/;

/**
 * Decodes `%XX` escapes as UTF-8. Malformed escapes stay as written and
 * invalid byte sequences become U+FFFD, so the call never throws.
 */
export const percentDecode = (value: string): string => {
  if (!value.includes('%')) {
    return value;
  }

  const bytes: number[] = [];
  for (let index = 0; index < value.length; index += 1) {
    const char = value.charAt(index);
    const hex = value.slice(index + 1, index + 3);
    if (char === '%' && HEX_PAIR_REGEX.test(hex)) {
      bytes.push(Number.parseInt(hex, 16));
      index += 2;
      continue;
    }

    const codePoint = value.codePointAt(index) ?? 0;
    const encoded = Buffer.from(String.fromCodePoint(codePoint), 'utf8');
    bytes.push(...encoded);
    if (codePoint > 0xffff) {
      index += 1;
    }
  }

  return Buffer.from(bytes).toString('utf8');
};
