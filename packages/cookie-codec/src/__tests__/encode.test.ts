import {describe, expect, it} from 'vitest';

import {encodeCookie} from '../index';

const fixedNow = () => new Date('2026-03-01T12:00:00.000Z');

const attributesOf = (header: string) => header.split('; ').slice(1).sort();

describe('encodeCookie', () => {
  it('percent-encodes the value and defaults the path to the mount path', () => {
    expect(encodeCookie({name: 'sid', value: 'a b'}, {homePath: '/app'})).toEqual({
      ok: true,
      value: 'sid=a%20b; Path=/app/'
    });
  });

  it('uses the root path when the application is mounted at the site root', () => {
    const encoded = encodeCookie({name: 'theme', value: 'dark'}, {homePath: ''});
    expect(encoded).toEqual({ok: true, value: 'theme=dark; Path=/'});
  });

  it('emits only the requested attributes', () => {
    const encoded = encodeCookie(
      {
        name: 'sid',
        value: 'abc',
        domain: 'example.test',
        path: '/admin',
        secure: true,
        httpOnly: true,
        sameSite: 'LAX'
      },
      {homePath: '/app'}
    );

    expect(encoded.ok).toBe(true);
    if (!encoded.ok) {
      return;
    }

    expect(encoded.value.startsWith('sid=abc; ')).toBe(true);
    expect(attributesOf(encoded.value)).toEqual([
      'Domain=example.test',
      'HttpOnly',
      'Path=/admin',
      'SameSite=Lax',
      'Secure'
    ]);
  });

  it('ignores unknown SameSite values', () => {
    const encoded = encodeCookie({name: 'sid', value: 'abc', sameSite: 'sometimes'}, {homePath: ''});
    expect(encoded).toEqual({ok: true, value: 'sid=abc; Path=/'});
  });

  it('treats a negative lifetime as an immediate expiry', () => {
    const encoded = encodeCookie({name: 'sid', value: '', expires: -1}, {homePath: '', now: fixedNow});

    expect(encoded.ok).toBe(true);
    if (!encoded.ok) {
      return;
    }

    expect(attributesOf(encoded.value)).toEqual(['Expires=Thu, 01 Jan 1970 00:00:00 GMT', 'Path=/']);
  });

  it('turns a positive lifetime into an absolute expiry date', () => {
    const encoded = encodeCookie({name: 'sid', value: 'abc', expires: 3600}, {homePath: '', now: fixedNow});

    expect(encoded.ok).toBe(true);
    if (!encoded.ok) {
      return;
    }

    expect(attributesOf(encoded.value)).toEqual(['Expires=Sun, 01 Mar 2026 13:00:00 GMT', 'Path=/']);
  });

  it('stringifies scalar values', () => {
    expect(encodeCookie({name: 'visits', value: 3}, {homePath: ''})).toEqual({ok: true, value: 'visits=3; Path=/'});
  });

  it('rejects names outside the token grammar', () => {
    const encoded = encodeCookie({name: 'bad name', value: 'x'}, {homePath: ''});
    expect(encoded).toEqual({
      ok: false,
      error: {code: 'cookie_name_invalid', message: 'Invalid cookie name: bad name'}
    });
  });

  it('rejects attributes the cookie serializer refuses', () => {
    const encoded = encodeCookie({name: 'sid', value: 'x', path: '/a;b'}, {homePath: ''});
    expect(encoded.ok).toBe(false);
    if (encoded.ok) {
      return;
    }

    expect(encoded.error.code).toBe('cookie_attribute_invalid');
  });
});
