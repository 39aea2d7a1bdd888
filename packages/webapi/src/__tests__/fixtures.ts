import {Readable} from 'node:stream';

import type {StructuredLogger} from '@gatewire/logging';
import {vi} from 'vitest';

import type {GatewayEnvironment} from '../contracts';

export const makeEnvironment = (
  variables: Record<string, string> = {},
  body: string | Buffer = Buffer.alloc(0)
): GatewayEnvironment => {
  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;

  return {
    variables: {
      REQUEST_METHOD: 'GET',
      HTTP_HOST: 'example.test',
      SCRIPT_NAME: '',
      PATH_INFO: '/',
      ...variables
    },
    input: Readable.from([bytes])
  };
};

export const makeFormPost = (body: string, variables: Record<string, string> = {}) =>
  makeEnvironment(
    {
      REQUEST_METHOD: 'POST',
      CONTENT_TYPE: 'application/x-www-form-urlencoded',
      CONTENT_LENGTH: String(Buffer.byteLength(body)),
      ...variables
    },
    body
  );

export const BOUNDARY = 'gatewire-ctx-boundary';

export const multipartBody = (parts: Array<{name: string; filename?: string; content: string}>) =>
  Buffer.from(
    parts
      .map(part => {
        const filename = part.filename === undefined ? '' : `; filename="${part.filename}"`;
        return `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.name}"${filename}\r\n\r\n${part.content}\r\n`;
      })
      .join('') + `--${BOUNDARY}--\r\n`
  );

export const makeMultipartPost = (
  parts: Array<{name: string; filename?: string; content: string}>,
  variables: Record<string, string> = {}
) => {
  const body = multipartBody(parts);
  return makeEnvironment(
    {
      REQUEST_METHOD: 'POST',
      CONTENT_TYPE: `multipart/form-data; boundary=${BOUNDARY}`,
      CONTENT_LENGTH: String(body.length),
      ...variables
    },
    body
  );
};

export const createMockLogger = () => {
  const logger = {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn()
  } satisfies StructuredLogger;

  return logger;
};

export const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    writer: {
      stdout: {
        write: (chunk: string | Uint8Array) => {
          stdout.push(String(chunk).trim());
          return true;
        }
      },
      stderr: {
        write: (chunk: string | Uint8Array) => {
          stderr.push(String(chunk).trim());
          return true;
        }
      }
    }
  };
};
