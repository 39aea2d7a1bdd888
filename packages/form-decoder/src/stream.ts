import type {Readable} from 'node:stream';

import {describeError, err, ok, type FormDecoderResult} from './errors';

export const toBuffer = (chunk: unknown): Buffer => {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }

  throw new TypeError('Body stream produced a chunk that is not bytes');
};

/**
 * Reads `length` bytes from the stream, or everything up to its end when no
 * length is given. The stream is left open once enough bytes have arrived.
 */
export const readStreamBytes = async ({
  stream,
  length,
  maxBytes
}: {
  stream: Readable;
  length?: number;
  maxBytes?: number;
}): Promise<FormDecoderResult<Buffer>> => {
  if (length === 0) {
    return ok(Buffer.alloc(0));
  }

  if (length !== undefined && maxBytes !== undefined && length > maxBytes) {
    return err('body_too_large', `Request body exceeds ${maxBytes} bytes`);
  }

  const chunks: Buffer[] = [];
  let size = 0;
  const iterator: AsyncIterator<unknown> = stream[Symbol.asyncIterator]();

  try {
    while (length === undefined || size < length) {
      const next = await iterator.next();
      if (next.done) {
        break;
      }

      const chunk = toBuffer(next.value);
      size += chunk.length;
      if (maxBytes !== undefined && size > maxBytes) {
        return err('body_too_large', `Request body exceeds ${maxBytes} bytes`);
      }
      chunks.push(chunk);
    }
  } catch (error) {
    return err('body_read_failed', describeError(error));
  }

  const body = Buffer.concat(chunks);
  return ok(length === undefined ? body : body.subarray(0, length));
};
