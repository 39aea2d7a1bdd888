import {InvalidHeaderError} from './errors';

export type HeaderPair = {
  name: string;
  value: string;
};

export type EmitHeaderOptions = {
  /** Skip the header when one with the same name (any case) is already queued. */
  unique?: boolean;
};

const BREAKS_LINE = /[\r\n]/u;

/**
 * Queues `name: value` on an outbound header list. CR or LF anywhere in the
 * name or value is rejected before anything is queued.
 */
export const emitHeader = (
  headers: HeaderPair[],
  name: string | number,
  value: string | number,
  {unique = false}: EmitHeaderOptions = {}
): void => {
  const headerName = String(name);
  const headerValue = String(value);
  if (BREAKS_LINE.test(headerName) || BREAKS_LINE.test(headerValue)) {
    throw new InvalidHeaderError(headerName);
  }

  if (unique) {
    const lowered = headerName.toLowerCase();
    if (headers.some(header => header.name.toLowerCase() === lowered)) {
      return;
    }
  }

  headers.push({name: headerName, value: headerValue});
};
