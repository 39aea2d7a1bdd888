export type ParsedContentType = {
  mediaType: string;
  parameters: Record<string, string>;
};

const PARAMETER_REGEX = /;\s*([!#$%&'*+.^_`|~0-9A-Za-z-]+)\s*=\s*("(?:[^"\\]|\\.)*"|[^;]*)/gu;

const unquoteParameter = (value: string) => {
  const trimmed = value.trim();
  if (trimmed.length < 2 || !trimmed.startsWith('"') || !trimmed.endsWith('"')) {
    return trimmed;
  }

  return trimmed.slice(1, -1).replace(/\\(.)/gu, '$1');
};

/**
 * Splits a Content-Type header into its lower-cased media type and its
 * parameters. Parameter names are lower-cased, values keep their case.
 */
export const parseContentType = (header: string): ParsedContentType => {
  const separatorIndex = header.indexOf(';');
  const mediaType = (separatorIndex === -1 ? header : header.slice(0, separatorIndex)).trim().toLowerCase();
  const parameters = new Map<string, string>();

  if (separatorIndex !== -1) {
    for (const match of header.slice(separatorIndex).matchAll(PARAMETER_REGEX)) {
      const name = match[1].toLowerCase();
      if (!parameters.has(name)) {
        parameters.set(name, unquoteParameter(match[2]));
      }
    }
  }

  return {mediaType, parameters: Object.fromEntries(parameters)};
};
