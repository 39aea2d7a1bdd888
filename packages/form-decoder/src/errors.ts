export const formDecoderErrorCodes = [
  'invalid_input',
  'content_type_missing',
  'multipart_boundary_missing',
  'multipart_malformed',
  'unsupported_content_type',
  'body_too_large',
  'body_read_failed'
] as const;

export type FormDecoderErrorCode = (typeof formDecoderErrorCodes)[number];

export type FormDecoderError = {
  code: FormDecoderErrorCode;
  message: string;
};

export type FormDecoderSuccess<T> = {ok: true; value: T};
export type FormDecoderFailure = {ok: false; error: FormDecoderError};
export type FormDecoderResult<T> = FormDecoderSuccess<T> | FormDecoderFailure;

export const ok = <T>(value: T): FormDecoderSuccess<T> => ({ok: true, value});

export const err = (code: FormDecoderErrorCode, message: string): FormDecoderFailure => ({
  ok: false,
  error: {code, message}
});

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
