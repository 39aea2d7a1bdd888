import {parseContentType} from './contentType';
import {
  emptyForm,
  FormDecodeOptionsSchema,
  WRITE_METHODS,
  type DecodedForm,
  type FormDecodeInput
} from './contracts';
import {describeError, err, ok, type FormDecoderResult} from './errors';
import {decodeMultipart} from './multipart';
import {readStreamBytes} from './stream';
import {parseUrlEncoded} from './urlencoded';

const isWriteMethod = (method: string) => WRITE_METHODS.some(candidate => candidate === method.toUpperCase());

const decodeStrict = async (input: FormDecodeInput): Promise<FormDecoderResult<DecodedForm>> => {
  const parsedOptions = FormDecodeOptionsSchema.safeParse({
    strict: input.strict,
    charset: input.charset,
    memoryThresholdBytes: input.memoryThresholdBytes,
    tempDirectory: input.tempDirectory,
    maxBodyBytes: input.maxBodyBytes
  });
  if (!parsedOptions.success) {
    return err('invalid_input', parsedOptions.error.message);
  }
  const options = parsedOptions.data;

  if (!isWriteMethod(input.method)) {
    return ok(emptyForm());
  }

  if (!input.contentType || input.contentType.trim().length === 0) {
    return err('content_type_missing', 'Request has no Content-Type');
  }

  const {mediaType, parameters} = parseContentType(input.contentType);
  const charset = parameters.charset ?? options.charset;

  if (mediaType === 'multipart/form-data') {
    if (!parameters.boundary) {
      return err('multipart_boundary_missing', 'Multipart Content-Type has no boundary parameter');
    }

    return decodeMultipart({
      body: input.body,
      contentType: input.contentType,
      charset,
      memoryThresholdBytes: options.memoryThresholdBytes,
      tempDirectory: options.tempDirectory
    });
  }

  if (mediaType === 'application/x-www-form-urlencoded') {
    const bytes = await readStreamBytes({
      stream: input.body,
      length: input.contentLength,
      maxBytes: options.maxBodyBytes
    });
    if (!bytes.ok) {
      return bytes;
    }

    try {
      return ok({fields: parseUrlEncoded(new TextDecoder(charset).decode(bytes.value)), files: {}});
    } catch (error) {
      return err('invalid_input', describeError(error));
    }
  }

  return err('unsupported_content_type', `Unsupported form Content-Type: ${mediaType}`);
};

/**
 * Decodes a form body into fields and file uploads. In strict mode every
 * failure is returned; otherwise a failure yields an empty form. Uploads
 * opened before a failure are always released.
 */
export const decodeForm = async (input: FormDecodeInput): Promise<FormDecoderResult<DecodedForm>> => {
  const decoded = await decodeStrict(input);
  if (decoded.ok || input.strict) {
    return decoded;
  }

  return ok(emptyForm());
};
