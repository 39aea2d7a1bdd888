export {collapseValues, groupValues} from './collapse';
export {parseContentType, type ParsedContentType} from './contentType';
export {
  DEFAULT_MEMORY_THRESHOLD_BYTES,
  FormDecodeOptionsSchema,
  WRITE_METHODS,
  emptyForm,
  type DecodedForm,
  type FieldValue,
  type FileValue,
  type FormDecodeInput,
  type FormDecodeOptions,
  type ParsedFormDecodeOptions
} from './contracts';
export {decodeForm} from './decode';
export {
  describeError,
  err,
  formDecoderErrorCodes,
  ok,
  type FormDecoderError,
  type FormDecoderErrorCode,
  type FormDecoderFailure,
  type FormDecoderResult,
  type FormDecoderSuccess
} from './errors';
export {releaseUploads, SpooledUpload, type FileUpload, type SpoolOptions} from './fileUpload';
export {decodeMultipart, type MultipartDecodeInput} from './multipart';
export {readStreamBytes, toBuffer} from './stream';
export {parseUrlEncoded} from './urlencoded';

export const packageName = 'form-decoder';
