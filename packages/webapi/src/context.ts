import {Readable} from 'node:stream';
import {inspect} from 'node:util';

import {decodeCookies, encodeCookie, type SetCookieInput} from '@gatewire/cookie-codec';
import {
  decodeForm,
  parseUrlEncoded,
  readStreamBytes,
  releaseUploads,
  WRITE_METHODS,
  type FieldValue,
  type FileUpload,
  type FileValue
} from '@gatewire/form-decoder';
import {createNoopLogger, setLogContextFields, type StructuredLogger} from '@gatewire/logging';

import {defaultRequestHandlingConfig, type RequestHandlingConfig} from './config';
import {
  GatewayEnvironmentSchema,
  type ApplicationScope,
  type GatewayEnvironment,
  type InputSource,
  type RequestContextOptions
} from './contracts';
import {InvalidCookieError, InvalidEnvironmentError, RequestBodyError, type MissingFieldError} from './errors';
import {emitHeader, type EmitHeaderOptions, type HeaderPair} from './headers';
import {badRequest, isStatusCode, statusLineFor, type ErrorOutcome} from './outcomes';

export type RawFieldValue = FieldValue | FileValue;
export type InputValue = string | FileUpload | Array<string | FileUpload>;

/** `true` applies NFC normalization, a function replaces it, `false` keeps strings as received. */
export type UnicodeOption = boolean | ((value: string) => string);

export type FieldQuery = {
  required?: readonly string[];
  defaults?: Readonly<Record<string, InputValue | null | undefined>>;
  unicode?: UnicodeOption;
};

export type InputQuery = FieldQuery & {
  method?: InputSource;
};

export type FieldLookupResult<T> =
  | {ok: true; value: T}
  | {ok: false; error: MissingFieldError; outcome: ErrorOutcome};

export type FieldValues = Record<string, InputValue | null | undefined>;

type MountFrame = {
  scope: ApplicationScope;
  home: string;
  homePath: string;
  path: string;
};

const SECURE_FLAGS = new Set(['on', 'true', '1']);

const parseContentLength = (value: string | undefined) => {
  if (value === undefined || !/^\s*\d+\s*$/u.test(value)) {
    return 0;
  }

  return Number.parseInt(value, 10);
};

const toUnicode = (option: UnicodeOption): ((value: string) => string) | undefined => {
  if (option === false) {
    return undefined;
  }

  return option === true ? value => value.normalize('NFC') : option;
};

const isUpload = (value: string | FileUpload): value is FileUpload => typeof value !== 'string';

export class RequestContext {
  public readonly environment: GatewayEnvironment;
  public readonly headers: HeaderPair[] = [];
  public status = '200 OK';

  public readonly method: string;
  public readonly protocol: 'http' | 'https';
  public readonly host: string;
  public readonly ip: string | undefined;
  public readonly query: string;
  public readonly homeDomain: string;
  /** Site root: protocol and host, no mount path. */
  public readonly realHome: string;
  public homePath: string;
  public home: string;
  public path: string;

  private readonly config: RequestHandlingConfig;
  private readonly logger: StructuredLogger;
  private readonly now: () => Date;
  private readonly applications: MountFrame[] = [];
  private readonly uploads = new Set<FileUpload>();
  private bodyPromise: Promise<Buffer> | undefined;
  private multipartFields: Promise<Record<string, RawFieldValue>> | undefined;
  private parsedCookies: Record<string, string> | undefined;
  private closed = false;

  public constructor(environment: GatewayEnvironment, options: RequestContextOptions = {}) {
    const parsed = GatewayEnvironmentSchema.safeParse(environment);
    if (!parsed.success) {
      throw new InvalidEnvironmentError(parsed.error.message);
    }

    this.environment = parsed.data;
    this.config = {...defaultRequestHandlingConfig(), ...options.config};
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? (() => new Date());

    const variables = this.environment.variables;
    this.method = (variables.REQUEST_METHOD ?? 'GET').toUpperCase();
    this.protocol = SECURE_FLAGS.has((variables.HTTPS ?? '').toLowerCase()) ? 'https' : 'http';
    this.host = variables.HTTP_HOST ?? variables.SERVER_NAME ?? '[unknown]';
    this.ip = variables.REMOTE_ADDR;
    this.query = variables.QUERY_STRING ? `?${variables.QUERY_STRING}` : '';
    this.homeDomain = `${this.protocol}://${this.host}`;
    this.realHome = this.homeDomain;
    this.homePath = (variables.SCRIPT_NAME ?? '').replace(/\/+$/u, '');
    this.home = `${this.homeDomain}${this.homePath}`;
    this.path = variables.PATH_INFO || '/';

    for (const scope of options.applications ?? []) {
      this.enterApplication(scope);
    }
  }

  public get fullPath(): string {
    return `${this.path}${this.query}`;
  }

  public get variables(): Readonly<Record<string, string>> {
    return this.environment.variables;
  }

  /** Reads the request body once; later calls share the same result. */
  public body(): Promise<Buffer> {
    this.bodyPromise ??= this.readBody();
    return this.bodyPromise;
  }

  public data(): Promise<Buffer> {
    return this.body();
  }

  /**
   * Request fields from the query string, the body or both. Body fields
   * win on name collisions; values are not merged across sources.
   */
  public async rawFields(source: InputSource = 'both'): Promise<Record<string, RawFieldValue>> {
    const post = source !== 'get' && this.hasFormBody() ? await this.postFields() : {};
    const get = source !== 'post' ? parseUrlEncoded(this.variables.QUERY_STRING ?? '') : {};

    return {...get, ...post};
  }

  public async input({
    required = [],
    defaults = {},
    method = 'both',
    unicode = true
  }: InputQuery = {}): Promise<FieldLookupResult<FieldValues>> {
    return this.lookupFields(await this.rawFields(method), {required, defaults, unicode});
  }

  public cookies({required = [], defaults = {}, unicode = false}: FieldQuery = {}): FieldLookupResult<FieldValues> {
    this.parsedCookies ??= decodeCookies(this.variables.HTTP_COOKIE);
    return this.lookupFields(this.parsedCookies, {required, defaults, unicode});
  }

  public header(name: string | number, value: string | number, options?: EmitHeaderOptions): void {
    emitHeader(this.headers, name, value, options);
  }

  public setCookie(cookie: SetCookieInput): void {
    const encoded = encodeCookie(cookie, {homePath: this.homePath, now: this.now});
    if (!encoded.ok) {
      throw new InvalidCookieError(encoded.error);
    }

    this.header('Set-Cookie', encoded.value);
  }

  /** Accepts a full status line, or a known status code whose reason phrase is filled in. */
  public setStatus(status: string | number): void {
    if (typeof status === 'number') {
      if (!isStatusCode(status)) {
        throw new RangeError(`Unknown status code: ${status}`);
      }
      this.status = statusLineFor(status);
      return;
    }

    if (/[\r\n]/u.test(status)) {
      throw new RangeError('Status line must not contain line breaks');
    }
    this.status = status;
  }

  /** Writes pretty-printed values through the logger when `config.debug` is on. */
  public debug(...values: unknown[]): string {
    if (!this.config.debug) {
      return '';
    }

    for (const value of values) {
      this.logger.debug({
        event: 'request.debug',
        component: 'webapi.context',
        message: inspect(value, {depth: 6, breakLength: 100})
      });
    }

    return '';
  }

  /**
   * Pushes a routing scope. A scope with a `mountPath` that prefixes the
   * current path moves `home` and `homePath` down and strips the prefix
   * from `path`.
   */
  public enterApplication(scope: ApplicationScope): void {
    this.applications.push({scope, home: this.home, homePath: this.homePath, path: this.path});

    const mountPath = scope.mountPath?.replace(/\/+$/u, '');
    if (!mountPath || !(this.path === mountPath || this.path.startsWith(`${mountPath}/`))) {
      return;
    }

    this.home = `${this.home}${mountPath}`;
    this.homePath = `${this.homePath}${mountPath}`;
    this.path = this.path.slice(mountPath.length) || '/';
    setLogContextFields({route: this.path});
  }

  public leaveApplication(): ApplicationScope | undefined {
    const frame = this.applications.pop();
    if (!frame) {
      return undefined;
    }

    this.home = frame.home;
    this.homePath = frame.homePath;
    this.path = frame.path;
    setLogContextFields({route: this.path});
    return frame.scope;
  }

  public currentApplication(): ApplicationScope | undefined {
    return this.applications.at(-1)?.scope;
  }

  /** Releases every upload decoded for this request. Safe to call more than once. */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    const uploads = [...this.uploads];
    this.uploads.clear();
    await releaseUploads(uploads);
  }

  private hasFormBody() {
    return WRITE_METHODS.some(method => method === this.method);
  }

  private async readBody(): Promise<Buffer> {
    const chunked = (this.variables.HTTP_TRANSFER_ENCODING ?? '').toLowerCase() === 'chunked';
    const result = await readStreamBytes({
      stream: this.environment.input,
      length: chunked ? undefined : parseContentLength(this.variables.CONTENT_LENGTH),
      maxBytes: this.config.maxBodyBytes
    });
    if (!result.ok) {
      if (result.error.code === 'body_too_large') {
        throw new RequestBodyError({code: 'body_too_large', message: result.error.message});
      }
      throw new RequestBodyError({code: 'body_read_failed', message: result.error.message});
    }

    return result.value;
  }

  private async postFields(): Promise<Record<string, RawFieldValue>> {
    const contentType = this.variables.CONTENT_TYPE ?? '';
    if (!contentType.toLowerCase().startsWith('multipart/')) {
      const body = await this.body();
      return parseUrlEncoded(body.toString('utf8'));
    }

    this.multipartFields ??= this.decodeMultipart(contentType);
    return this.multipartFields;
  }

  private async decodeMultipart(contentType: string): Promise<Record<string, RawFieldValue>> {
    const body = await this.body();
    const decoded = await decodeForm({
      method: this.method,
      contentType,
      contentLength: body.length,
      body: Readable.from([body]),
      strict: true,
      charset: this.config.defaultCharset,
      memoryThresholdBytes: this.config.multipartMemoryLimitBytes,
      tempDirectory: this.config.uploadTempDirectory
    });

    if (!decoded.ok) {
      this.logger.warn({
        event: 'form.decode_failed',
        component: 'webapi.context',
        reason_code: decoded.error.code,
        message: decoded.error.message
      });
      return {};
    }

    const uploads = Object.values(decoded.value.files).flatMap(value => (Array.isArray(value) ? value : [value]));
    if (this.closed) {
      // The request was torn down while the body was still being decoded.
      await releaseUploads(uploads);
      return {};
    }
    for (const upload of uploads) {
      this.uploads.add(upload);
    }

    return {...decoded.value.fields, ...decoded.value.files};
  }

  private lookupFields(
    mapping: Readonly<Record<string, RawFieldValue>>,
    {
      required,
      defaults,
      unicode
    }: {
      required: readonly string[];
      defaults: Readonly<Record<string, InputValue | null | undefined>>;
      unicode: UnicodeOption;
    }
  ): FieldLookupResult<FieldValues> {
    const convert = toUnicode(unicode);
    const normalize = (value: string | FileUpload) => (convert && !isUpload(value) ? convert(value) : value);
    const values = new Map<string, FieldValues[string]>();

    for (const field of [...required, ...Object.keys(mapping)]) {
      if (!Object.prototype.hasOwnProperty.call(mapping, field)) {
        return {
          ok: false,
          error: {code: 'missing_field', field, message: `Missing required field: ${field}`},
          outcome: badRequest(this)
        };
      }

      const raw = mapping[field];
      const wantsList = Array.isArray(defaults[field]);
      if (Array.isArray(raw)) {
        const items: Array<string | FileUpload> = [...raw];
        values.set(field, wantsList ? items.map(normalize) : normalize(items[items.length - 1]));
      } else {
        values.set(field, wantsList ? [normalize(raw)] : normalize(raw));
      }
    }

    for (const [field, fallback] of Object.entries(defaults)) {
      if (!values.has(field)) {
        values.set(field, fallback);
      }
    }

    return {ok: true, value: Object.fromEntries(values)};
  }
}

export const createRequestContext = (environment: GatewayEnvironment, options?: RequestContextOptions) =>
  new RequestContext(environment, options);
