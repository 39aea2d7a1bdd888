import {tmpdir} from 'node:os';
import type {Readable} from 'node:stream';

import {z} from 'zod';

import type {FileUpload} from './fileUpload';

export const WRITE_METHODS = ['POST', 'PUT', 'PATCH'] as const;

export const DEFAULT_MEMORY_THRESHOLD_BYTES = 256 * 1024;

export const FormDecodeOptionsSchema = z
  .object({
    strict: z.boolean().default(false),
    charset: z.string().min(1).default('utf-8'),
    memoryThresholdBytes: z.number().int().gte(0).default(DEFAULT_MEMORY_THRESHOLD_BYTES),
    tempDirectory: z
      .string()
      .min(1)
      .default(() => tmpdir()),
    maxBodyBytes: z.number().int().positive().optional()
  })
  .strict();

export type FormDecodeOptions = z.input<typeof FormDecodeOptionsSchema>;
export type ParsedFormDecodeOptions = z.output<typeof FormDecodeOptionsSchema>;

export type FormDecodeInput = FormDecodeOptions & {
  method: string;
  contentType: string | undefined;
  /** Declared body length; the urlencoded reader stops after this many bytes. */
  contentLength?: number;
  body: Readable;
};

export type FieldValue = string | string[];
export type FileValue = FileUpload | FileUpload[];

export type DecodedForm = {
  fields: Record<string, FieldValue>;
  files: Record<string, FileValue>;
};

export const emptyForm = (): DecodedForm => ({fields: {}, files: {}});
