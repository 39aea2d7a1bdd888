import type {Readable} from 'node:stream';

import Busboy from '@fastify/busboy';

import {collapseValues, groupValues} from './collapse';
import type {DecodedForm} from './contracts';
import {describeError, err, ok, type FormDecoderErrorCode, type FormDecoderResult} from './errors';
import {releaseUploads, SpooledUpload, type FileUpload, type SpoolOptions} from './fileUpload';
import {toBuffer} from './stream';

export type MultipartDecodeInput = SpoolOptions & {
  body: Readable;
  contentType: string;
  charset: string;
};

const decodeText = (bytes: Buffer, charset: string) => {
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder('utf-8');
  }

  return decoder.decode(bytes);
};

const createParser = (contentType: string) =>
  new Busboy({
    headers: {'content-type': contentType},
    // Every part is read as bytes; fields and files are told apart afterwards.
    isPartAFile: () => true
  });

const spoolPart = async (upload: SpooledUpload, stream: Readable) => {
  try {
    for await (const chunk of stream) {
      await upload.append(toBuffer(chunk));
    }
  } finally {
    await upload.finish();
  }
};

/**
 * Streams every part into a SpooledUpload, in submission order. Resolves
 * only after every part has been fully read or, on failure, after every
 * part reader has stopped.
 */
const collectParts = ({
  body,
  contentType,
  memoryThresholdBytes,
  tempDirectory,
  uploads
}: MultipartDecodeInput & {uploads: SpooledUpload[]}): Promise<FormDecoderResult<SpooledUpload[]>> =>
  new Promise(resolve => {
    const partStreams: Readable[] = [];
    const spools: Promise<void>[] = [];
    let settled = false;

    let parser: ReturnType<typeof createParser>;
    try {
      parser = createParser(contentType);
    } catch (error) {
      resolve(err('multipart_malformed', describeError(error)));
      return;
    }

    const fail = (code: FormDecoderErrorCode, error: unknown) => {
      if (settled) {
        return;
      }
      settled = true;
      body.unpipe(parser);
      body.resume();
      for (const stream of partStreams) {
        stream.destroy();
      }

      void Promise.allSettled(spools).then(() => resolve(err(code, describeError(error))));
    };

    const onPart = (
      fieldName: string,
      stream: Readable,
      filename: string | undefined,
      _transferEncoding: string,
      mimeType: string
    ) => {
      const upload = new SpooledUpload(fieldName, filename || undefined, mimeType, {
        memoryThresholdBytes,
        tempDirectory
      });
      uploads.push(upload);
      partStreams.push(stream);

      const spool = spoolPart(upload, stream);
      void spool.catch((error: unknown) => fail('body_read_failed', error));
      spools.push(spool);
    };

    parser.on('file', onPart);

    parser.on('error', (error: unknown) => fail('multipart_malformed', error));
    body.on('error', (error: unknown) => fail('body_read_failed', error));

    parser.on('finish', () => {
      void Promise.all(spools).then(
        () => {
          if (!settled) {
            settled = true;
            resolve(ok(uploads));
          }
        },
        (error: unknown) => fail('body_read_failed', error)
      );
    });

    body.pipe(parser);
  });

export const decodeMultipart = async (input: MultipartDecodeInput): Promise<FormDecoderResult<DecodedForm>> => {
  const uploads: SpooledUpload[] = [];
  const collected = await collectParts({...input, uploads});
  if (!collected.ok) {
    await releaseUploads(uploads);
    return collected;
  }

  const fieldEntries: Array<[string, string]> = [];
  const fileEntries: Array<[string, FileUpload]> = [];

  try {
    for (const upload of collected.value) {
      if (upload.filename !== undefined || !upload.isBuffered) {
        fileEntries.push([upload.fieldName, upload]);
        continue;
      }

      fieldEntries.push([upload.fieldName, decodeText(await upload.bytes(), input.charset)]);
      await upload.release();
    }
  } catch (error) {
    await releaseUploads(uploads);
    return err('body_read_failed', describeError(error));
  }

  return ok({
    fields: collapseValues(groupValues(fieldEntries)),
    files: collapseValues(groupValues(fileEntries))
  });
};
