import {randomUUID} from 'node:crypto';
import {open, readFile, rm, type FileHandle} from 'node:fs/promises';
import path from 'node:path';

/**
 * An uploaded multipart part. Its content is only ever exposed as raw
 * bytes; no charset is applied, whatever the part declares.
 */
export interface FileUpload {
  readonly fieldName: string;
  readonly filename: string | undefined;
  readonly contentType: string;
  readonly size: number;
  /** False once the part outgrew the memory threshold and moved to a temporary file. */
  readonly isBuffered: boolean;
  bytes(): Promise<Buffer>;
  release(): Promise<void>;
}

export type SpoolOptions = {
  memoryThresholdBytes: number;
  tempDirectory: string;
};

export class SpooledUpload implements FileUpload {
  public size = 0;

  private chunks: Buffer[] = [];
  private spillPath: string | undefined;
  private handle: FileHandle | undefined;
  private released = false;

  public constructor(
    public readonly fieldName: string,
    public readonly filename: string | undefined,
    public readonly contentType: string,
    private readonly options: SpoolOptions
  ) {}

  public get isBuffered(): boolean {
    return this.spillPath === undefined;
  }

  public async append(chunk: Buffer): Promise<void> {
    if (this.released) {
      throw new Error(`Upload "${this.fieldName}" was released while it was being read`);
    }

    this.size += chunk.length;
    if (this.handle) {
      await this.handle.write(chunk);
      return;
    }

    this.chunks.push(chunk);
    if (this.size > this.options.memoryThresholdBytes) {
      await this.spill();
    }
  }

  public async finish(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }

  public async bytes(): Promise<Buffer> {
    if (this.released) {
      throw new Error(`Upload "${this.fieldName}" has been released`);
    }

    if (this.spillPath !== undefined) {
      return readFile(this.spillPath);
    }

    return Buffer.concat(this.chunks);
  }

  public async release(): Promise<void> {
    if (this.released) {
      return;
    }

    this.released = true;
    this.chunks = [];
    await this.finish();
    if (this.spillPath !== undefined) {
      await rm(this.spillPath, {force: true});
    }
  }

  private async spill(): Promise<void> {
    const spillPath = path.join(this.options.tempDirectory, `gatewire-upload-${randomUUID()}`);
    this.spillPath = spillPath;
    this.handle = await open(spillPath, 'wx', 0o600);
    await this.handle.write(Buffer.concat(this.chunks));
    this.chunks = [];
  }
}

export const releaseUploads = async (uploads: Iterable<FileUpload>): Promise<void> => {
  const results = await Promise.allSettled([...uploads].map(upload => upload.release()));
  const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }
};
