import { Readable } from 'stream';

/**
 * `TOO_LARGE`: content above the configured max size, not kept.
 * `WRITE_FAILED`: the content buffer could not be allocated. Not reached for
 * files within the configured upload limits, which sit far below the buffer
 * size cap.
 */
export type UploadErrorCode = 'OK' | 'TOO_LARGE' | 'WRITE_FAILED';

/**
 * A file received in a multipart body. Owned by the parse result and handed
 * unchanged to the customer integration.
 */
export class UploadedFile {
  constructor(
    /** Multipart field name as sent, e.g. `organization[photo_proof_address]` */
    public readonly fieldPath: string,
    public readonly clientFilename: string,
    public readonly clientMediaType: string,
    /** Size of the submitted content in bytes, also when it was rejected */
    public readonly size: number,
    public readonly error: UploadErrorCode,
    private readonly content: Buffer
  ) {}

  /**
   * Content of the file. Empty unless `error` is `OK`.
   */
  getBuffer(): Buffer {
    return this.content;
  }

  getStream(): Readable {
    return Readable.from(this.content.length > 0 ? [this.content] : []);
  }
}
