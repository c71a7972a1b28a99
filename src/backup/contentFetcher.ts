import { Transform, type Readable, type TransformCallback } from 'stream';
import { AuthError, FetchError, errorMessage, type FetchFailureReason } from '../errors.js';
import { describeDriveError } from '../storage/drive/driveErrors.js';
import type { ContentApi, FileRecord } from './types.js';

export interface FetchedContent {
  stream: Readable;
  mode: 'download' | 'export';
  /** Bytes that have passed through `stream` so far. */
  bytesRead(): number;
}

function classify(error: unknown, record: FileRecord): FetchError | AuthError {
  if (error instanceof AuthError) return error;

  const info = describeDriveError(error);
  if (info.isAuthFailure) {
    return new AuthError(`Credential rejected while fetching "${record.name}"`, { cause: error });
  }

  let reason: FetchFailureReason = 'unavailable';
  if (info.isExportTooLarge) reason = 'export_too_large';
  else if (info.status === 403) reason = 'forbidden';
  else if (info.status === 404) reason = 'not_found';

  return new FetchError(`Could not retrieve "${record.name}": ${errorMessage(error)}`, record.id, reason, {
    cause: error,
  });
}

/**
 * Opens the content stream for one record: a plain download, or an export
 * to the record's interchange format for native documents.
 */
export class ContentFetcher {
  constructor(private readonly content: ContentApi) {}

  async fetch(record: FileRecord): Promise<FetchedContent> {
    const mode = record.exportMimeType ? 'export' : 'download';

    let source: Readable;
    try {
      source = record.exportMimeType
        ? await this.content.export(record.id, record.exportMimeType)
        : await this.content.download(record.id);
    } catch (error) {
      throw classify(error, record);
    }

    let bytes = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
        bytes += chunk.length;
        callback(null, chunk);
      },
    });
    // A failure after the first byte is still a per-file failure
    source.on('error', (error: Error) => counter.destroy(classify(error, record)));
    source.pipe(counter);

    return { stream: counter, mode, bytesRead: () => bytes };
  }
}
