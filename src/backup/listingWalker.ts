import { AuthError, ListingError, errorMessage } from '../errors.js';
import { describeDriveError } from '../storage/drive/driveErrors.js';
import { FOLDER_MIME_TYPE, resolveContentMode } from './exportFormats.js';
import type { FileIndexApi, FileRecord, RemoteFile } from './types.js';

export interface WalkOptions {
  pageSize?: number;
  onPage?: (info: { page: number; received: number; kept: number }) => void;
}

/**
 * Turn a raw index entry into a record, or null when there is nothing to
 * back up (folders, downloads disabled, native types with no export).
 */
export function toFileRecord(file: RemoteFile): FileRecord | null {
  if (file.mimeType === FOLDER_MIME_TYPE) return null;
  if (file.canDownload === false) return null;

  const mode = resolveContentMode(file.mimeType);
  switch (mode.kind) {
    case 'unavailable':
      return null;
    case 'export':
      return { id: file.id, name: file.name, mimeType: file.mimeType, exportMimeType: mode.target.mimeType };
    case 'download':
      return { id: file.id, name: file.name, mimeType: file.mimeType, size: file.size };
  }
}

/**
 * Page through the file index until the continuation token runs out,
 * yielding records in provider order. Pages are requested only as the
 * consumer pulls. A failed page is not retried.
 */
export async function* walkFiles(index: FileIndexApi, options: WalkOptions = {}): AsyncGenerator<FileRecord> {
  const pageSize = options.pageSize ?? 1000;
  let pageToken: string | undefined = undefined;
  let page = 0;

  do {
    page++;
    let files: RemoteFile[];
    let nextPageToken: string | undefined;

    try {
      ({ files, nextPageToken } = await index.list({ pageToken, pageSize }));
    } catch (error) {
      const reason = error instanceof AuthError || describeDriveError(error).isAuthFailure ? 'auth' : 'transport';
      throw new ListingError(`Failed to list files (page ${page}): ${errorMessage(error)}`, page, reason, {
        cause: error,
      });
    }

    const records: FileRecord[] = [];
    for (const file of files) {
      const record = toFileRecord(file);
      if (record) records.push(record);
    }
    options.onPage?.({ page, received: files.length, kept: records.length });

    yield* records;

    pageToken = nextPageToken || undefined;
  } while (pageToken);
}
