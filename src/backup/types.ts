import type { Readable } from 'stream';
import type { FetchFailureReason, BackupErrorKind } from '../errors.js';

/**
 * OAuth token pair for one user. Field names follow our own conventions;
 * provider adapters translate to and from their token shapes.
 */
export interface Credential {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds */
  expiryDate?: number;
  scope?: string;
  tokenType?: string;
}

export interface AuthProvider {
  authorizationUrl(state: string): string;
  exchangeCode(code: string): Promise<Credential>;
  /** Throws AuthError on `invalid_grant`. */
  refresh(credential: Credential): Promise<Credential>;
}

/**
 * Raw entry as the file index returns it, before filtering.
 */
export interface RemoteFile {
  id: string;
  name: string;
  mimeType: string;
  size?: number;
  canDownload?: boolean;
}

export interface FileListPage {
  files: RemoteFile[];
  nextPageToken?: string;
}

export interface FileIndexApi {
  list(request: { pageToken?: string; pageSize: number }): Promise<FileListPage>;
}

export interface ContentApi {
  download(fileId: string): Promise<Readable>;
  export(fileId: string, mimeType: string): Promise<Readable>;
}

/**
 * Bundle of provider APIs bound to one credential.
 */
export interface DriveApis {
  index: FileIndexApi;
  content: ContentApi;
}

export type DriveApiFactory = (credential: Credential, onTokens: (update: Partial<Credential>) => void) => DriveApis;

export type FileRecord = Readonly<{
  id: string;
  name: string;
  mimeType: string;
  /** Absent for native documents, whose size is only known after export. */
  size?: number;
  /** Set when the file must be exported instead of downloaded. */
  exportMimeType?: string;
}>;

export type BackupState = 'created' | 'listing' | 'transferring' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATES: ReadonlySet<BackupState> = new Set(['completed', 'failed', 'cancelled']);

export interface FileFailure {
  fileId: string;
  name: string;
  reason: FetchFailureReason;
  message: string;
}

export interface BackupProgress {
  jobId: string;
  state: BackupState;
  discoveredFiles: number;
  processedFiles: number;
  succeededFiles: number;
  failedFiles: number;
  bytesFetched: number;
  bytesWritten: number;
  currentFile: string;
  /** Sequence number of the open (or last) archive; 0 before the first. */
  archiveIndex: number;
  /** Finalized archive file names, in sequence order. */
  archives: string[];
  failures: FileFailure[];
  error?: string;
  errorKind?: BackupErrorKind | 'unexpected';
  startedAt: number;
  finishedAt?: number;
}

export interface FinalizedArchive {
  index: number;
  fileName: string;
  path: string;
  entries: number;
  contentBytes: number;
}
