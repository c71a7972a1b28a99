/**
 * Test helpers: in-memory stand-ins for the Drive APIs and archive readers.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import crypto from 'crypto';
import { Readable } from 'stream';
import JSZip from 'jszip';
import type {
  AuthProvider,
  ContentApi,
  Credential,
  FileIndexApi,
  FileListPage,
  RemoteFile,
} from '../src/backup/types.js';

export const DOC_MIME = 'application/vnd.google-apps.document';
export const SHEET_MIME = 'application/vnd.google-apps.spreadsheet';
export const FOLDER_MIME = 'application/vnd.google-apps.folder';

export async function makeTempDir(prefix = 'drive-backup-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Deterministic content so archive entries can be compared byte for byte.
 */
export function contentFor(id: string, size: number): Buffer {
  const buffer = Buffer.alloc(size);
  const seed = crypto.createHash('sha256').update(id).digest();
  for (let i = 0; i < size; i++) {
    buffer[i] = seed[i % seed.length] ?? 0;
  }
  return buffer;
}

export function chunkedStream(data: Buffer, chunkSize = 256): Readable {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += chunkSize) {
    chunks.push(data.subarray(offset, offset + chunkSize));
  }
  return Readable.from(chunks);
}

/**
 * A stream that delivers `bytesBeforeFailure` bytes and then errors.
 */
export function failingStream(bytesBeforeFailure: number): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(Buffer.alloc(bytesBeforeFailure, 7));
      } else {
        this.destroy(new Error('connection reset'));
      }
    },
  });
}

/**
 * Error shaped like the ones gaxios throws for HTTP failures.
 */
export function httpError(status: number, data: unknown = '', message = `Request failed with status code ${status}`): Error {
  return Object.assign(new Error(message), { response: { status, data } });
}

export function remoteFile(id: string, overrides: Partial<RemoteFile> = {}): RemoteFile {
  return { id, name: `${id}.bin`, mimeType: 'application/octet-stream', size: 100, ...overrides };
}

/**
 * File index serving fixed pages. `failOnPage` (1-based) makes that page throw.
 */
export class FakeFileIndex implements FileIndexApi {
  readonly requests: Array<{ pageToken?: string; pageSize: number }> = [];

  constructor(
    private readonly pages: RemoteFile[][],
    private readonly failure?: { page: number; error: Error }
  ) {}

  static paged(files: RemoteFile[], perPage: number): FakeFileIndex {
    const pages: RemoteFile[][] = [];
    for (let i = 0; i < files.length; i += perPage) {
      pages.push(files.slice(i, i + perPage));
    }
    return new FakeFileIndex(pages);
  }

  async list(request: { pageToken?: string; pageSize: number }): Promise<FileListPage> {
    this.requests.push(request);
    const pageIndex = request.pageToken ? Number(request.pageToken.replace('page-', '')) : 0;

    if (this.failure && this.failure.page === pageIndex + 1) {
      throw this.failure.error;
    }

    const files = this.pages[pageIndex] ?? [];
    const nextPageToken = pageIndex + 1 < this.pages.length ? `page-${pageIndex + 1}` : undefined;
    return { files, nextPageToken };
  }
}

type ContentSource = Buffer | Error | (() => Readable);

/**
 * Content API backed by a map of file id -> bytes, error or stream factory.
 */
export class FakeContent implements ContentApi {
  readonly downloads: string[] = [];
  readonly exports: Array<{ fileId: string; mimeType: string }> = [];

  constructor(private readonly sources: Map<string, ContentSource>) {}

  async download(fileId: string): Promise<Readable> {
    this.downloads.push(fileId);
    return this.open(fileId);
  }

  async export(fileId: string, mimeType: string): Promise<Readable> {
    this.exports.push({ fileId, mimeType });
    return this.open(fileId);
  }

  private open(fileId: string): Readable {
    const source = this.sources.get(fileId);
    if (source === undefined) throw httpError(404, { error: { message: 'File not found' } });
    if (source instanceof Error) throw source;
    if (Buffer.isBuffer(source)) return chunkedStream(source);
    return source();
  }
}

/**
 * OAuth provider that hands out placeholder tokens.
 */
export class FakeAuthProvider implements AuthProvider {
  readonly exchanged: string[] = [];
  readonly refreshed: Credential[] = [];
  failExchange = false;

  constructor(private readonly now: () => number = Date.now) {}

  authorizationUrl(state: string): string {
    return `https://accounts.example.test/o/oauth2/auth?state=${encodeURIComponent(state)}`;
  }

  async exchangeCode(code: string): Promise<Credential> {
    this.exchanged.push(code);
    if (this.failExchange) throw new Error('invalid_grant');
    return { accessToken: 'test-access', refreshToken: 'test-refresh', expiryDate: this.now() + 3600_000 };
  }

  async refresh(credential: Credential): Promise<Credential> {
    this.refreshed.push(credential);
    return { accessToken: 'test-access-refreshed', expiryDate: this.now() + 3600_000 };
  }
}

export interface ZipEntry {
  name: string;
  data: Buffer;
}

export async function readZip(filePath: string): Promise<ZipEntry[]> {
  return readZipBuffer(await fs.readFile(filePath));
}

export async function readZipBuffer(data: Buffer): Promise<ZipEntry[]> {
  const zip = await JSZip.loadAsync(data);
  const entries: ZipEntry[] = [];
  for (const file of Object.values(zip.files)) {
    if (file.dir) continue;
    entries.push({ name: file.name, data: await file.async('nodebuffer') });
  }
  return entries;
}

export async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}
