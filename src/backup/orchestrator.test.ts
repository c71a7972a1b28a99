import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { BackupJob, type BackupJobOptions } from './orchestrator.js';
import { AuthError } from '../errors.js';
import type { BackupProgress, RemoteFile } from './types.js';
import {
  DOC_MIME,
  FakeContent,
  FakeFileIndex,
  contentFor,
  failingStream,
  httpError,
  listDir,
  makeTempDir,
  readZip,
  remoteFile,
  removeDir,
} from '../../tests/helpers.js';

interface Fixture {
  files: RemoteFile[];
  content: Map<string, Buffer | Error | (() => Readable)>;
}

function fixture(count: number, size: number): Fixture {
  const files: RemoteFile[] = [];
  const content = new Map<string, Buffer | Error | (() => Readable)>();
  for (let i = 1; i <= count; i++) {
    const id = `file-${i}`;
    files.push(remoteFile(id, { size }));
    content.set(id, contentFor(id, size));
  }
  return { files, content };
}

describe('BackupJob', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function job(index: FakeFileIndex, content: FakeContent, overrides: Partial<BackupJobOptions> = {}): BackupJob {
    return new BackupJob({
      connect: async () => ({ index, content }),
      directory: dir,
      budgetBytes: 10_000,
      ...overrides,
    });
  }

  it('backs up every file across a multi-page listing', async () => {
    const { files, content } = fixture(10, 100);
    const index = FakeFileIndex.paged(files, 2);

    const result = await job(index, new FakeContent(content), { pageSize: 2 }).start().done;

    expect(index.requests).toHaveLength(5);
    expect(result.state).toBe('completed');
    expect(result.discoveredFiles).toBe(10);
    expect(result.processedFiles).toBe(10);
    expect(result.succeededFiles).toBe(10);
    expect(result.failedFiles).toBe(0);
    expect(result.archives).toEqual(['backup_001.zip']);
    expect(result.currentFile).toBe('');
    expect(result.finishedAt).toBeTypeOf('number');

    const entries = await readZip(path.join(dir, 'backup_001.zip'));
    expect(entries.map((e) => e.name)).toEqual(files.map((f) => f.name));
    expect(entries[9]?.data.equals(contentFor('file-10', 100))).toBe(true);
  });

  it('records a per-file fetch failure and keeps going', async () => {
    const { files, content } = fixture(10, 100);
    content.set('file-3', httpError(403, { error: { message: 'The user does not have access' } }));

    const result = await job(new FakeFileIndex([files]), new FakeContent(content)).start().done;

    expect(result.state).toBe('completed');
    expect(result.processedFiles).toBe(10);
    expect(result.succeededFiles).toBe(9);
    expect(result.failedFiles).toBe(1);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({ fileId: 'file-3', name: 'file-3.bin', reason: 'forbidden' });

    const names = (await readZip(path.join(dir, 'backup_001.zip'))).map((e) => e.name);
    expect(names).toHaveLength(9);
    expect(names).not.toContain('file-3.bin');
  });

  it('skips a file whose download breaks mid-stream and keeps the earlier entries', async () => {
    const { files, content } = fixture(5, 100);
    content.set('file-3', () => failingStream(10));

    const result = await job(new FakeFileIndex([files]), new FakeContent(content)).start().done;

    expect(result.state).toBe('completed');
    expect(result.processedFiles).toBe(5);
    expect(result.succeededFiles).toBe(4);
    expect(result.failedFiles).toBe(1);
    expect(result.failures[0]).toMatchObject({ fileId: 'file-3', name: 'file-3.bin', reason: 'unavailable' });
    expect(result.bytesFetched).toBe(400);
    expect(result.bytesWritten).toBe(400);
    expect(result.archives).toEqual(['backup_001.zip']);
    expect(await listDir(dir)).toEqual(['backup_001.zip']);

    const entries = await readZip(path.join(dir, 'backup_001.zip'));
    expect(entries.map((e) => e.name)).toEqual(['file-1.bin', 'file-2.bin', 'file-4.bin', 'file-5.bin']);
    expect(entries[2]?.data.equals(contentFor('file-4', 100))).toBe(true);
  });

  it('fails the job when the archive directory cannot be written', async () => {
    const { files, content } = fixture(3, 100);
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    const result = await job(new FakeFileIndex([files]), new FakeContent(content), {
      directory: path.join(blocker, 'out'),
    }).start().done;

    expect(result.state).toBe('failed');
    expect(result.errorKind).toBe('archive_io');
    expect(result.succeededFiles).toBe(0);
    expect(result.failures).toEqual([]);
    expect(result.archives).toEqual([]);
  });

  it('splits output into contiguous archives that each stay within the budget', async () => {
    const { files, content } = fixture(8, 300);

    const result = await job(new FakeFileIndex([files]), new FakeContent(content), { budgetBytes: 1000 }).start()
      .done;

    expect(result.state).toBe('completed');
    expect(result.archives).toEqual(['backup_001.zip', 'backup_002.zip', 'backup_003.zip']);
    expect(result.archiveIndex).toBe(3);
    expect(await listDir(dir)).toEqual(result.archives);

    let total = 0;
    for (const name of result.archives) {
      const entries = await readZip(path.join(dir, name));
      const bytes = entries.reduce((sum, entry) => sum + entry.data.length, 0);
      expect(bytes).toBeLessThanOrEqual(1000);
      total += entries.length;
    }
    expect(total).toBe(8);
  });

  it('counts the same bytes fetched and written', async () => {
    const { files, content } = fixture(4, 250);
    content.set('file-2', httpError(404));

    const result = await job(new FakeFileIndex([files]), new FakeContent(content)).start().done;

    expect(result.succeededFiles).toBe(3);
    expect(result.bytesFetched).toBe(750);
    expect(result.bytesWritten).toBe(750);
    expect(result.failures[0]?.reason).toBe('not_found');
  });

  it('fails on a listing error but keeps the archive of earlier pages', async () => {
    const { files, content } = fixture(6, 100);
    const index = new FakeFileIndex([files.slice(0, 2), files.slice(2, 4), files.slice(4)], {
      page: 2,
      error: new Error('socket hang up'),
    });

    const result = await job(index, new FakeContent(content)).start().done;

    expect(result.state).toBe('failed');
    expect(result.errorKind).toBe('listing');
    expect(result.error).toContain('page 2');
    expect(result.processedFiles).toBe(2);
    expect(result.archives).toEqual(['backup_001.zip']);

    const entries = await readZip(path.join(dir, 'backup_001.zip'));
    expect(entries.map((e) => e.name)).toEqual(['file-1.bin', 'file-2.bin']);
  });

  it('stops between files when cancelled and finalizes what it has', async () => {
    const { files, content } = fixture(10, 100);
    let backup: BackupJob | null = null;
    backup = job(new FakeFileIndex([files]), new FakeContent(content), {
      onProgress: (progress) => {
        if (progress.processedFiles === 4) backup?.cancel();
      },
    });

    const task = backup.start();
    const result = await task.done;

    expect(task.signal.aborted).toBe(true);
    expect(result.state).toBe('cancelled');
    expect(result.processedFiles).toBe(4);
    expect(result.archives).toEqual(['backup_001.zip']);
    expect(await readZip(path.join(dir, 'backup_001.zip'))).toHaveLength(4);
  });

  it('fails with an auth error when the credential is rejected mid-run', async () => {
    const { files, content } = fixture(3, 100);
    content.set('file-2', httpError(401, 'Invalid Credentials'));

    const result = await job(new FakeFileIndex([files]), new FakeContent(content)).start().done;

    expect(result.state).toBe('failed');
    expect(result.errorKind).toBe('auth');
    expect(result.succeededFiles).toBe(1);
    expect(result.archives).toEqual(['backup_001.zip']);
  });

  it('fails before listing when connecting is refused', async () => {
    const index = new FakeFileIndex([[remoteFile('a')]]);
    const backup = new BackupJob({
      connect: async () => {
        throw new AuthError('Refresh token revoked');
      },
      directory: dir,
      budgetBytes: 1000,
    });

    const result = await backup.start().done;

    expect(result).toMatchObject({ state: 'failed', errorKind: 'auth', error: 'Refresh token revoked' });
    expect(index.requests).toEqual([]);
    expect(await listDir(dir)).toEqual([]);
  });

  it('exports native documents under their interchange extension', async () => {
    const doc = remoteFile('doc-1', { name: 'Plan', mimeType: DOC_MIME, size: undefined });
    const content = new FakeContent(new Map([['doc-1', Buffer.from('exported bytes')]]));

    const result = await job(new FakeFileIndex([[doc]]), content).start().done;

    expect(result.state).toBe('completed');
    expect(content.exports).toEqual([
      { fileId: 'doc-1', mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document' },
    ]);
    expect(content.downloads).toEqual([]);
    const [entry] = await readZip(path.join(dir, 'backup_001.zip'));
    expect(entry?.name).toBe('Plan.docx');
    expect(entry?.data.toString()).toBe('exported bytes');
  });

  it('gives duplicate names distinct entries', async () => {
    const files = [remoteFile('a', { name: 'report.pdf', size: 3 }), remoteFile('b', { name: 'report.pdf', size: 3 })];
    const content = new FakeContent(
      new Map([
        ['a', Buffer.from('one')],
        ['b', Buffer.from('two')],
      ])
    );

    await job(new FakeFileIndex([files]), content).start().done;

    const entries = await readZip(path.join(dir, 'backup_001.zip'));
    expect(entries.map((e) => e.name)).toEqual(['report.pdf', 'report (2).pdf']);
  });

  it('completes with no archives for an empty account', async () => {
    const result = await job(new FakeFileIndex([[]]), new FakeContent(new Map())).start().done;

    expect(result.state).toBe('completed');
    expect(result.archives).toEqual([]);
    expect(await listDir(dir)).toEqual([]);
  });

  it('publishes state transitions in order and starts only once', async () => {
    const { files, content } = fixture(2, 10);
    const states: string[] = [];
    const backup = job(new FakeFileIndex([files]), new FakeContent(content), {
      onProgress: (progress: BackupProgress) => {
        if (states[states.length - 1] !== progress.state) states.push(progress.state);
      },
    });

    const task = backup.start();
    expect(backup.start()).toBe(task);
    await task.done;

    expect(states).toEqual(['created', 'listing', 'transferring', 'completed']);
    expect(backup.isRunning).toBe(false);
  });
});
