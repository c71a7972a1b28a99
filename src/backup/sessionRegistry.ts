import fsp from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { CredentialStore } from '../auth/credentialStore.js';
import { AuthError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { BackupJob, type BackupJobOptions, type BackupTask } from './orchestrator.js';
import type { AuthProvider, BackupProgress, Credential, DriveApiFactory } from './types.js';

const log = createLogger('sessions');

export interface Session {
  readonly id: string;
  /** OAuth `state` nonce bound to this session. */
  readonly oauthState: string;
  readonly createdAt: number;
  lastSeenAt: number;
  credential: CredentialStore | null;
  job: BackupJob | null;
  task: BackupTask | null;
  /** Every job this session has started, oldest first. */
  readonly jobIds: string[];
}

export interface SessionRegistryOptions {
  backupRoot: string;
  /** Idle time after which a session and its files are removed. */
  sessionTtlMs: number;
  archiveBudgetBytes: number;
  compressionLevel: number;
  listPageSize: number;
  apiFactory: DriveApiFactory;
  authProvider: AuthProvider | null;
  now?: () => number;
}

export type StartResult =
  | { ok: true; jobId: string; task: BackupTask }
  | { ok: false; reason: 'not_found' | 'not_authenticated' | 'already_running' };

/**
 * Sessions and their backup jobs, shared by the web layer (reads) and the
 * background jobs (which only write to their own progress).
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly options: SessionRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): Session {
    const timestamp = this.now();
    const session: Session = {
      id: uuidv4(),
      oauthState: crypto.randomBytes(32).toString('base64url'),
      createdAt: timestamp,
      lastSeenAt: timestamp,
      credential: null,
      job: null,
      task: null,
      jobIds: [],
    };
    this.sessions.set(session.id, session);
    return session;
  }

  /**
   * Look a session up and mark it as seen.
   */
  get(id: string | undefined): Session | undefined {
    if (!id) return undefined;
    const session = this.sessions.get(id);
    if (session) session.lastSeenAt = this.now();
    return session;
  }

  attachCredential(id: string, credential: Credential): boolean {
    const session = this.get(id);
    if (!session) return false;
    session.credential = new CredentialStore(credential);
    return true;
  }

  jobDirectory(jobId: string): string {
    return path.join(this.options.backupRoot, jobId);
  }

  startBackup(id: string): StartResult {
    const session = this.get(id);
    if (!session) return { ok: false, reason: 'not_found' };
    const store = session.credential;
    if (!store) return { ok: false, reason: 'not_authenticated' };
    if (session.job?.isRunning) return { ok: false, reason: 'already_running' };

    const jobId = uuidv4();
    const { apiFactory, authProvider } = this.options;

    const jobOptions: BackupJobOptions = {
      jobId,
      directory: this.jobDirectory(jobId),
      budgetBytes: this.options.archiveBudgetBytes,
      compressionLevel: this.options.compressionLevel,
      pageSize: this.options.listPageSize,
      connect: async () => {
        if (store.isExpired(this.now())) {
          if (!authProvider || !store.canRefresh()) {
            throw new AuthError('Credential expired and cannot be refreshed; sign in again');
          }
          log.info('Refreshing expired credential');
          store.update(await authProvider.refresh(store.get()));
        }
        return apiFactory(store.get(), (update) => store.update(update));
      },
    };

    const job = new BackupJob(jobOptions);
    session.job = job;
    session.jobIds.push(jobId);
    session.task = job.start();
    log.info(`Started job ${jobId}`);
    return { ok: true, jobId, task: session.task };
  }

  progress(id: string): BackupProgress | null {
    return this.get(id)?.job?.snapshot() ?? null;
  }

  cancel(id: string): boolean {
    const session = this.get(id);
    if (!session?.job?.isRunning || !session.task) return false;
    session.task.cancel();
    return true;
  }

  /**
   * Remove sessions idle for longer than the TTL. Running jobs are cancelled
   * and joined before their directories are deleted.
   */
  async expireIdle(): Promise<string[]> {
    const cutoff = this.now() - this.options.sessionTtlMs;
    const expired = [...this.sessions.values()].filter((session) => session.lastSeenAt < cutoff);

    for (const session of expired) {
      this.sessions.delete(session.id);
    }
    await Promise.all(expired.map((session) => this.dispose(session)));

    if (expired.length > 0) {
      log.info(`Expired ${expired.length} idle session(s)`);
    }
    return expired.map((session) => session.id);
  }

  startCleanup(intervalMs: number): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.expireIdle().catch((error: unknown) => {
        log.error(`Session cleanup failed: ${errorMessage(error)}`);
      });
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  /**
   * Stop the cleanup timer, cancel every running job and wait for all of
   * them. Archives stay on disk.
   */
  async shutdown(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    const tasks = [...this.sessions.values()].flatMap((session) => (session.task ? [session.task] : []));
    for (const task of tasks) task.cancel();
    await Promise.all(tasks.map((task) => task.done));
  }

  private async dispose(session: Session): Promise<void> {
    if (session.task) {
      session.task.cancel();
      await session.task.done;
    }
    for (const jobId of session.jobIds) {
      await fsp.rm(this.jobDirectory(jobId), { recursive: true, force: true });
    }
  }
}
