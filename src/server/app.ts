import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import path from 'path';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Session, SessionRegistry } from '../backup/sessionRegistry.js';
import type { AuthProvider } from '../backup/types.js';
import { dashboardPage, errorPage, homePage } from './html.js';

const log = createLogger('http');

export const SESSION_COOKIE = 'session_id';

export interface AppDependencies {
  config: Pick<AppConfig, 'cookieMaxAgeMs' | 'allowedOrigins'>;
  registry: SessionRegistry;
  /** Null when the OAuth client is not configured. */
  authProvider: AuthProvider | null;
}

function sessionFrom(registry: SessionRegistry, req: Request): Session | undefined {
  const id: unknown = req.cookies?.[SESSION_COOKIE];
  return typeof id === 'string' ? registry.get(id) : undefined;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function idleProgress() {
  return {
    jobId: null,
    state: 'idle' as const,
    discoveredFiles: 0,
    processedFiles: 0,
    succeededFiles: 0,
    failedFiles: 0,
    bytesFetched: 0,
    bytesWritten: 0,
    currentFile: '',
    archiveIndex: 0,
    archives: [],
    failures: [],
  };
}

export function createApp({ config, registry, authProvider }: AppDependencies): express.Express {
  const app = express();

  if (config.allowedOrigins) {
    app.use(cors({
      origin: config.allowedOrigins === '*' ? '*' : config.allowedOrigins,
      credentials: config.allowedOrigins !== '*',
    }));
  }
  app.use(express.json());
  app.use(cookieParser());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/', (req, res) => {
    res.send(homePage(queryString(req.query.error)));
  });

  // Start OAuth flow - creates the session and returns the consent URL
  app.post('/auth/login', (_req, res) => {
    if (!authProvider) {
      res.status(500).json({
        error: 'OAuth credentials not configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET in .env',
      });
      return;
    }

    const session = registry.create();
    const authUrl = authProvider.authorizationUrl(session.oauthState);

    res.cookie(SESSION_COOKIE, session.id, {
      maxAge: config.cookieMaxAgeMs,
      httpOnly: true,
      sameSite: 'lax',
    });
    res.json({ authUrl });
  });

  // OAuth callback - handles Google's redirect
  app.get('/auth/callback', async (req, res) => {
    const error = queryString(req.query.error);
    const code = queryString(req.query.code);
    const state = queryString(req.query.state);

    if (error) {
      log.warn(`OAuth error: ${error} - ${queryString(req.query.error_description) ?? 'Unknown error'}`);
      res.redirect(`/?error=${encodeURIComponent(error)}`);
      return;
    }

    if (!code || !state) {
      res.redirect('/?error=missing_parameters');
      return;
    }

    const session = sessionFrom(registry, req);
    if (!session) {
      res.redirect('/?error=invalid_session');
      return;
    }

    if (state !== session.oauthState) {
      log.warn('OAuth state mismatch');
      res.redirect('/?error=state_mismatch');
      return;
    }

    if (!authProvider) {
      res.status(500).send(errorPage('OAuth credentials not configured'));
      return;
    }

    try {
      const credential = await authProvider.exchangeCode(code);
      registry.attachCredential(session.id, credential);
      log.info('OAuth authentication successful');
      res.redirect(302, '/dashboard');
    } catch (err) {
      log.error(`Token exchange failed: ${errorMessage(err)}`);
      res.redirect('/?error=token_exchange_failed');
    }
  });

  app.get('/dashboard', (req, res) => {
    const session = sessionFrom(registry, req);
    if (!session?.credential) {
      res.redirect('/');
      return;
    }
    res.send(dashboardPage());
  });

  app.post('/download/start', (req, res) => {
    const session = sessionFrom(registry, req);
    if (!session?.credential) {
      res.status(401).json({ error: 'Not authenticated' });
      return;
    }

    const result = registry.startBackup(session.id);
    if (result.ok) {
      res.json({ jobId: result.jobId });
    } else if (result.reason === 'already_running') {
      res.status(409).json({ error: 'A backup is already running' });
    } else {
      res.status(401).json({ error: 'Not authenticated' });
    }
  });

  app.get('/download/progress', (req, res) => {
    const session = sessionFrom(registry, req);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(session.job?.snapshot() ?? idleProgress());
  });

  app.post('/download/cancel', (req, res) => {
    const session = sessionFrom(registry, req);
    if (!session || !registry.cancel(session.id)) {
      res.status(404).json({ error: 'No running backup' });
      return;
    }
    res.status(202).json({ state: session.job?.state });
  });

  app.get('/download/files', (req, res) => {
    const session = sessionFrom(registry, req);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    const progress = session.job?.snapshot();
    res.json({
      jobId: progress?.jobId ?? null,
      state: progress?.state ?? 'idle',
      archives: (progress?.archives ?? []).map((fileName) => ({
        fileName,
        url: `/download/${encodeURIComponent(fileName)}`,
      })),
    });
  });

  app.get('/download/:filename', (req, res, next) => {
    const session = sessionFrom(registry, req);
    if (!session) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    const job = session.job;
    const { filename } = req.params;
    // Only finalized archives of this session's job are served
    if (!job || !job.snapshot().archives.includes(filename)) {
      res.status(404).json({ error: 'File not found' });
      return;
    }

    const filePath = path.resolve(registry.jobDirectory(job.jobId), filename);
    res.download(filePath, filename, (err) => {
      if (err && !res.headersSent) next(err);
    });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    log.error(`Request failed: ${errorMessage(err)}`);
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
