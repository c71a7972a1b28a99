import { google, type drive_v3 } from 'googleapis';
import type { Credentials, OAuth2Client } from 'google-auth-library';
import type { Readable } from 'stream';
import type { OAuthConfig } from '../../config.js';
import { AuthError, errorMessage } from '../../errors.js';
import type {
  AuthProvider,
  ContentApi,
  Credential,
  DriveApiFactory,
  DriveApis,
  FileIndexApi,
  FileListPage,
  RemoteFile,
} from '../../backup/types.js';
import { describeDriveError } from './driveErrors.js';

// Read-only access to every file in the account
export const SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];

const LIST_FIELDS = 'nextPageToken, files(id, name, mimeType, size, capabilities/canDownload)';

/**
 * Create OAuth2 client for the configured web application
 */
export function createOAuth2Client(config: OAuthConfig): OAuth2Client {
  return new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
}

export function fromGoogleCredentials(tokens: Credentials): Partial<Credential> {
  const update: Partial<Credential> = {};
  if (tokens.access_token) update.accessToken = tokens.access_token;
  if (tokens.refresh_token) update.refreshToken = tokens.refresh_token;
  if (typeof tokens.expiry_date === 'number') update.expiryDate = tokens.expiry_date;
  if (tokens.scope) update.scope = tokens.scope;
  if (tokens.token_type) update.tokenType = tokens.token_type;
  return update;
}

export function toGoogleCredentials(credential: Credential): Credentials {
  return {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expiry_date: credential.expiryDate,
    scope: credential.scope,
    token_type: credential.tokenType,
  };
}

function requireAccessToken(update: Partial<Credential>, context: string): Credential {
  if (!update.accessToken) {
    throw new AuthError(`${context}: no access token returned`);
  }
  return { ...update, accessToken: update.accessToken };
}

export class GoogleAuthProvider implements AuthProvider {
  constructor(private readonly config: OAuthConfig) {}

  authorizationUrl(state: string): string {
    return createOAuth2Client(this.config).generateAuthUrl({
      access_type: 'offline',
      include_granted_scopes: true,
      scope: SCOPES,
      state,
      prompt: 'consent', // Force consent to get refresh token
    });
  }

  async exchangeCode(code: string): Promise<Credential> {
    try {
      const { tokens } = await createOAuth2Client(this.config).getToken(code);
      return requireAccessToken(fromGoogleCredentials(tokens), 'Token exchange');
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new AuthError(`Token exchange failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async refresh(credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw new AuthError('Credential expired and no refresh token is available');
    }

    const client = createOAuth2Client(this.config);
    client.setCredentials({ refresh_token: credential.refreshToken });

    try {
      const { credentials } = await client.refreshAccessToken();
      const refreshed = requireAccessToken(fromGoogleCredentials(credentials), 'Token refresh');
      return { ...refreshed, refreshToken: refreshed.refreshToken ?? credential.refreshToken };
    } catch (error) {
      if (error instanceof AuthError) throw error;
      const info = describeDriveError(error);
      const detail = info.text.includes('invalid_grant') ? 'invalid_grant' : errorMessage(error);
      throw new AuthError(`Token refresh failed: ${detail}`, { cause: error });
    }
  }
}

function toRemoteFile(file: drive_v3.Schema$File): RemoteFile | null {
  if (!file.id) return null;
  const size = file.size ? Number.parseInt(file.size, 10) : undefined;
  return {
    id: file.id,
    name: file.name ?? file.id,
    mimeType: file.mimeType ?? 'application/octet-stream',
    size: size !== undefined && Number.isFinite(size) ? size : undefined,
    canDownload: file.capabilities?.canDownload ?? undefined,
  };
}

export class DriveFileIndex implements FileIndexApi {
  constructor(private readonly drive: drive_v3.Drive) {}

  async list(request: { pageToken?: string; pageSize: number }): Promise<FileListPage> {
    const response = await this.drive.files.list({
      q: 'trashed=false', // Only non-trashed files
      pageSize: request.pageSize,
      pageToken: request.pageToken,
      fields: LIST_FIELDS,
    });

    const files: RemoteFile[] = [];
    for (const file of response.data.files ?? []) {
      const remote = toRemoteFile(file);
      if (remote) files.push(remote);
    }

    return { files, nextPageToken: response.data.nextPageToken ?? undefined };
  }
}

export class DriveContent implements ContentApi {
  constructor(private readonly drive: drive_v3.Drive) {}

  async download(fileId: string): Promise<Readable> {
    const response = await this.drive.files.get({ fileId, alt: 'media' }, { responseType: 'stream' });
    return response.data;
  }

  async export(fileId: string, mimeType: string): Promise<Readable> {
    const response = await this.drive.files.export({ fileId, mimeType }, { responseType: 'stream' });
    return response.data;
  }
}

/**
 * Drive APIs bound to one credential. Tokens refreshed by the client are
 * reported through `onTokens` so the session keeps the newest pair.
 */
export function googleDriveApis(config: OAuthConfig): DriveApiFactory {
  return (credential: Credential, onTokens: (update: Partial<Credential>) => void): DriveApis => {
    const auth = createOAuth2Client(config);
    auth.setCredentials(toGoogleCredentials(credential));
    auth.on('tokens', (tokens: Credentials) => onTokens(fromGoogleCredentials(tokens)));

    const drive = google.drive({ version: 'v3', auth });
    return { index: new DriveFileIndex(drive), content: new DriveContent(drive) };
  };
}
