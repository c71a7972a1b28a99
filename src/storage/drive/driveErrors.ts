/**
 * Classification of errors thrown by googleapis / gaxios calls.
 *
 * With `responseType: 'stream'` gaxios reads the error body into a string
 * before rejecting, so the reason may sit in either a parsed object or raw
 * JSON text. Both are searched.
 */

export interface DriveErrorInfo {
  status?: number;
  text: string;
  isAuthFailure: boolean;
  isExportTooLarge: boolean;
}

function fieldOf(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function describeDriveError(error: unknown): DriveErrorInfo {
  const response = fieldOf(error, 'response');
  // gaxios sets `code` to the status as a string ("403") or to a network code
  const rawStatus = fieldOf(response, 'status') ?? fieldOf(error, 'code');
  const status =
    typeof rawStatus === 'number'
      ? rawStatus
      : typeof rawStatus === 'string' && /^\d{3}$/.test(rawStatus)
        ? Number(rawStatus)
        : undefined;

  const message = error instanceof Error ? error.message : stringify(error);
  const text = `${message} ${stringify(fieldOf(response, 'data'))}`.trim();

  return {
    status,
    text,
    isAuthFailure: status === 401 || text.includes('invalid_grant'),
    isExportTooLarge: text.includes('exportSizeLimitExceeded') || text.includes('too large to be exported'),
  };
}
