import { describe, it, expect } from 'vitest';
import { describeDriveError } from './driveErrors.js';

describe('describeDriveError', () => {
  it('reads the status from the response', () => {
    const error = Object.assign(new Error('Request failed'), { response: { status: 404, data: 'File not found' } });

    expect(describeDriveError(error)).toEqual({
      status: 404,
      text: 'Request failed File not found',
      isAuthFailure: false,
      isExportTooLarge: false,
    });
  });

  it('falls back to a numeric string code', () => {
    expect(describeDriveError(Object.assign(new Error('Forbidden'), { code: '403' })).status).toBe(403);
    expect(describeDriveError(Object.assign(new Error('reset'), { code: 'ECONNRESET' })).status).toBeUndefined();
  });

  it('flags credential failures', () => {
    expect(describeDriveError(Object.assign(new Error('Unauthorized'), { response: { status: 401 } })).isAuthFailure).toBe(
      true
    );
    expect(describeDriveError(new Error('invalid_grant: Token has been expired or revoked.')).isAuthFailure).toBe(true);
  });

  it('finds the export size limit in structured and raw bodies', () => {
    const structured = Object.assign(new Error('Forbidden'), {
      response: { status: 403, data: { error: { errors: [{ reason: 'exportSizeLimitExceeded' }] } } },
    });
    const raw = Object.assign(new Error('Forbidden'), {
      response: { status: 403, data: '{"error":{"message":"This file is too large to be exported."}}' },
    });

    expect(describeDriveError(structured).isExportTooLarge).toBe(true);
    expect(describeDriveError(raw).isExportTooLarge).toBe(true);
  });

  it('accepts values that are not errors', () => {
    expect(describeDriveError('plain failure')).toEqual({
      status: undefined,
      text: 'plain failure',
      isAuthFailure: false,
      isExportTooLarge: false,
    });
    expect(describeDriveError(null).text).toBe('');
  });
});
