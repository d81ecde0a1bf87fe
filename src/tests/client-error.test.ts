import { describe, it, expect } from 'vitest';
import { ClientError, MailApiError, MailNetworkError } from '../clients/errors/client-error.js';

describe('ClientError', () => {
  describe('constructor', () => {
    it('should create error with client name and message', () => {
      const error = new ClientError({
        clientName: 'TestClient',
        message: 'Test error message',
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ClientError);
      expect(error.name).toBe('TestClientError');
      expect(error.message).toBe('Test error message');
      expect(error.clientName).toBe('TestClient');
    });

    it('should include cause error if provided', () => {
      const cause = new Error('Original error');
      const error = new ClientError({
        clientName: 'TestClient',
        message: 'Wrapper error',
        cause,
      });

      expect(error.cause).toBe(cause);
      expect(error.stack).toContain('Caused by:');
      expect(error.stack).toContain('Original error');
    });

    it('should include metadata if provided', () => {
      const error = new ClientError({
        clientName: 'TestClient',
        message: 'Test error',
        metadata: { path: '/tmp/a.txt', attempt: 2 },
      });

      expect(error.metadata).toEqual({ path: '/tmp/a.txt', attempt: 2 });
    });
  });
});

describe('MailApiError', () => {
  it('should carry the status code and prefix the message', () => {
    const error = new MailApiError(422, 'invalid recipient', { status: 'error' });

    expect(error).toBeInstanceOf(ClientError);
    expect(error).toBeInstanceOf(MailApiError);
    expect(error.name).toBe('MailApiError');
    expect(error.statusCode).toBe(422);
    expect(error.message).toBe('mail API error (422): invalid recipient');
    expect(error.payload).toEqual({ status: 'error' });
    expect(error.metadata).toEqual({ statusCode: 422 });
  });
});

describe('MailNetworkError', () => {
  it('should be distinguishable from API errors', () => {
    const error = new MailNetworkError('POST /api/v1/send/message failed: connection refused');

    expect(error).toBeInstanceOf(ClientError);
    expect(error).not.toBeInstanceOf(MailApiError);
    expect(error.name).toBe('MailNetworkError');
  });
});
