import { WebhookSender } from './WebhookSender';
import { Notification } from '../types';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

function createNotification(overrides?: Partial<Notification>): Notification {
  return {
    kind: 'DOWN',
    monitorName: 'demo',
    url: 'https://example.com/',
    timestamp: '2026-01-15T10:30:00.000Z',
    count: 4,
    ...overrides,
  };
}

function sentBody(): unknown {
  const init = mockFetch.mock.calls[0][1];
  return JSON.parse(init.body);
}

describe('WebhookSender', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('successful sends', () => {
    it('should POST a DOWN payload', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });
      const sender = new WebhookSender('https://hooks.example.com/alert');

      const result = await sender.send(createNotification(), ['ops@example.com']);

      expect(result).toEqual({ success: true });
      expect(mockFetch).toHaveBeenCalledWith(
        'https://hooks.example.com/alert',
        expect.objectContaining({
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
        }),
      );
      expect(sentBody()).toEqual({
        event: 'monitor_down',
        monitor: 'demo',
        url: 'https://example.com/',
        count: 4,
        timestamp: '2026-01-15T10:30:00.000Z',
        recipients: ['ops@example.com'],
      });
    });

    it('should label recoveries', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });
      const sender = new WebhookSender('https://hooks.example.com/alert');

      await sender.send(createNotification({ kind: 'RECOVERED', count: 9 }), []);

      expect(sentBody()).toMatchObject({ event: 'monitor_recovered', count: 9, recipients: [] });
    });
  });

  describe('failures', () => {
    it('should reject a missing url without calling fetch', async () => {
      const result = await new WebhookSender('').send(createNotification(), []);

      expect(result).toEqual({ success: false, error: 'Missing webhook url' });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should report non-2xx responses with the body', async () => {
      mockFetch.mockResolvedValueOnce({ ok: false, status: 500, text: () => Promise.resolve('oops') });
      const sender = new WebhookSender('https://hooks.example.com/alert');

      const result = await sender.send(createNotification(), []);

      expect(result).toEqual({ success: false, error: 'Webhook returned 500: oops' });
    });

    it('should report network errors', async () => {
      mockFetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND hooks.example.com'));
      const sender = new WebhookSender('https://hooks.example.com/alert');

      const result = await sender.send(createNotification(), []);

      expect(result).toEqual({
        success: false,
        error: 'Webhook request failed: getaddrinfo ENOTFOUND hooks.example.com',
      });
    });

    it('should report timeouts', async () => {
      mockFetch.mockImplementationOnce((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      }));
      const sender = new WebhookSender('https://hooks.example.com/alert', 20);

      const result = await sender.send(createNotification(), []);

      expect(result).toEqual({ success: false, error: 'Webhook request timed out (20ms)' });
    });

    it('should give up when shutdown aborts the request', async () => {
      mockFetch.mockImplementationOnce((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      }));
      const controller = new AbortController();
      const sender = new WebhookSender('https://hooks.example.com/alert', 60_000);

      const pending = sender.send(createNotification(), [], controller.signal);
      controller.abort();

      await expect(pending).resolves.toEqual({ success: false, error: 'Webhook request cancelled' });
    });

    it('should not call fetch once shutdown has begun', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await new WebhookSender('https://hooks.example.com/alert').send(createNotification(), [], controller.signal);

      expect(result).toEqual({ success: false, error: 'Webhook request cancelled' });
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
