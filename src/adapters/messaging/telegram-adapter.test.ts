import { MessagingError, TelegramAdapter } from './telegram-adapter';
import { FetchSpy, jsonResponse, requestAt, stubFetch } from '../../test/http';

describe('TelegramAdapter', () => {
  let fetchMock: FetchSpy;
  const adapter = new TelegramAdapter({
    apiEndpoint: 'https://telegram.stub.test/',
    token: 'test-token',
    chatId: 12345,
    timeoutMs: 1000
  });

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('sendMessage', () => {
    it('should post Markdown text to the configured chat', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }));

      await adapter.sendMessage('*hello*');

      const { url, init } = requestAt(fetchMock);
      expect(url).toBe('https://telegram.stub.test/bottest-token/sendMessage');
      expect(init.method).toBe('POST');
      expect(JSON.parse(String(init.body))).toEqual({
        chat_id: 12345,
        text: '*hello*',
        parse_mode: 'Markdown',
        disable_web_page_preview: true
      });
    });

    it('should raise a MessagingError for an HTTP failure without leaking the token', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: false, error_code: 401, description: 'Unauthorized' }, 401));

      const error = await adapter.sendMessage('hi').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MessagingError);
      expect(error instanceof Error && error.message).toBe(
        'Telegram sendMessage failed: telegram returned HTTP 401: Unauthorized'
      );
    });

    it('should raise a MessagingError when Telegram answers ok: false', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: false, description: 'Bad Request: chat not found' }));

      await expect(adapter.sendMessage('hi')).rejects.toThrow(
        'Telegram sendMessage rejected: Bad Request: chat not found'
      );
    });
  });

  describe('sendPhoto', () => {
    it('should upload the image as multipart form data', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ ok: true }));

      await adapter.sendPhoto(Buffer.from([0x89, 0x50, 0x4e, 0x47]), 'BTC chart');

      const { url, init } = requestAt(fetchMock);
      expect(url).toBe('https://telegram.stub.test/bottest-token/sendPhoto');
      expect(init.headers).toEqual({ Accept: 'application/json' });

      const body = init.body;
      if (!(body instanceof FormData)) {
        throw new Error('Expected a multipart body');
      }
      expect(body.get('chat_id')).toBe('12345');
      expect(body.get('caption')).toBe('BTC chart');
      expect(body.get('photo')).toBeInstanceOf(Blob);
    });
  });
});
