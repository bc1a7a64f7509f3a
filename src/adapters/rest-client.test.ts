import { RESTClient, RESTClientError } from './rest-client';
import { payloadValidator } from '../services/schema-validator';
import { FetchSpy, hangingFetch, jsonResponse, requestAt, stubFetch } from '../test/http';

interface ValueBody {
  value: number;
}

const validateValue = payloadValidator.compile<ValueBody>({
  type: 'object',
  required: ['value'],
  properties: { value: { type: 'number' } }
});

async function captureError(promise: Promise<unknown>): Promise<RESTClientError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RESTClientError) return error;
    throw error;
  }
  throw new Error('Expected the request to fail');
}

describe('RESTClient', () => {
  let fetchMock: FetchSpy;
  const client = new RESTClient({ providerName: 'stub', baseUrl: 'https://api.stub.test/v1/', timeoutMs: 1000 });

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should build the URL, validate the body and return it', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ value: 42 }));

    const response = await client.request({
      path: '/quotes',
      params: { ids: 'bitcoin', days: 3 },
      validate: validateValue
    });

    expect(response.data).toEqual({ value: 42 });
    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const { url, init } = requestAt(fetchMock);
    expect(url).toBe('https://api.stub.test/v1/quotes?ids=bitcoin&days=3');
    expect(init.method).toBe('GET');
    expect(init.headers).toEqual({ Accept: 'application/json' });
    expect(init.body).toBeUndefined();
  });

  it('should send JSON bodies with a content type', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ value: 1 }));

    await client.request({ method: 'POST', path: 'send', json: { text: 'hi' }, validate: validateValue });

    const { url, init } = requestAt(fetchMock);
    expect(url).toBe('https://api.stub.test/v1/send');
    expect(init.headers).toEqual({ Accept: 'application/json', 'Content-Type': 'application/json' });
    expect(init.body).toBe('{"text":"hi"}');
  });

  it('should categorize 429 as RATE_LIMITED with the provider message', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ message: 'slow down' }, 429));

    const error = await captureError(client.request({ path: '/quotes', validate: validateValue }));

    expect(error.category).toBe('RATE_LIMITED');
    expect(error.statusCode).toBe(429);
    expect(error.message).toBe('stub returned HTTP 429: slow down');
  });

  it('should categorize other failures as HTTP_ERROR', async () => {
    fetchMock.mockResolvedValue(new Response('<html>bad gateway</html>', { status: 502 }));

    const error = await captureError(client.request({ path: '/quotes', validate: validateValue }));

    expect(error.category).toBe('HTTP_ERROR');
    expect(error.message).toBe('stub returned HTTP 502: no error message');
  });

  it('should reject a body that fails validation', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ value: 'many' }));

    const error = await captureError(client.request({ path: '/quotes', validate: validateValue }));

    expect(error.category).toBe('INVALID_RESPONSE');
    expect(error.message).toBe('Unexpected response from stub: /value must be number');
  });

  it('should categorize a rejected fetch as NETWORK', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const error = await captureError(client.request({ path: '/quotes', validate: validateValue }));

    expect(error.category).toBe('NETWORK');
    expect(error.message).toBe('stub network error: fetch failed');
  });

  it('should time out slow requests', async () => {
    fetchMock.mockImplementation(hangingFetch);

    const error = await captureError(client.request({ path: '/quotes', timeout: 20, validate: validateValue }));

    expect(error.category).toBe('TIMEOUT');
  });

  it('should report cancellation by the caller as ABORTED', async () => {
    fetchMock.mockImplementation(hangingFetch);
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(
      client.request({ path: '/quotes', signal: controller.signal, validate: validateValue })
    );

    expect(error.category).toBe('ABORTED');
    expect(error.message).toBe('stub request aborted by caller');
  });
});
