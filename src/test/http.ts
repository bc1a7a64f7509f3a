/**
 * In-process stand-ins for outbound HTTP
 */

export function stubFetch() {
  const spy = jest.spyOn(global, 'fetch');
  spy.mockReset();
  return spy;
}

export type FetchSpy = ReturnType<typeof stubFetch>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

/**
 * URL and options of the nth fetch call
 */
export function requestAt(spy: FetchSpy, index = 0): { url: string; init: RequestInit } {
  const [input, init] = spy.mock.calls[index];
  return { url: String(input), init: init ?? {} };
}

/**
 * fetch stand-in that only settles when its signal aborts
 */
export function hangingFetch(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(new Error('This operation was aborted'));
      return;
    }
    signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
  });
}
