import { afterEach, describe, it, expect, vi } from 'vitest';
import { TilesetsError } from '../src/errors.js';
import { HttpClient, expectStatus, redactToken } from '../src/http.js';
import { VERSION } from '../src/version.js';
import { fetchCall, jsonResponse, stubFetch } from './helpers/fetch.js';

const URL_WITH_TOKEN = 'https://api.example.com/tilesets/v1/tester?access_token=test-secret&limit=100';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpClient', () => {
  it('should send the user agent and default headers', async () => {
    const fetchMock = stubFetch();
    const http = new HttpClient({ headers: { 'x-request-source': 'test' } });

    await http.get(URL_WITH_TOKEN);

    const { url, method, init } = fetchCall(fetchMock);
    expect(url).toBe(URL_WITH_TOKEN);
    expect(method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({
      'user-agent': `tileset-client/${VERSION}`,
      'x-request-source': 'test',
    });
  });

  it('should serialize JSON bodies', async () => {
    const fetchMock = stubFetch();
    const http = new HttpClient({ userAgent: 'test-agent' });

    await http.post(URL_WITH_TOKEN, { name: 'Roads' });
    await http.patch(URL_WITH_TOKEN, { private: true });
    await http.put(URL_WITH_TOKEN, [1, 2]);

    expect(fetchCall(fetchMock, 0).init).toMatchObject({
      method: 'POST',
      body: '{"name":"Roads"}',
      headers: { 'user-agent': 'test-agent', 'content-type': 'application/json' },
    });
    expect(fetchCall(fetchMock, 1).init).toMatchObject({ method: 'PATCH', body: '{"private":true}' });
    expect(fetchCall(fetchMock, 2).init).toMatchObject({ method: 'PUT', body: '[1,2]' });
  });

  it('should send no body for a bodyless POST', async () => {
    const fetchMock = stubFetch();
    await new HttpClient().post(URL_WITH_TOKEN);

    const { init } = fetchCall(fetchMock);
    expect(init?.body).toBeUndefined();
    expect(init?.headers).not.toHaveProperty('content-type');
  });

  it('should pass forms through untouched', async () => {
    const fetchMock = stubFetch();
    const form = new FormData();
    form.append('file', new Blob(['{}\n']), 'file');

    await new HttpClient().upload(URL_WITH_TOKEN, form, 'PUT');

    const { method, init } = fetchCall(fetchMock);
    expect(method).toBe('PUT');
    expect(init?.body).toBe(form);
  });

  it('should resolve with error responses', async () => {
    stubFetch(jsonResponse({ message: 'Not Found' }, 404));
    const response = await new HttpClient().delete(URL_WITH_TOKEN);
    expect(response.status).toBe(404);
  });

  it('should wrap network failures without leaking the token', async () => {
    const cause = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => Promise.reject(cause)));

    const error = await new HttpClient().get(URL_WITH_TOKEN).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TilesetsError);
    if (!(error instanceof TilesetsError)) return;
    expect(error.message).toBe(
      'GET https://api.example.com/tilesets/v1/tester?access_token=REDACTED&limit=100 failed',
    );
    expect(error.cause).toBe(cause);
  });

  it('should abort requests that exceed the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      ),
    );

    await expect(new HttpClient({ timeout: 5 }).get(URL_WITH_TOKEN)).rejects.toThrow(TilesetsError);
  });
});

describe('expectStatus', () => {
  it('should resolve for an expected status', async () => {
    await expect(expectStatus(new Response(null, { status: 204 }), 200, 204)).resolves.toBeUndefined();
  });

  it('should throw the response body with its status', async () => {
    const error = await expectStatus(new Response('{"message":"Not Found"}', { status: 404 }), 200).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(TilesetsError);
    if (!(error instanceof TilesetsError)) return;
    expect(error.message).toBe('{"message":"Not Found"}');
    expect(error.status).toBe(404);
  });

  it('should describe empty error responses', async () => {
    await expect(expectStatus(new Response(null, { status: 500 }), 200)).rejects.toThrow('Unexpected HTTP 500');
  });
});

describe('redactToken', () => {
  it('should replace the token value only', () => {
    expect(redactToken(URL_WITH_TOKEN)).toBe(
      'https://api.example.com/tilesets/v1/tester?access_token=REDACTED&limit=100',
    );
    expect(redactToken('https://api.example.com/')).toBe('https://api.example.com/');
  });
});
