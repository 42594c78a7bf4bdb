import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from './client.js';

describe('FetchClient', () => {
  const mockedFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    mockedFetch.mockReset();
    vi.unstubAllGlobals();
  });

  function sentHeaders(call = 0): Headers {
    return new Headers(mockedFetch.mock.calls[call]?.[1]?.headers);
  }

  describe('constructor', () => {
    it('normalizes the base URL', () => {
      expect(new FetchClient('https://api.example.com/api').baseUrl).toBe('https://api.example.com/api/');
    });

    it('throws on an invalid base URL', () => {
      expect(() => new FetchClient('not a url')).toThrow(ConstructURLError);
    });

    it('throws without a fetch implementation', () => {
      vi.stubGlobal('fetch', undefined);

      expect(() => new FetchClient('https://api.example.com/')).toThrow(
        'error no fetch implementation available in this runtime',
      );
    });
  });

  describe('get', () => {
    it('resolves the endpoint against the base URL', async () => {
      const response = new Response('[]', { status: 200 });
      mockedFetch.mockResolvedValueOnce(response);

      const client = new FetchClient('https://api.example.com/api', { headers: { 'X-Base': '1' } });
      const [err, res] = await client.get('/cfps/1729/', { headers: { 'X-Extra': '2' } });

      expect(err).toBeNull();
      expect(res).toBe(response);
      expect(mockedFetch).toHaveBeenCalledWith('https://api.example.com/api/cfps/1729/', {
        method: 'GET',
        body: undefined,
        headers: expect.any(Headers),
      });
      expect(sentHeaders().get('x-base')).toBe('1');
      expect(sentHeaders().get('x-extra')).toBe('2');
    });

    it('lets request headers remove defaults', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('[]'));

      const client = new FetchClient('https://api.example.com/', { headers: { 'X-Base': '1' } });
      await client.get('cfps', { headers: { 'X-Base': null } });

      expect(sentHeaders().has('x-base')).toBe(false);
    });

    it('passes the signal through', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('[]'));
      const controller = new AbortController();

      const client = new FetchClient('https://api.example.com/');
      await client.get('cfps', { signal: controller.signal });

      expect(mockedFetch.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    });

    it('returns non-2xx responses untouched', async () => {
      const response = new Response('not found', { status: 404 });
      mockedFetch.mockResolvedValueOnce(response);

      const [err, res] = await new FetchClient('https://api.example.com/').get('cfps/1/');

      expect(err).toBeNull();
      expect(res?.status).toBe(404);
    });

    it('wraps fetch rejections in a TransportError', async () => {
      const cause = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(cause);

      const [err, res] = await new FetchClient('https://api.example.com/').get('cfps');

      expect(res).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      expect(err?.message).toBe('error sending GET request to https://api.example.com/cfps');
      expect(err?.cause).toBe(cause);
    });
  });

  describe('request', () => {
    it('drops data on GET', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}'));

      await new FetchClient('https://api.example.com/').request('get', 'cfps', { data: { a: 1 } });

      expect(mockedFetch.mock.calls[0]?.[1]?.body).toBeUndefined();
    });

    it('sends data as JSON on POST', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 201 }));

      await new FetchClient('https://api.example.com/').request('post', 'cfps', { data: { a: 1 } });

      expect(mockedFetch.mock.calls[0]?.[1]).toMatchObject({ method: 'POST', body: '{"a":1}' });
    });

    it('returns serialization errors without calling fetch', async () => {
      const cyclic: Record<string, unknown> = {};
      cyclic.self = cyclic;

      const [err] = await new FetchClient('https://api.example.com/').request('post', 'cfps', { data: cyclic });

      expect(err?.message).toBe('error serializing POST request body');
      expect(mockedFetch).not.toHaveBeenCalled();
    });
  });
});
