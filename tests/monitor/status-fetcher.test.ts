import { AxiosError, AxiosRequestConfig } from 'axios';
import { HttpClient, StatusFetcher, readPath, toInteger } from '../../src/monitor/fetcher/status-fetcher';
import { StatusCodeTable } from '../../src/monitor/fetcher/status-table';
import { FetchErrorKind } from '../../src/monitor/utils/errors';
import { makeProvider, makeTask, silentLogger } from './helpers';

class StubHttpClient implements HttpClient {
  readonly requests: AxiosRequestConfig[] = [];

  constructor(private readonly reply: () => Promise<{ status: number; data: unknown }>) {}

  request(config: AxiosRequestConfig): Promise<{ status: number; data: unknown }> {
    this.requests.push(config);
    return this.reply();
  }
}

const observedAt = new Date('2024-05-01T08:00:00.000Z');

function fetcherReplying(status: number, data: unknown) {
  const http = new StubHttpClient(async () => ({ status, data }));
  const fetcher = new StatusFetcher(makeProvider(), { httpClient: http, logger: silentLogger(), now: () => observedAt });
  return { fetcher, http };
}

describe('StatusCodeTable', () => {
  const table = new StatusCodeTable(makeProvider().statusTable);

  it('should prefer exact codes over bands', () => {
    expect(table.describe(2501)).toBe('Quality check');
  });

  it('should fall back to the matching band', () => {
    expect(table.describe(2000)).toBe('In production');
    expect(table.describe(2999)).toBe('In production');
  });

  it('should describe unmapped codes as unknown', () => {
    expect(table.describe(4200)).toBe('Unknown status (4200)');
    expect(table.isKnown(4200)).toBe(false);
    expect(table.isKnown(3000)).toBe(true);
  });

  it('should count entries', () => {
    expect(table.size).toBe(3);
  });
});

describe('StatusFetcher', () => {
  describe('request', () => {
    it('should POST the order and user ids with the task headers', async () => {
      const { fetcher, http } = fetcherReplying(200, { code: 0, data: { buyCarInfo: { vid: 2100 } } });

      await fetcher.fetch(makeTask());

      expect(http.requests).toHaveLength(1);
      expect(http.requests[0].method).toBe('POST');
      expect(http.requests[0].url).toBe('https://orders.example.com/status');
      expect(http.requests[0].data).toEqual([{ orderId: 'ORDER-1', userId: 'USER-1' }]);
      expect(http.requests[0].headers).toEqual({ Cookie: 'session=placeholder' });
      expect(http.requests[0].timeout).toBe(5000);
    });

    it('should send ids as query parameters for GET', async () => {
      const { fetcher, http } = fetcherReplying(200, { code: 0, data: { buyCarInfo: { vid: 2100 } } });
      const task = makeTask({ endpoint: { url: 'https://orders.example.com/status', method: 'GET', headers: {} } });

      await fetcher.fetch(task);

      expect(http.requests[0].params).toEqual({ orderId: 'ORDER-1', userId: 'USER-1' });
      expect(http.requests[0].data).toBeUndefined();
    });
  });

  describe('success', () => {
    it('should return a described status record', async () => {
      const body = { code: 0, data: { buyCarInfo: { vid: 2501 } } };
      const { fetcher } = fetcherReplying(200, body);

      const result = await fetcher.fetch(makeTask());

      expect(result).toEqual({
        ok: true,
        status: { statusCode: 2501, statusDescription: 'Quality check', observedAt, rawPayload: body }
      });
    });

    it('should accept numeric strings and string bodies', async () => {
      const { fetcher } = fetcherReplying(200, JSON.stringify({ code: 0, data: { buyCarInfo: { vid: '2100' } } }));

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.status.statusCode).toBe(2100);
        expect(result.status.statusDescription).toBe('In production');
      }
    });
  });

  describe('classification', () => {
    it.each([401, 403])('should report HTTP %d as an auth error', async (status) => {
      const { fetcher } = fetcherReplying(status, 'denied');

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.AUTH_ERROR);
        expect(result.error.httpStatus).toBe(status);
        expect(result.error.isTransient()).toBe(false);
      }
    });

    it('should report other HTTP errors as provider errors', async () => {
      const { fetcher } = fetcherReplying(502, 'bad gateway');

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.PROVIDER_ERROR);
        expect(result.error.message).toBe('Provider returned HTTP 502');
        expect(result.error.isTransient()).toBe(true);
      }
    });

    it('should treat an auth envelope code as an auth error', async () => {
      const { fetcher } = fetcherReplying(200, { code: 401, message: 'login required' });

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.AUTH_ERROR);
        expect(result.error.message).toBe('Provider reported invalid credentials (code 401): login required');
      }
    });

    it('should treat other envelope codes as provider errors', async () => {
      const { fetcher } = fetcherReplying(200, { code: 500, msg: 'busy' });

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.PROVIDER_ERROR);
        expect(result.error.message).toBe('Provider returned error code 500: busy');
      }
    });

    it('should report a missing status field as malformed', async () => {
      const { fetcher } = fetcherReplying(200, { code: 0, data: { buyCarInfo: {} } });

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.MALFORMED_RESPONSE);
        expect(result.error.message).toBe("No integer status at 'data.buyCarInfo.vid'");
      }
    });

    it('should report an unparseable body as malformed', async () => {
      const { fetcher } = fetcherReplying(200, '<html>maintenance</html>');

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.MALFORMED_RESPONSE);
      }
    });

    it('should report transport failures as network errors', async () => {
      const http = new StubHttpClient(async () => {
        throw new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED');
      });
      const fetcher = new StatusFetcher(makeProvider(), { httpClient: http, logger: silentLogger() });

      const result = await fetcher.fetch(makeTask());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FetchErrorKind.NETWORK_ERROR);
        expect(result.error.message).toBe('Request failed: timeout of 5000ms exceeded');
        expect(result.error.context.details).toEqual({ code: 'ECONNABORTED' });
        expect(result.error.context.taskId).toBe('task-1');
      }
    });
  });

  describe('helpers', () => {
    it('should walk dotted paths', () => {
      expect(readPath({ a: { b: { c: 7 } } }, 'a.b.c')).toBe(7);
      expect(readPath({ a: 1 }, 'a.b')).toBeUndefined();
    });

    it('should only accept integral values', () => {
      expect(toInteger(12)).toBe(12);
      expect(toInteger(' 42 ')).toBe(42);
      expect(toInteger(1.5)).toBeNull();
      expect(toInteger('abc')).toBeNull();
      expect(toInteger(undefined)).toBeNull();
    });
  });
});
