/**
 * Status Fetcher
 *
 * Performs one lookup against the provider's order-status endpoint and
 * normalizes the answer into a StatusRecord or a typed FetchError.
 * No retries happen here; the scheduler decides what a failure means.
 */

import axios, { AxiosRequestConfig } from 'axios';
import { MonitoringTask, ProviderConfig, StatusRecord } from '../types';
import { FetchError, FetchErrorKind } from '../utils/errors';
import { MonitorLogger, createFetcherLogger } from '../utils/logger';
import { StatusCodeTable } from './status-table';

export type FetchResult =
  | { ok: true; status: StatusRecord }
  | { ok: false; error: FetchError };

/**
 * The part of an axios instance the fetcher relies on
 */
export interface HttpClient {
  request(config: AxiosRequestConfig): Promise<{ status: number; data: unknown }>;
}

export interface StatusFetcherOptions {
  httpClient?: HttpClient;
  logger?: MonitorLogger;
  /** Clock used for observedAt */
  now?: () => Date;
}

const AUTH_HTTP_STATUSES = new Set([401, 403]);

export class StatusFetcher {
  private readonly provider: ProviderConfig;
  private readonly table: StatusCodeTable;
  private readonly http: HttpClient;
  private readonly logger: MonitorLogger;
  private readonly now: () => Date;

  constructor(provider: ProviderConfig, options: StatusFetcherOptions = {}) {
    this.provider = provider;
    this.table = new StatusCodeTable(provider.statusTable);
    this.http = options.httpClient || axios.create({ timeout: provider.requestTimeoutMs });
    this.logger = options.logger || createFetcherLogger();
    this.now = options.now || (() => new Date());
  }

  async fetch(task: MonitoringTask): Promise<FetchResult> {
    this.logger.debug('Fetching order status', { orderId: task.orderId, url: task.endpoint.url }, task.taskId);

    let response: { status: number; data: unknown };
    try {
      response = await this.http.request(this.buildRequest(task));
    } catch (error) {
      return this.fail(task, this.toNetworkError(task, error));
    }

    if (AUTH_HTTP_STATUSES.has(response.status)) {
      return this.fail(task, new FetchError(
        `Provider rejected credentials (HTTP ${response.status})`,
        FetchErrorKind.AUTH_ERROR,
        task.taskId,
        undefined,
        response.status
      ));
    }

    if (response.status < 200 || response.status >= 300) {
      return this.fail(task, new FetchError(
        `Provider returned HTTP ${response.status}`,
        FetchErrorKind.PROVIDER_ERROR,
        task.taskId,
        undefined,
        response.status
      ));
    }

    const body = parseBody(response.data);
    if (!isRecord(body)) {
      return this.fail(task, new FetchError(
        'Response body is not a JSON object',
        FetchErrorKind.MALFORMED_RESPONSE,
        task.taskId,
        undefined,
        response.status
      ));
    }

    const envelopeError = this.checkEnvelope(task, body, response.status);
    if (envelopeError) {
      return this.fail(task, envelopeError);
    }

    const statusCode = toInteger(readPath(body, this.provider.statusPath));
    if (statusCode === null) {
      return this.fail(task, new FetchError(
        `No integer status at '${this.provider.statusPath}'`,
        FetchErrorKind.MALFORMED_RESPONSE,
        task.taskId,
        undefined,
        response.status
      ));
    }

    const status: StatusRecord = {
      statusCode,
      statusDescription: this.table.describe(statusCode),
      observedAt: this.now(),
      rawPayload: body
    };

    this.logger.info(`Order status ${status.statusCode} (${status.statusDescription})`, undefined, task.taskId);
    return { ok: true, status };
  }

  getStatusTable(): StatusCodeTable {
    return this.table;
  }

  private buildRequest(task: MonitoringTask): AxiosRequestConfig {
    const request: AxiosRequestConfig = {
      url: task.endpoint.url,
      method: task.endpoint.method,
      headers: { ...task.endpoint.headers },
      timeout: this.provider.requestTimeoutMs,
      // Classification happens in fetch(), not through thrown errors
      validateStatus: () => true
    };

    if (task.endpoint.method === 'GET') {
      request.params = { orderId: task.orderId, userId: task.userId };
    } else {
      request.data = [{ orderId: task.orderId, userId: task.userId }];
    }

    return request;
  }

  private checkEnvelope(task: MonitoringTask, body: Record<string, unknown>, httpStatus: number): FetchError | null {
    if (!('code' in body)) {
      return null;
    }

    const code = toInteger(body.code);
    if (code === this.provider.successCode) {
      return null;
    }

    const message = typeof body.message === 'string' ? body.message : typeof body.msg === 'string' ? body.msg : '';
    const details = { code: body.code, message };

    if (code !== null && this.provider.authErrorCodes.includes(code)) {
      return new FetchError(
        `Provider reported invalid credentials (code ${code})${message ? `: ${message}` : ''}`,
        FetchErrorKind.AUTH_ERROR,
        task.taskId,
        details,
        httpStatus
      );
    }

    return new FetchError(
      `Provider returned error code ${String(body.code)}${message ? `: ${message}` : ''}`,
      FetchErrorKind.PROVIDER_ERROR,
      task.taskId,
      details,
      httpStatus
    );
  }

  private toNetworkError(task: MonitoringTask, error: unknown): FetchError {
    if (axios.isAxiosError(error)) {
      return new FetchError(
        `Request failed: ${error.message}`,
        FetchErrorKind.NETWORK_ERROR,
        task.taskId,
        { code: error.code }
      );
    }
    const message = error instanceof Error ? error.message : String(error);
    return new FetchError(`Request failed: ${message}`, FetchErrorKind.NETWORK_ERROR, task.taskId);
  }

  private fail(task: MonitoringTask, error: FetchError): FetchResult {
    this.logger.warn(`Fetch failed [${error.kind}]: ${error.message}`, error.context.details, task.taskId);
    return { ok: false, error };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return null;
  }
}

/**
 * Walk a dotted path such as "data.buyCarInfo.vid"
 */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

export function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}
