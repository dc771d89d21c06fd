/**
 * Monitor error taxonomy
 *
 * Fetch and notification errors are contained to the cycle that raised them;
 * configuration errors surface once, at load time.
 */

export enum FetchErrorKind {
  /** Connection failure or timeout */
  NETWORK_ERROR = 'network_error',

  /** Expired or invalid credentials, retrying will not help */
  AUTH_ERROR = 'auth_error',

  /** Payload cannot be parsed into a status code */
  MALFORMED_RESPONSE = 'malformed_response',

  /** Well-formed error response from the provider */
  PROVIDER_ERROR = 'provider_error'
}

export enum NotificationErrorKind {
  CHANNEL_UNAVAILABLE = 'channel_unavailable',
  RECIPIENT_REJECTED = 'recipient_rejected',
  AUTH_FAILURE = 'auth_failure',
  UNKNOWN = 'unknown'
}

export enum ConfigErrorKind {
  INVALID = 'invalid',
  MISSING_FIELD = 'missing_field'
}

export interface MonitorErrorContext {
  module: string;
  operation?: string;
  taskId?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export abstract class MonitorError<K extends string> extends Error {
  public readonly kind: K;
  public readonly context: MonitorErrorContext;

  protected constructor(
    name: string,
    message: string,
    kind: K,
    context: Omit<MonitorErrorContext, 'timestamp'>
  ) {
    super(message);
    this.name = name;
    this.kind = kind;
    this.context = { ...context, timestamp: new Date() };
  }

  toString(): string {
    const task = this.context.taskId ? `, Task: ${this.context.taskId}` : '';
    return `[${this.kind}] ${this.message} (Module: ${this.context.module}${task})`;
  }
}

export class FetchError extends MonitorError<FetchErrorKind> {
  /** HTTP status of the response, when one was received */
  public readonly httpStatus?: number;

  constructor(
    message: string,
    kind: FetchErrorKind,
    taskId?: string,
    details?: Record<string, unknown>,
    httpStatus?: number
  ) {
    super('FetchError', message, kind, { module: 'fetcher', operation: 'fetch', taskId, details });
    this.httpStatus = httpStatus;
  }

  /**
   * Transient kinds are worth retrying on the next tick
   */
  isTransient(): boolean {
    return this.kind === FetchErrorKind.NETWORK_ERROR || this.kind === FetchErrorKind.PROVIDER_ERROR;
  }
}

export class NotificationError extends MonitorError<NotificationErrorKind> {
  public readonly channel: string;
  public readonly recipient?: string;

  constructor(
    message: string,
    kind: NotificationErrorKind,
    channel: string,
    recipient?: string,
    details?: Record<string, unknown>
  ) {
    super('NotificationError', message, kind, { module: 'notification', operation: 'send', details });
    this.channel = channel;
    this.recipient = recipient;
  }
}

export class ConfigError extends MonitorError<ConfigErrorKind> {
  /** Dotted path of the offending field */
  public readonly field?: string;

  constructor(message: string, kind: ConfigErrorKind, field?: string, taskId?: string) {
    super('ConfigError', message, kind, { module: 'config', operation: 'load', taskId });
    this.field = field;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
