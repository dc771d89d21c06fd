/**
 * Task-configuration document parser
 *
 * Turns the snake_case document written by the configuration editor into
 * typed descriptors. Problems with the document as a whole throw; problems
 * with a single task drop that task and are returned as warnings.
 */

import cron from 'node-cron';
import {
  EmailChannelConfig,
  GlobalSettings,
  HttpMethod,
  LogLevelName,
  MonitorConfig,
  MonitoringTask,
  NotificationConfig,
  ProviderConfig,
  QqChannelConfig,
  Recipient,
  SmsChannelConfig,
  SmtpSettings,
  StatusBand,
  StatusTableConfig
} from '../types';
import { ConfigError, ConfigErrorKind } from '../utils/errors';
import { MAX_INTERVAL_MINUTES } from '../scheduler/task-scheduler';
import { toInteger } from '../fetcher/status-fetcher';

type RawObject = Record<string, unknown>;

export interface ParseResult {
  config: MonitorConfig;
  warnings: ConfigError[];
}

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  checkIntervalMinutes: 15,
  logLevel: 'info',
  notifyOnFirstObservation: false,
  compareDescriptions: false,
  maxHistorySize: 1000,
  runOnStart: true
};

export const DEFAULT_PROVIDER: ProviderConfig = {
  successCode: 0,
  authErrorCodes: [401, 403],
  statusPath: 'data.buyCarInfo.vid',
  requestTimeoutMs: 30000,
  statusTable: { bands: [], codes: {} }
};

const LOG_LEVELS: LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export function parseConfigDocument(raw: unknown): ParseResult {
  if (!isObject(raw)) {
    throw new ConfigError('Configuration document must be an object', ConfigErrorKind.INVALID);
  }

  const rawTasks = raw.monitoring_tasks;
  if (!Array.isArray(rawTasks)) {
    throw new ConfigError('Configuration document has no monitoring_tasks list', ConfigErrorKind.MISSING_FIELD, 'monitoring_tasks');
  }

  const globalSettings = parseGlobalSettings(isObject(raw.global_settings) ? raw.global_settings : {});
  const provider = parseProvider(isObject(raw.provider) ? raw.provider : {}, isObject(raw.global_settings) ? raw.global_settings : {});

  const warnings: ConfigError[] = [];
  const tasks: MonitoringTask[] = [];
  const seen = new Set<string>();

  rawTasks.forEach((rawTask: unknown, index: number) => {
    try {
      const task = parseTask(rawTask, index, globalSettings);
      if (seen.has(task.taskId)) {
        throw new ConfigError(`Duplicate task_id '${task.taskId}'`, ConfigErrorKind.INVALID, `monitoring_tasks[${index}].task_id`, task.taskId);
      }
      seen.add(task.taskId);
      tasks.push(task);
    } catch (error) {
      if (!(error instanceof ConfigError)) {
        throw error;
      }
      warnings.push(error);
    }
  });

  return { config: { globalSettings, provider, tasks }, warnings };
}

export function parseGlobalSettings(raw: RawObject): GlobalSettings {
  const level = typeof raw.log_level === 'string' ? raw.log_level.toLowerCase() : DEFAULT_GLOBAL_SETTINGS.logLevel;
  return {
    checkIntervalMinutes: intervalMinutes(raw.check_interval, 'global_settings.check_interval') ??
      DEFAULT_GLOBAL_SETTINGS.checkIntervalMinutes,
    logLevel: LOG_LEVELS.find(l => l === level) ?? DEFAULT_GLOBAL_SETTINGS.logLevel,
    notifyOnFirstObservation: booleanOr(raw.notify_on_first_observation, DEFAULT_GLOBAL_SETTINGS.notifyOnFirstObservation),
    compareDescriptions: booleanOr(raw.compare_descriptions, DEFAULT_GLOBAL_SETTINGS.compareDescriptions),
    maxHistorySize: nonNegativeInteger(raw.max_history_size) ?? DEFAULT_GLOBAL_SETTINGS.maxHistorySize,
    runOnStart: booleanOr(raw.run_on_start, DEFAULT_GLOBAL_SETTINGS.runOnStart)
  };
}

export function parseProvider(raw: RawObject, globals: RawObject = {}): ProviderConfig {
  const authCodes = Array.isArray(raw.auth_error_codes)
    ? raw.auth_error_codes.map(toInteger).filter((c): c is number => c !== null)
    : DEFAULT_PROVIDER.authErrorCodes;

  return {
    successCode: toInteger(raw.success_code) ?? DEFAULT_PROVIDER.successCode,
    authErrorCodes: authCodes,
    statusPath: nonEmptyString(raw.status_path) ?? DEFAULT_PROVIDER.statusPath,
    requestTimeoutMs: positiveNumber(raw.request_timeout_ms) ??
      positiveNumber(globals.request_timeout_ms) ??
      DEFAULT_PROVIDER.requestTimeoutMs,
    statusTable: parseStatusTable(isObject(raw.status_table) ? raw.status_table : {})
  };
}

export function parseStatusTable(raw: RawObject): StatusTableConfig {
  const bands: StatusBand[] = [];
  if (Array.isArray(raw.bands)) {
    raw.bands.forEach((band: unknown, index: number) => {
      if (!isObject(band)) {
        throw new ConfigError('Status band must be an object', ConfigErrorKind.INVALID, `provider.status_table.bands[${index}]`);
      }
      const min = toInteger(band.min);
      const max = toInteger(band.max);
      const description = nonEmptyString(band.description);
      if (min === null || max === null || !description || min > max) {
        throw new ConfigError(
          'Status band needs integer min <= max and a description',
          ConfigErrorKind.INVALID,
          `provider.status_table.bands[${index}]`
        );
      }
      bands.push({ min, max, description });
    });
  }

  const codes: Record<string, string> = {};
  if (isObject(raw.codes)) {
    for (const [code, description] of Object.entries(raw.codes)) {
      if (toInteger(code) !== null && typeof description === 'string') {
        codes[code] = description;
      }
    }
  }

  return { bands, codes };
}

export function parseTask(raw: unknown, index: number, globals: GlobalSettings): MonitoringTask {
  const at = `monitoring_tasks[${index}]`;
  if (!isObject(raw)) {
    throw new ConfigError('Task entry must be an object', ConfigErrorKind.INVALID, at);
  }

  const taskId = requiredId(raw, 'task_id', at);
  const orderId = requiredId(raw, 'order_id', at, taskId);
  const userId = requiredId(raw, 'user_id', at, taskId);

  const url = nonEmptyString(raw.url);
  if (!url) {
    throw new ConfigError(`Task '${taskId}' is missing url`, ConfigErrorKind.MISSING_FIELD, `${at}.url`, taskId);
  }
  if (!isHttpUrl(url)) {
    throw new ConfigError(`Task '${taskId}' has an invalid url: ${url}`, ConfigErrorKind.INVALID, `${at}.url`, taskId);
  }

  const method = raw.method === undefined ? 'POST' : String(raw.method).toUpperCase();
  if (!isHttpMethod(method)) {
    throw new ConfigError(`Task '${taskId}' has unsupported method ${method}`, ConfigErrorKind.INVALID, `${at}.method`, taskId);
  }

  const cronExpression = nonEmptyString(raw.cron_expression);
  if (cronExpression && !cron.validate(cronExpression)) {
    throw new ConfigError(
      `Task '${taskId}' has an invalid cron expression: ${cronExpression}`,
      ConfigErrorKind.INVALID,
      `${at}.cron_expression`,
      taskId
    );
  }

  return {
    taskId,
    taskName: nonEmptyString(raw.task_name) ?? taskId,
    orderId,
    userId,
    enabled: booleanOr(raw.enabled, false),
    endpoint: {
      url,
      method,
      headers: parseHeaders(raw.headers)
    },
    checkIntervalMinutes: intervalMinutes(raw.check_interval, `${at}.check_interval`, taskId) ?? globals.checkIntervalMinutes,
    cronExpression,
    notifications: parseNotifications(isObject(raw.notifications) ? raw.notifications : {})
  };
}

export function parseNotifications(raw: RawObject): NotificationConfig {
  return {
    email: parseEmail(isObject(raw.email) ? raw.email : {}),
    qq: parseQq(isObject(raw.qq) ? raw.qq : {}),
    sms: parseSms(isObject(raw.sms) ? raw.sms : {})
  };
}

function parseEmail(raw: RawObject): EmailChannelConfig {
  return {
    enabled: booleanOr(raw.enabled, false),
    smtp: isObject(raw.smtp_config) ? parseSmtp(raw.smtp_config) : null,
    recipients: parseRecipients(raw.receivers, 'email')
  };
}

function parseSmtp(raw: RawObject): SmtpSettings | null {
  const smtpServer = nonEmptyString(raw.smtp_server);
  if (!smtpServer) {
    return null;
  }
  return {
    smtpServer,
    smtpPort: positiveNumber(raw.smtp_port) ?? 587,
    sender: nonEmptyString(raw.sender) ?? '',
    password: typeof raw.password === 'string' ? raw.password : '',
    secure: typeof raw.secure === 'boolean' ? raw.secure : undefined
  };
}

function parseQq(raw: RawObject): QqChannelConfig {
  return {
    enabled: booleanOr(raw.enabled, false),
    recipients: parseRecipients(raw.qq_emails, 'email')
  };
}

function parseSms(raw: RawObject): SmsChannelConfig {
  return {
    enabled: booleanOr(raw.enabled, false),
    provider: nonEmptyString(raw.provider) ?? 'aliyun',
    endpoint: nonEmptyString(raw.endpoint),
    accessKeyId: nonEmptyString(raw.access_key_id) ?? '',
    accessKeySecret: nonEmptyString(raw.access_key_secret) ?? '',
    signName: nonEmptyString(raw.sign_name) ?? '',
    templateCode: nonEmptyString(raw.template_code) ?? nonEmptyString(raw.template_id) ?? '',
    recipients: parseRecipients(raw.phone_numbers, 'phone')
  };
}

function parseRecipients(raw: unknown, addressField: 'email' | 'phone'): Recipient[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const recipients: Recipient[] = [];
  for (const entry of raw) {
    if (typeof entry === 'string' || typeof entry === 'number') {
      recipients.push({ address: String(entry), enabled: true });
    } else if (isObject(entry)) {
      const address = nonEmptyString(entry[addressField]) ??
        (typeof entry[addressField] === 'number' ? String(entry[addressField]) : undefined);
      if (address) {
        recipients.push({
          address,
          name: nonEmptyString(entry.name),
          enabled: booleanOr(entry.enabled, true)
        });
      }
    }
  }
  return recipients;
}

function parseHeaders(raw: unknown): Record<string, string> {
  const headers: Record<string, string> = {};
  if (isObject(raw)) {
    for (const [name, value] of Object.entries(raw)) {
      if (value !== undefined && value !== null) {
        headers[name] = String(value);
      }
    }
  }
  return headers;
}

function requiredId(raw: RawObject, field: string, at: string, taskId?: string): string {
  const value = raw[field];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  const text = nonEmptyString(value);
  if (!text) {
    const owner = taskId ? `Task '${taskId}'` : `Task at ${at}`;
    throw new ConfigError(`${owner} is missing ${field}`, ConfigErrorKind.MISSING_FIELD, `${at}.${field}`, taskId);
  }
  return text;
}

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHttpMethod(value: string): value is HttpMethod {
  return value === 'GET' || value === 'POST';
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function positiveNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function intervalMinutes(value: unknown, field: string, taskId?: string): number | undefined {
  const minutes = positiveNumber(value);
  if (minutes !== undefined && minutes > MAX_INTERVAL_MINUTES) {
    throw new ConfigError(
      `check_interval ${minutes} exceeds the ${MAX_INTERVAL_MINUTES} minute timer limit`,
      ConfigErrorKind.INVALID,
      field,
      taskId
    );
  }
  return minutes;
}

function nonNegativeInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : undefined;
}
