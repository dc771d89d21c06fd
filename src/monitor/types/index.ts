/**
 * Common types for the order status monitor
 */

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export type HttpMethod = 'GET' | 'POST';

export type ChannelName = 'email' | 'qq' | 'sms';

export interface EndpointDescriptor {
  url: string;
  method: HttpMethod;
  /** Sent verbatim, including the auth Cookie */
  headers: Record<string, string>;
}

export interface Recipient {
  address: string;
  name?: string;
  enabled: boolean;
}

export interface SmtpSettings {
  smtpServer: string;
  smtpPort: number;
  sender: string;
  password: string;
  secure?: boolean;
}

export interface EmailChannelConfig {
  enabled: boolean;
  smtp: SmtpSettings | null;
  recipients: Recipient[];
}

export interface QqChannelConfig {
  enabled: boolean;
  recipients: Recipient[];
}

export interface SmsChannelConfig {
  enabled: boolean;
  provider: string;
  endpoint?: string;
  accessKeyId: string;
  accessKeySecret: string;
  signName: string;
  templateCode: string;
  recipients: Recipient[];
}

export interface NotificationConfig {
  email: EmailChannelConfig;
  qq: QqChannelConfig;
  sms: SmsChannelConfig;
}

export interface MonitoringTask {
  readonly taskId: string;
  readonly taskName: string;
  readonly orderId: string;
  readonly userId: string;
  readonly enabled: boolean;
  readonly endpoint: EndpointDescriptor;
  readonly checkIntervalMinutes: number;
  readonly cronExpression?: string;
  readonly notifications: NotificationConfig;
}

export interface StatusRecord {
  readonly statusCode: number;
  readonly statusDescription: string;
  readonly observedAt: Date;
  readonly rawPayload?: unknown;
}

export interface ChangeEvent {
  task: MonitoringTask;
  previousStatus: StatusRecord | null;
  currentStatus: StatusRecord;
  detectedAt: Date;
}

export interface StatusBand {
  min: number;
  max: number;
  description: string;
}

export interface StatusTableConfig {
  bands: StatusBand[];
  codes: Record<string, string>;
}

export interface ProviderConfig {
  successCode: number;
  authErrorCodes: number[];
  statusPath: string;
  requestTimeoutMs: number;
  statusTable: StatusTableConfig;
}

export interface GlobalSettings {
  checkIntervalMinutes: number;
  logLevel: LogLevelName;
  notifyOnFirstObservation: boolean;
  compareDescriptions: boolean;
  maxHistorySize: number;
  runOnStart: boolean;
}

/**
 * Parsed task-configuration document
 */
export interface MonitorConfig {
  globalSettings: GlobalSettings;
  provider: ProviderConfig;
  tasks: MonitoringTask[];
}
