import { MonitoringTask, NotificationConfig, ProviderConfig, StatusRecord } from '../../src/monitor/types';
import { MonitorLogger } from '../../src/monitor/utils/logger';
import { ChannelFactory } from '../../src/monitor/notification/notification-router';
import { ChannelSender, RenderedMessage } from '../../src/monitor/notification/channels/channel';

export function silentLogger(): MonitorLogger {
  return new MonitorLogger({ consoleOutput: false });
}

export function emptyNotifications(): NotificationConfig {
  return {
    email: { enabled: false, smtp: null, recipients: [] },
    qq: { enabled: false, recipients: [] },
    sms: {
      enabled: false,
      provider: 'aliyun',
      accessKeyId: '',
      accessKeySecret: '',
      signName: '',
      templateCode: '',
      recipients: []
    }
  };
}

export function makeTask(overrides: Partial<MonitoringTask> = {}): MonitoringTask {
  return {
    taskId: 'task-1',
    taskName: 'Test order',
    orderId: 'ORDER-1',
    userId: 'USER-1',
    enabled: true,
    endpoint: {
      url: 'https://orders.example.com/status',
      method: 'POST',
      headers: { Cookie: 'session=placeholder' }
    },
    checkIntervalMinutes: 1,
    notifications: emptyNotifications(),
    ...overrides
  };
}

export function makeProvider(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    successCode: 0,
    authErrorCodes: [401, 403],
    statusPath: 'data.buyCarInfo.vid',
    requestTimeoutMs: 5000,
    statusTable: {
      bands: [{ min: 2000, max: 2999, description: 'In production' }],
      codes: { '2501': 'Quality check', '3000': 'In transit' }
    },
    ...overrides
  };
}

export function makeStatus(statusCode: number, statusDescription = `Status ${statusCode}`, observedAt = new Date('2024-05-01T08:00:00.000Z')): StatusRecord {
  return { statusCode, statusDescription, observedAt };
}

export interface SentMessage {
  channel: string;
  recipient: string;
  message: RenderedMessage;
}

/**
 * Records every send; `failures` maps a recipient to the error its send throws
 */
export class RecordingChannelFactory implements ChannelFactory {
  readonly sent: SentMessage[] = [];
  readonly failures: Map<string, Error> = new Map();

  createEmailSender(_smtp: unknown, channel: 'email' | 'qq'): ChannelSender {
    return this.sender(channel);
  }

  createSmsSender(): ChannelSender {
    return this.sender('sms');
  }

  private sender(channel: string): ChannelSender {
    return {
      name: channel,
      send: async (recipient: string, message: RenderedMessage) => {
        const failure = this.failures.get(recipient);
        if (failure) {
          throw failure;
        }
        this.sent.push({ channel, recipient, message });
      }
    };
  }
}
