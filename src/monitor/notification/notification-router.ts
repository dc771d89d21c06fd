/**
 * Notification Router
 *
 * Fans a change event (or an alert, or a test message) out to every enabled
 * recipient of every enabled channel of a task. Each recipient yields exactly
 * one outcome; a failing recipient never affects the others and nothing is
 * thrown back to the monitoring cycle.
 */

import { ChangeEvent, ChannelName, MonitoringTask, SmsChannelConfig, SmtpSettings } from '../types';
import { FetchError, NotificationError, NotificationErrorKind } from '../utils/errors';
import { MonitorLogger, createNotificationLogger } from '../utils/logger';
import { ChannelSender, RenderedMessage } from './channels/channel';
import { EmailChannelSender } from './channels/email-channel';
import { SmsChannelSender } from './channels/sms-channel';
import { DEFAULT_TEMPLATES, MessageKind, MessageTemplate, TemplatePair } from './message-template';

export interface NotificationOutcome {
  channel: ChannelName;
  recipient: string;
  success: boolean;
  error: string | null;
  errorKind: NotificationErrorKind | null;
  timestamp: Date;
}

export interface ChannelFactory {
  createEmailSender(smtp: SmtpSettings, channel: 'email' | 'qq'): ChannelSender;
  createSmsSender(config: SmsChannelConfig): ChannelSender;
}

export class DefaultChannelFactory implements ChannelFactory {
  createEmailSender(smtp: SmtpSettings, channel: 'email' | 'qq'): ChannelSender {
    return new EmailChannelSender(smtp, channel);
  }

  createSmsSender(config: SmsChannelConfig): ChannelSender {
    return new SmsChannelSender(config);
  }
}

export type TemplateOverrides = Partial<Record<ChannelName, Partial<Record<MessageKind, TemplatePair>>>>;

export interface NotificationRouterOptions {
  channelFactory?: ChannelFactory;
  templates?: TemplateOverrides;
  logger?: MonitorLogger;
  now?: () => Date;
}

interface ChannelPlan {
  channel: ChannelName;
  recipients: string[];
  sender: ChannelSender | null;
  unavailableReason?: string;
}

export class NotificationRouter {
  private readonly factory: ChannelFactory;
  private readonly templates: TemplateOverrides;
  private readonly logger: MonitorLogger;
  private readonly now: () => Date;

  constructor(options: NotificationRouterOptions = {}) {
    this.factory = options.channelFactory || new DefaultChannelFactory();
    this.templates = options.templates || {};
    this.logger = options.logger || createNotificationLogger();
    this.now = options.now || (() => new Date());
  }

  async dispatch(event: ChangeEvent): Promise<NotificationOutcome[]> {
    const previous = event.previousStatus;
    return this.fanOut(event.task, 'change', {
      previousStatus: previous ? previous.statusDescription : 'none',
      previousCode: previous ? String(previous.statusCode) : '-',
      currentStatus: event.currentStatus.statusDescription,
      currentCode: String(event.currentStatus.statusCode),
      timestamp: event.detectedAt.toISOString()
    });
  }

  /**
   * Tell subscribers that the task stopped receiving status, e.g. expired credentials
   */
  async dispatchAlert(task: MonitoringTask, error: FetchError): Promise<NotificationOutcome[]> {
    return this.fanOut(task, 'alert', {
      errorKind: error.kind,
      errorMessage: error.message,
      timestamp: error.context.timestamp.toISOString()
    });
  }

  async dispatchTest(task: MonitoringTask): Promise<NotificationOutcome[]> {
    return this.fanOut(task, 'test', { timestamp: this.now().toISOString() });
  }

  /**
   * Number of outcomes a dispatch for this task will produce
   */
  countRecipients(task: MonitoringTask): number {
    return this.planChannels(task).reduce((sum, plan) => sum + plan.recipients.length, 0);
  }

  private async fanOut(
    task: MonitoringTask,
    kind: MessageKind,
    variables: Record<string, string>
  ): Promise<NotificationOutcome[]> {
    const outcomes: NotificationOutcome[] = [];
    const allVariables = {
      taskName: task.taskName,
      orderId: task.orderId,
      ...variables
    };

    for (const plan of this.planChannels(task)) {
      if (plan.recipients.length === 0) {
        this.logger.warn(`Channel ${plan.channel} is enabled but has no enabled recipients`, undefined, task.taskId);
        continue;
      }

      const message = this.render(plan.channel, kind, allVariables);
      for (const recipient of plan.recipients) {
        outcomes.push(await this.deliver(plan, recipient, message));
      }
    }

    return outcomes;
  }

  private async deliver(plan: ChannelPlan, recipient: string, message: RenderedMessage): Promise<NotificationOutcome> {
    if (!plan.sender) {
      return this.outcome(plan.channel, recipient, new NotificationError(
        plan.unavailableReason || 'Channel not configured',
        NotificationErrorKind.CHANNEL_UNAVAILABLE,
        plan.channel,
        recipient
      ));
    }

    try {
      await plan.sender.send(recipient, message);
      return this.outcome(plan.channel, recipient, null);
    } catch (error) {
      const failure = error instanceof NotificationError
        ? error
        : new NotificationError(
          error instanceof Error ? error.message : String(error),
          NotificationErrorKind.UNKNOWN,
          plan.channel,
          recipient
        );
      return this.outcome(plan.channel, recipient, failure);
    }
  }

  private outcome(channel: ChannelName, recipient: string, error: NotificationError | null): NotificationOutcome {
    return {
      channel,
      recipient,
      success: error === null,
      error: error ? error.message : null,
      errorKind: error ? error.kind : null,
      timestamp: this.now()
    };
  }

  private render(channel: ChannelName, kind: MessageKind, variables: Record<string, string>): RenderedMessage {
    const pair = this.templates[channel]?.[kind] || DEFAULT_TEMPLATES[channel][kind];
    return {
      subject: MessageTemplate.create(pair.subject).setVariables(variables).render(),
      body: MessageTemplate.create(pair.body).setVariables(variables).render(),
      params: variables
    };
  }

  private planChannels(task: MonitoringTask): ChannelPlan[] {
    const { email, qq, sms } = task.notifications;
    const plans: ChannelPlan[] = [];
    const smtp = email.smtp && isCompleteSmtp(email.smtp) ? email.smtp : null;

    if (email.enabled) {
      plans.push({
        channel: 'email',
        recipients: enabledAddresses(email.recipients),
        sender: smtp ? this.factory.createEmailSender(smtp, 'email') : null,
        unavailableReason: 'SMTP settings are incomplete'
      });
    }

    if (qq.enabled) {
      plans.push({
        channel: 'qq',
        recipients: enabledAddresses(qq.recipients),
        sender: email.enabled && smtp ? this.factory.createEmailSender(smtp, 'qq') : null,
        unavailableReason: 'QQ channel needs an enabled email channel with SMTP settings'
      });
    }

    if (sms.enabled) {
      const complete = Boolean(sms.accessKeyId && sms.accessKeySecret && sms.signName && sms.templateCode);
      plans.push({
        channel: 'sms',
        recipients: enabledAddresses(sms.recipients),
        sender: complete ? this.factory.createSmsSender(sms) : null,
        unavailableReason: 'SMS credentials are incomplete'
      });
    }

    return plans;
  }
}

function enabledAddresses(recipients: { address: string; enabled: boolean }[]): string[] {
  return recipients.filter(r => r.enabled && r.address).map(r => r.address);
}

function isCompleteSmtp(smtp: SmtpSettings): boolean {
  return Boolean(smtp.smtpServer && smtp.smtpPort && smtp.sender);
}
