import { NotificationRouter } from '../../src/monitor/notification/notification-router';
import { MessageTemplate } from '../../src/monitor/notification/message-template';
import { FetchError, FetchErrorKind, NotificationError, NotificationErrorKind } from '../../src/monitor/utils/errors';
import { ChangeEvent, MonitoringTask, NotificationConfig, SmtpSettings } from '../../src/monitor/types';
import { RecordingChannelFactory, emptyNotifications, makeStatus, makeTask, silentLogger } from './helpers';

const smtp: SmtpSettings = {
  smtpServer: 'smtp.example.com',
  smtpPort: 465,
  sender: 'monitor@example.com',
  password: 'test-secret'
};

const sentAt = new Date('2024-05-01T09:00:00.000Z');

function taskWith(notifications: Partial<NotificationConfig>): MonitoringTask {
  return makeTask({ notifications: { ...emptyNotifications(), ...notifications } });
}

function changeFor(task: MonitoringTask): ChangeEvent {
  return {
    task,
    previousStatus: makeStatus(2100, 'In production'),
    currentStatus: makeStatus(3000, 'In transit'),
    detectedAt: new Date('2024-05-01T08:30:00.000Z')
  };
}

describe('MessageTemplate', () => {
  it('should substitute known variables and keep unknown placeholders', () => {
    const rendered = MessageTemplate.create('{{a}} and {{b}}').setVariable('a', 'one').render();
    expect(rendered).toBe('one and {{b}}');
  });
});

describe('NotificationRouter', () => {
  let factory: RecordingChannelFactory;
  let router: NotificationRouter;

  beforeEach(() => {
    factory = new RecordingChannelFactory();
    router = new NotificationRouter({ channelFactory: factory, logger: silentLogger(), now: () => sentAt });
  });

  describe('dispatch', () => {
    it('should render the email template with both statuses', async () => {
      const task = taskWith({
        email: { enabled: true, smtp, recipients: [{ address: 'owner@example.com', enabled: true }] }
      });

      const outcomes = await router.dispatch(changeFor(task));

      expect(outcomes).toEqual([{
        channel: 'email',
        recipient: 'owner@example.com',
        success: true,
        error: null,
        errorKind: null,
        timestamp: sentAt
      }]);
      expect(factory.sent[0].message.subject).toBe('Order status changed - Test order');
      expect(factory.sent[0].message.body).toBe([
        'The order status has changed.',
        '',
        'Task: Test order',
        'Order: ORDER-1',
        'Detected at: 2024-05-01T08:30:00.000Z',
        '',
        'From: In production (code 2100)',
        'To: In transit (code 3000)'
      ].join('\n'));
    });

    it('should say none when there is no previous status', async () => {
      const task = taskWith({ qq: { enabled: true, recipients: [{ address: '10000@qq.example.com', enabled: true }] },
        email: { enabled: true, smtp, recipients: [] } });
      const event = { ...changeFor(task), previousStatus: null };

      await router.dispatch(event);

      expect(factory.sent).toHaveLength(1);
      expect(factory.sent[0].channel).toBe('qq');
      expect(factory.sent[0].message.body).toBe('Order ORDER-1: none -> In transit at 2024-05-01T08:30:00.000Z');
    });

    it('should produce one outcome per recipient and keep going after a failure', async () => {
      const task = taskWith({
        email: {
          enabled: true,
          smtp,
          recipients: [
            { address: 'full@example.com', enabled: true },
            { address: 'ok@example.com', enabled: true },
            { address: 'off@example.com', enabled: false }
          ]
        }
      });
      factory.failures.set('full@example.com', new NotificationError(
        'Mailbox quota exceeded',
        NotificationErrorKind.RECIPIENT_REJECTED,
        'email',
        'full@example.com'
      ));

      const outcomes = await router.dispatch(changeFor(task));

      expect(outcomes.map(o => [o.recipient, o.success, o.errorKind])).toEqual([
        ['full@example.com', false, NotificationErrorKind.RECIPIENT_REJECTED],
        ['ok@example.com', true, null]
      ]);
      expect(outcomes[0].error).toBe('Mailbox quota exceeded');
      expect(factory.sent.map(s => s.recipient)).toEqual(['ok@example.com']);
    });

    it('should wrap unexpected sender errors as unknown', async () => {
      const task = taskWith({
        email: { enabled: true, smtp, recipients: [{ address: 'owner@example.com', enabled: true }] }
      });
      factory.failures.set('owner@example.com', new Error('socket hang up'));

      const [outcome] = await router.dispatch(changeFor(task));

      expect(outcome.success).toBe(false);
      expect(outcome.error).toBe('socket hang up');
      expect(outcome.errorKind).toBe(NotificationErrorKind.UNKNOWN);
    });

    it('should report QQ recipients as unavailable without email SMTP settings', async () => {
      const task = taskWith({
        qq: { enabled: true, recipients: [{ address: '10000@qq.example.com', enabled: true }] }
      });

      const outcomes = await router.dispatch(changeFor(task));

      expect(outcomes).toHaveLength(1);
      expect(outcomes[0].channel).toBe('qq');
      expect(outcomes[0].errorKind).toBe(NotificationErrorKind.CHANNEL_UNAVAILABLE);
      expect(outcomes[0].error).toBe('QQ channel needs an enabled email channel with SMTP settings');
      expect(factory.sent).toHaveLength(0);
    });

    it('should send SMS template parameters to each phone number', async () => {
      const task = taskWith({
        sms: {
          enabled: true,
          provider: 'aliyun',
          accessKeyId: 'test-key-id',
          accessKeySecret: 'test-secret',
          signName: 'OrderMonitor',
          templateCode: 'SMS_000000',
          recipients: [{ address: '13800000000', enabled: true }, { address: '13900000000', enabled: true }]
        }
      });

      const outcomes = await router.dispatch(changeFor(task));

      expect(outcomes.every(o => o.success && o.channel === 'sms')).toBe(true);
      expect(factory.sent.map(s => s.recipient)).toEqual(['13800000000', '13900000000']);
      expect(factory.sent[0].message.params.currentStatus).toBe('In transit');
      expect(factory.sent[0].message.params.previousCode).toBe('2100');
    });

    it('should fan out in email, qq, sms order', async () => {
      const task = taskWith({
        email: { enabled: true, smtp, recipients: [{ address: 'a@example.com', enabled: true }] },
        qq: { enabled: true, recipients: [{ address: 'b@qq.example.com', enabled: true }] },
        sms: {
          enabled: true,
          provider: 'aliyun',
          accessKeyId: '',
          accessKeySecret: '',
          signName: '',
          templateCode: '',
          recipients: [{ address: '13800000000', enabled: true }]
        }
      });

      const outcomes = await router.dispatch(changeFor(task));

      expect(outcomes.map(o => o.channel)).toEqual(['email', 'qq', 'sms']);
      expect(outcomes[2].errorKind).toBe(NotificationErrorKind.CHANNEL_UNAVAILABLE);
      expect(router.countRecipients(task)).toBe(3);
    });

    it('should produce nothing when every channel is disabled', async () => {
      expect(await router.dispatch(changeFor(makeTask()))).toEqual([]);
    });
  });

  it('should send alerts with the fetch error', async () => {
    const task = taskWith({
      email: { enabled: true, smtp, recipients: [{ address: 'owner@example.com', enabled: true }] }
    });
    const error = new FetchError('Provider rejected credentials (HTTP 401)', FetchErrorKind.AUTH_ERROR, task.taskId);

    await router.dispatchAlert(task, error);

    expect(factory.sent[0].message.subject).toBe('Order monitor needs attention - Test order');
    expect(factory.sent[0].message.body).toContain('Reason: auth_error - Provider rejected credentials (HTTP 401)');
  });

  it('should send test messages stamped with the current time', async () => {
    const task = taskWith({
      email: { enabled: true, smtp, recipients: [{ address: 'owner@example.com', enabled: true }] }
    });

    await router.dispatchTest(task);

    expect(factory.sent[0].message.body).toContain('Sent at: 2024-05-01T09:00:00.000Z');
  });

  it('should use template overrides', async () => {
    router = new NotificationRouter({
      channelFactory: factory,
      logger: silentLogger(),
      templates: { email: { change: { subject: 'Order {{orderId}}', body: '{{currentCode}}' } } }
    });
    const task = taskWith({
      email: { enabled: true, smtp, recipients: [{ address: 'owner@example.com', enabled: true }] }
    });

    await router.dispatch(changeFor(task));

    expect(factory.sent[0].message).toEqual(expect.objectContaining({ subject: 'Order ORDER-1', body: '3000' }));
  });
});
