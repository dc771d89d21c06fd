/**
 * Notification message templates
 */

import { ChannelName } from '../types';

export class MessageTemplate {
  private readonly template: string;
  private readonly variables: Map<string, string> = new Map();

  constructor(template: string) {
    this.template = template;
  }

  setVariable(name: string, value: string): this {
    this.variables.set(name, value);
    return this;
  }

  setVariables(variables: Record<string, string>): this {
    for (const [name, value] of Object.entries(variables)) {
      this.variables.set(name, value);
    }
    return this;
  }

  /**
   * Unknown placeholders are left as they are
   */
  render(): string {
    return this.template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => {
      const value = this.variables.get(name);
      return value !== undefined ? value : match;
    });
  }

  static create(template: string): MessageTemplate {
    return new MessageTemplate(template);
  }
}

export type MessageKind = 'change' | 'alert' | 'test';

export interface TemplatePair {
  subject: string;
  body: string;
}

const EMAIL_TEMPLATES: Record<MessageKind, TemplatePair> = {
  change: {
    subject: 'Order status changed - {{taskName}}',
    body: [
      'The order status has changed.',
      '',
      'Task: {{taskName}}',
      'Order: {{orderId}}',
      'Detected at: {{timestamp}}',
      '',
      'From: {{previousStatus}} (code {{previousCode}})',
      'To: {{currentStatus}} (code {{currentCode}})'
    ].join('\n')
  },
  alert: {
    subject: 'Order monitor needs attention - {{taskName}}',
    body: [
      'The status of order {{orderId}} can no longer be fetched.',
      '',
      'Task: {{taskName}}',
      'Reason: {{errorKind}} - {{errorMessage}}',
      'Since: {{timestamp}}',
      '',
      'Refresh the credentials in the task configuration; retrying will not help.'
    ].join('\n')
  },
  test: {
    subject: 'Order monitor test notification - {{taskName}}',
    body: [
      'This is a test notification.',
      '',
      'Task: {{taskName}}',
      'Order: {{orderId}}',
      'Sent at: {{timestamp}}'
    ].join('\n')
  }
};

// Short enough to read in a QQ mail push preview
const QQ_TEMPLATES: Record<MessageKind, TemplatePair> = {
  change: {
    subject: '[{{taskName}}] {{previousStatus}} -> {{currentStatus}}',
    body: 'Order {{orderId}}: {{previousStatus}} -> {{currentStatus}} at {{timestamp}}'
  },
  alert: {
    subject: '[{{taskName}}] monitor needs attention',
    body: 'Order {{orderId}}: {{errorKind}} - {{errorMessage}} ({{timestamp}})'
  },
  test: {
    subject: '[{{taskName}}] test notification',
    body: 'Order {{orderId}}: test notification at {{timestamp}}'
  }
};

const SMS_TEMPLATES: Record<MessageKind, TemplatePair> = {
  change: {
    subject: '{{taskName}}',
    body: 'Order {{orderId}}: {{previousStatus}} -> {{currentStatus}}'
  },
  alert: {
    subject: '{{taskName}}',
    body: 'Order {{orderId}}: monitor stopped receiving status ({{errorKind}})'
  },
  test: {
    subject: '{{taskName}}',
    body: 'Order {{orderId}}: test notification'
  }
};

export const DEFAULT_TEMPLATES: Record<ChannelName, Record<MessageKind, TemplatePair>> = {
  email: EMAIL_TEMPLATES,
  qq: QQ_TEMPLATES,
  sms: SMS_TEMPLATES
};
