/**
 * Order Status Monitor
 *
 * Polls order-status endpoints, keeps the observed history per task and
 * relays status changes through email, QQ mail and SMS.
 */

export * from './types';
export * from './utils/errors';
export * from './utils/logger';
export * from './fetcher/status-table';
export * from './fetcher/status-fetcher';
export * from './store/state-store';
export * from './notification/message-template';
export * from './notification/channels/channel';
export * from './notification/channels/email-channel';
export * from './notification/channels/sms-channel';
export * from './notification/notification-router';
export * from './scheduler/task-scheduler';
export * from './config/config-parser';
export * from './config/config-manager';
export * from './service/monitor-service';
