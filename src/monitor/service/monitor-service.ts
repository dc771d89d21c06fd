/**
 * Monitor Service
 *
 * Process-wide entry point: builds the fetcher, store, router and scheduler
 * from one loaded configuration and exposes the monitor's lifecycle.
 */

import { MonitorConfig, MonitoringTask } from '../types';
import { ConfigManager } from '../config/config-manager';
import { HttpClient, StatusFetcher } from '../fetcher/status-fetcher';
import { StateStore, StoreStatistics } from '../store/state-store';
import { ChannelFactory, NotificationOutcome, NotificationRouter, TemplateOverrides } from '../notification/notification-router';
import { ApplyTasksResult, CycleResult, StatusSource, TaskScheduler, TaskStatus } from '../scheduler/task-scheduler';
import { MonitorLogger } from '../utils/logger';

export interface MonitorServiceOptions {
  /** Used by reload(); without it the service only knows the config it was given */
  configManager?: ConfigManager;
  logger?: MonitorLogger;
  httpClient?: HttpClient;
  statusSource?: StatusSource;
  channelFactory?: ChannelFactory;
  templates?: TemplateOverrides;
}

export interface TaskSummary {
  taskId: string;
  taskName: string;
  orderId: string;
  enabled: boolean;
  schedule: string;
  channels: string[];
  latestStatus: string | null;
  status?: TaskStatus;
}

export class MonitorService {
  private config: MonitorConfig;
  private readonly configManager?: ConfigManager;
  private readonly logger: MonitorLogger;
  private readonly store: StateStore;
  private readonly router: NotificationRouter;
  private readonly scheduler: TaskScheduler;
  private readonly fetcher: StatusFetcher;
  private started = false;

  constructor(config: MonitorConfig, options: MonitorServiceOptions = {}) {
    this.config = config;
    this.configManager = options.configManager;
    this.logger = options.logger || new MonitorLogger({ moduleName: 'monitor' });
    this.logger.setLevel(config.globalSettings.logLevel);

    this.fetcher = new StatusFetcher(config.provider, {
      httpClient: options.httpClient,
      logger: this.logger.createSubLogger('fetcher')
    });
    this.store = new StateStore({
      notifyOnFirstObservation: config.globalSettings.notifyOnFirstObservation,
      compareDescriptions: config.globalSettings.compareDescriptions,
      maxHistorySize: config.globalSettings.maxHistorySize,
      logger: this.logger.createSubLogger('store')
    });
    this.router = new NotificationRouter({
      channelFactory: options.channelFactory,
      templates: options.templates,
      logger: this.logger.createSubLogger('notification')
    });
    this.scheduler = new TaskScheduler(options.statusSource || this.fetcher, this.store, this.router, {
      runOnStart: config.globalSettings.runOnStart,
      logger: this.logger.createSubLogger('scheduler')
    });

    for (const task of config.tasks) {
      if (task.enabled) {
        this.scheduler.addTask(task);
      } else {
        this.logger.debug('Task disabled, not registered', undefined, task.taskId);
      }
    }
  }

  /**
   * Load the configuration document once and build a service from it
   */
  static fromConfigManager(configManager: ConfigManager, options: Omit<MonitorServiceOptions, 'configManager'> = {}): MonitorService {
    return new MonitorService(configManager.load(), { ...options, configManager });
  }

  /**
   * Start the scheduler for every registered task
   */
  start(): void {
    if (this.started) {
      this.logger.warn('Monitor is already running');
      return;
    }

    const tasks = this.scheduler.getAllTasks();
    if (tasks.length === 0) {
      this.logger.warn('No enabled monitoring tasks');
    }

    this.scheduler.start();
    this.started = true;
    this.logger.info(`Monitor started with ${tasks.length} task(s)`);
  }

  /**
   * Stop scheduling; resolves once in-flight cycles have finished
   */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    await this.scheduler.stop();

    const stats = this.store.getStatistics();
    this.logger.info(`Monitor stopped: ${stats.totalTasks} task(s), ${stats.totalRecords} record(s) observed`);
  }

  /**
   * Run one cycle for a task through the same path the timers use
   */
  async runOnce(taskId: string): Promise<CycleResult> {
    return this.scheduler.runOnce(taskId);
  }

  /**
   * Re-read the configuration document and apply enablement and timing changes
   */
  reload(): ApplyTasksResult {
    if (!this.configManager) {
      throw new Error('Monitor was built without a configuration manager; nothing to reload');
    }

    const next = this.configManager.reload();
    this.config = next;
    this.logger.setLevel(next.globalSettings.logLevel);
    const result = this.scheduler.applyTasks(next.tasks);
    this.logger.info('Configuration reloaded', { ...result });
    return result;
  }

  /**
   * Send the test template through every enabled channel of one or all tasks
   */
  async testNotifications(taskId?: string): Promise<Map<string, NotificationOutcome[]>> {
    const tasks = taskId ? [this.requireTask(taskId)] : this.config.tasks.filter(t => t.enabled);
    const results = new Map<string, NotificationOutcome[]>();

    for (const task of tasks) {
      const outcomes = await this.router.dispatchTest(task);
      const succeeded = outcomes.filter(o => o.success).length;
      this.logger.info(`Test notifications: ${succeeded}/${outcomes.length} delivered`, undefined, task.taskId);
      results.set(task.taskId, outcomes);
    }

    return results;
  }

  /**
   * One row per configured task, enabled or not
   */
  getSummary(): TaskSummary[] {
    return this.config.tasks.map(task => {
      const latest = this.store.latest(task.taskId);
      return {
        taskId: task.taskId,
        taskName: task.taskName,
        orderId: task.orderId,
        enabled: task.enabled,
        schedule: task.cronExpression ? `cron ${task.cronExpression}` : `every ${task.checkIntervalMinutes} min`,
        channels: enabledChannels(task),
        latestStatus: latest ? `${latest.statusDescription} (${latest.statusCode})` : null,
        status: this.scheduler.getTaskStatus(task.taskId)
      };
    });
  }

  /**
   * Observation counts from the state store
   */
  getStatistics(): StoreStatistics {
    return this.store.getStatistics();
  }

  /**
   * Configuration currently in effect, including reloads
   */
  getConfig(): MonitorConfig {
    return this.config;
  }

  getScheduler(): TaskScheduler {
    return this.scheduler;
  }

  getStore(): StateStore {
    return this.store;
  }

  /**
   * Whether start() has been called without a matching stop()
   */
  isRunning(): boolean {
    return this.started;
  }

  private requireTask(taskId: string): MonitoringTask {
    const task = this.config.tasks.find(t => t.taskId === taskId);
    if (!task) {
      throw new Error(`Task not found: ${taskId}`);
    }
    return task;
  }
}

function enabledChannels(task: MonitoringTask): string[] {
  const channels: string[] = [];
  const { email, qq, sms } = task.notifications;
  if (email.enabled) {
    channels.push(`email(${email.recipients.filter(r => r.enabled).length})`);
  }
  if (qq.enabled) {
    channels.push(`qq(${qq.recipients.filter(r => r.enabled).length})`);
  }
  if (sms.enabled) {
    channels.push(`sms(${sms.recipients.filter(r => r.enabled).length})`);
  }
  return channels;
}
