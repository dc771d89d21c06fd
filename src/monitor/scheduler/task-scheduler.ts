/**
 * Task Scheduler
 *
 * Runs every registered task on its own timer and drives the
 * fetch -> record -> dispatch cycle. Tasks never wait on each other, while a
 * single task never has two cycles in flight: a tick that arrives during a
 * cycle is dropped, and a manual run joins the cycle already running.
 */

import cron from 'node-cron';
import { EventEmitter } from 'events';
import { ChangeEvent, MonitoringTask, StatusRecord } from '../types';
import { FetchResult } from '../fetcher/status-fetcher';
import { StateStore } from '../store/state-store';
import { NotificationOutcome, NotificationRouter } from '../notification/notification-router';
import { FetchError, FetchErrorKind, toError } from '../utils/errors';
import { MonitorLogger, createSchedulerLogger } from '../utils/logger';

/** Largest delay a Node timer accepts */
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60000);

export type TaskState = 'idle' | 'running' | 'failed';

export type CycleTrigger = 'scheduled' | 'manual' | 'startup';

export type CycleState = 'changed' | 'unchanged' | 'failed';

export interface CycleResult {
  taskId: string;
  trigger: CycleTrigger;
  state: CycleState;
  status?: StatusRecord;
  change?: ChangeEvent;
  outcomes: NotificationOutcome[];
  error?: { kind: string; message: string };
  /** An auth alert went out during this cycle */
  alertSent: boolean;
  startedAt: Date;
  durationMs: number;
}

export interface TaskStatus {
  taskId: string;
  state: TaskState;
  lastRun: Date | null;
  lastError: string | null;
  lastErrorKind: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  skippedCount: number;
  lastRunDuration?: number;
  /** Current auth failure streak has already been alerted */
  authAlertSent: boolean;
}

export interface TaskSchedulerOptions {
  /** Run one cycle per task as soon as the scheduler starts */
  runOnStart?: boolean;
  /** Cycle results kept per task */
  maxCycleHistory?: number;
  logger?: MonitorLogger;
}

export interface ApplyTasksResult {
  added: string[];
  removed: string[];
  rescheduled: string[];
}

/**
 * Anything that can look up a task's status; StatusFetcher in production
 */
export interface StatusSource {
  fetch(task: MonitoringTask): Promise<FetchResult>;
}

interface TimerHandle {
  stop(): void;
}

export class TaskScheduler extends EventEmitter {
  private tasks: Map<string, MonitoringTask> = new Map();
  private status: Map<string, TaskStatus> = new Map();
  private timers: Map<string, TimerHandle> = new Map();
  private inFlight: Map<string, Promise<CycleResult>> = new Map();
  private history: Map<string, CycleResult[]> = new Map();
  private alerted: Set<string> = new Set();
  private started = false;

  private readonly fetcher: StatusSource;
  private readonly store: StateStore;
  private readonly router: NotificationRouter;
  private readonly options: Required<Omit<TaskSchedulerOptions, 'logger'>>;
  private readonly logger: MonitorLogger;

  constructor(
    fetcher: StatusSource,
    store: StateStore,
    router: NotificationRouter,
    options: TaskSchedulerOptions = {}
  ) {
    super();
    this.fetcher = fetcher;
    this.store = store;
    this.router = router;
    this.options = {
      runOnStart: options.runOnStart ?? true,
      maxCycleHistory: options.maxCycleHistory ?? 10
    };
    this.logger = options.logger || createSchedulerLogger();
  }

  /**
   * Register a task; it is scheduled right away when the scheduler runs
   */
  addTask(task: MonitoringTask): void {
    if (this.tasks.has(task.taskId)) {
      throw new Error(`Task already registered: ${task.taskId}`);
    }
    assertSchedulable(task);

    this.tasks.set(task.taskId, task);
    this.status.set(task.taskId, {
      taskId: task.taskId,
      state: 'idle',
      lastRun: null,
      lastError: null,
      lastErrorKind: null,
      runCount: 0,
      successCount: 0,
      failureCount: 0,
      skippedCount: 0,
      authAlertSent: false
    });

    if (this.started && task.enabled) {
      this.scheduleTask(task);
      if (this.options.runOnStart) {
        this.launch(task, 'startup');
      }
    }

    this.emit('taskAdded', task);
  }

  /**
   * Unschedule and forget a task; a cycle already in flight still completes
   */
  removeTask(taskId: string): void {
    this.unscheduleTask(taskId);
    this.tasks.delete(taskId);
    this.status.delete(taskId);
    this.alerted.delete(taskId);
    this.emit('taskRemoved', taskId);
  }

  /**
   * Bring the registered tasks in line with a freshly loaded task list
   */
  applyTasks(tasks: MonitoringTask[]): ApplyTasksResult {
    const result: ApplyTasksResult = { added: [], removed: [], rescheduled: [] };
    const wanted = new Map(tasks.filter(t => t.enabled).map(t => [t.taskId, t]));

    for (const taskId of Array.from(this.tasks.keys())) {
      if (!wanted.has(taskId)) {
        this.removeTask(taskId);
        result.removed.push(taskId);
      }
    }

    for (const task of wanted.values()) {
      const existing = this.tasks.get(task.taskId);
      if (!existing) {
        this.addTask(task);
        result.added.push(task.taskId);
        continue;
      }

      assertSchedulable(task);
      this.tasks.set(task.taskId, task);
      const timingChanged = existing.checkIntervalMinutes !== task.checkIntervalMinutes ||
        existing.cronExpression !== task.cronExpression;
      if (timingChanged) {
        if (this.started) {
          this.scheduleTask(task);
        }
        result.rescheduled.push(task.taskId);
      }
    }

    return result;
  }

  /**
   * Arm every enabled task's timer, plus a startup cycle when configured
   */
  start(): void {
    if (this.started) {
      this.logger.warn('Scheduler is already running');
      return;
    }
    this.started = true;

    for (const task of this.tasks.values()) {
      if (task.enabled) {
        this.scheduleTask(task);
      }
    }

    if (this.options.runOnStart) {
      for (const task of this.tasks.values()) {
        if (task.enabled) {
          this.launch(task, 'startup');
        }
      }
    }

    this.emit('schedulerStarted');
    this.logger.info(`Scheduler started with ${this.timers.size} task(s)`);
  }

  /**
   * Stop scheduling new cycles and wait for the ones in flight
   */
  async stop(): Promise<void> {
    this.started = false;
    for (const taskId of Array.from(this.timers.keys())) {
      this.unscheduleTask(taskId);
    }

    const pending = Array.from(this.inFlight.values());
    if (pending.length > 0) {
      this.logger.info(`Waiting for ${pending.length} in-flight cycle(s)`);
      await Promise.allSettled(pending);
    }

    this.emit('schedulerStopped');
    this.logger.info('Scheduler stopped');
  }

  /**
   * Run a cycle now, outside the timer; joins the cycle in flight if there is one
   */
  async runOnce(taskId: string): Promise<CycleResult> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task not found: ${taskId}`);
    }

    const running = this.inFlight.get(taskId);
    if (running) {
      this.logger.info('Cycle already in flight, joining it', undefined, taskId);
      return running;
    }

    return this.startCycle(task, 'manual');
  }

  /**
   * Whether timers are armed
   */
  isStarted(): boolean {
    return this.started;
  }

  /**
   * Whether a cycle for the task is in flight
   */
  isCycleRunning(taskId: string): boolean {
    return this.inFlight.has(taskId);
  }

  /**
   * Get the run status of a task
   */
  getTaskStatus(taskId: string): TaskStatus | undefined {
    return this.status.get(taskId);
  }

  /**
   * Get the run status of every registered task
   */
  getAllStatuses(): TaskStatus[] {
    return Array.from(this.status.values());
  }

  /**
   * Recent cycle results for a task, oldest first
   */
  getCycleHistory(taskId: string): CycleResult[] {
    return this.history.get(taskId) || [];
  }

  /**
   * Get all registered tasks
   */
  getAllTasks(): MonitoringTask[] {
    return Array.from(this.tasks.values());
  }

  private scheduleTask(task: MonitoringTask): void {
    assertSchedulable(task);
    this.unscheduleTask(task.taskId);

    if (task.cronExpression) {
      const job = cron.schedule(task.cronExpression, () => this.onTick(task.taskId));
      this.timers.set(task.taskId, { stop: () => job.stop() });
      this.logger.info(`Scheduled with cron '${task.cronExpression}'`, undefined, task.taskId);
    } else {
      // Start-to-start spacing: a slow cycle does not push the next tick back
      const intervalMs = task.checkIntervalMinutes * 60000;
      const timer = setInterval(() => this.onTick(task.taskId), intervalMs);
      this.timers.set(task.taskId, { stop: () => clearInterval(timer) });
      this.logger.info(`Scheduled every ${task.checkIntervalMinutes} minute(s)`, undefined, task.taskId);
    }

    this.emit('taskScheduled', task);
  }

  private unscheduleTask(taskId: string): void {
    const timer = this.timers.get(taskId);
    if (timer) {
      timer.stop();
      this.timers.delete(taskId);
      this.emit('taskUnscheduled', taskId);
    }
  }

  private onTick(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!this.started || !task) {
      return;
    }

    if (this.inFlight.has(taskId)) {
      this.updateTaskStatus(taskId, { skippedCount: (this.status.get(taskId)?.skippedCount || 0) + 1 });
      this.logger.warn('Previous cycle still running, tick skipped', undefined, taskId);
      this.emit('cycleSkipped', taskId);
      return;
    }

    this.launch(task, 'scheduled');
  }

  /**
   * Start a cycle from a timer; the result is reported through events and logs
   */
  private launch(task: MonitoringTask, trigger: CycleTrigger): void {
    if (this.inFlight.has(task.taskId)) {
      return;
    }
    this.startCycle(task, trigger).catch(error => {
      this.logger.error('Cycle crashed', toError(error), undefined, task.taskId);
    });
  }

  private startCycle(task: MonitoringTask, trigger: CycleTrigger): Promise<CycleResult> {
    const cycle = this.runCycle(task, trigger).finally(() => {
      this.inFlight.delete(task.taskId);
    });
    this.inFlight.set(task.taskId, cycle);
    return cycle;
  }

  private async runCycle(task: MonitoringTask, trigger: CycleTrigger): Promise<CycleResult> {
    const startedAt = new Date();
    const startTime = Date.now();
    const base: Omit<CycleResult, 'state' | 'durationMs'> = { taskId: task.taskId, trigger, startedAt, outcomes: [], alertSent: false };
    let result: CycleResult;

    this.updateTaskStatus(task.taskId, { state: 'running' });
    this.emit('cycleStarted', task.taskId, trigger);
    this.logger.info(`Checking order ${task.orderId} (${trigger})`, undefined, task.taskId);

    try {
      const fetched = await this.fetcher.fetch(task);

      if (!fetched.ok) {
        result = await this.handleFetchFailure(task, fetched.error, { ...base, durationMs: 0 });
      } else {
        this.alerted.delete(task.taskId);
        const change = this.store.record(task, fetched.status);

        if (!change) {
          result = { ...base, state: 'unchanged', status: fetched.status, durationMs: 0 };
        } else {
          this.logChange(change);
          const outcomes = await this.router.dispatch(change);
          this.logOutcomes(task, outcomes);
          this.emitSafely('statusChanged', task.taskId, change);
          result = { ...base, state: 'changed', status: fetched.status, change, outcomes, durationMs: 0 };
        }
      }
    } catch (error) {
      const failure = toError(error);
      this.logger.error('Cycle failed unexpectedly', failure, undefined, task.taskId);
      result = { ...base, state: 'failed', error: { kind: 'internal_error', message: failure.message }, durationMs: 0 };
    }

    result.durationMs = Date.now() - startTime;
    this.finishCycle(task.taskId, result);
    return result;
  }

  private async handleFetchFailure(
    task: MonitoringTask,
    error: FetchError,
    base: Omit<CycleResult, 'state'>
  ): Promise<CycleResult> {
    const result: CycleResult = {
      ...base,
      state: 'failed',
      error: { kind: error.kind, message: error.message }
    };

    if (error.isTransient()) {
      this.logger.warn(`Fetch failed [${error.kind}], will retry on next tick: ${error.message}`, undefined, task.taskId);
    } else {
      this.logger.error(`Fetch failed [${error.kind}]`, error, undefined, task.taskId);
    }
    this.emit('fetchFailed', task.taskId, error);

    if (error.kind === FetchErrorKind.AUTH_ERROR) {
      if (this.alerted.has(task.taskId)) {
        this.logger.debug('Auth alert already sent for this failure streak', undefined, task.taskId);
      } else {
        this.alerted.add(task.taskId);
        this.logger.warn('Credentials need attention, sending alert', undefined, task.taskId);
        result.outcomes = await this.router.dispatchAlert(task, error);
        result.alertSent = true;
        this.logOutcomes(task, result.outcomes);
      }
    }

    return result;
  }

  private finishCycle(taskId: string, result: CycleResult): void {
    const current = this.status.get(taskId);
    if (current) {
      const failed = result.state === 'failed';
      this.updateTaskStatus(taskId, {
        state: failed ? 'failed' : 'idle',
        lastRun: result.startedAt,
        lastRunDuration: result.durationMs,
        lastError: failed && result.error ? result.error.message : null,
        lastErrorKind: failed && result.error ? result.error.kind : null,
        runCount: current.runCount + 1,
        successCount: current.successCount + (failed ? 0 : 1),
        failureCount: current.failureCount + (failed ? 1 : 0),
        authAlertSent: this.alerted.has(taskId)
      });
    }

    const history = this.history.get(taskId) || [];
    history.push(result);
    if (history.length > this.options.maxCycleHistory) {
      history.shift();
    }
    this.history.set(taskId, history);

    this.emit('cycleCompleted', taskId, result);
  }

  private logChange(change: ChangeEvent): void {
    const previous = change.previousStatus
      ? `${change.previousStatus.statusDescription} (${change.previousStatus.statusCode})`
      : 'none';
    const current = `${change.currentStatus.statusDescription} (${change.currentStatus.statusCode})`;
    this.logger.info(`Status changed: ${previous} -> ${current}`, undefined, change.task.taskId);
  }

  private logOutcomes(task: MonitoringTask, outcomes: NotificationOutcome[]): void {
    for (const outcome of outcomes) {
      if (outcome.success) {
        this.logger.info(`Notified ${outcome.recipient} via ${outcome.channel}`, undefined, task.taskId);
      } else {
        this.logger.warn(
          `Notification to ${outcome.recipient} via ${outcome.channel} failed: ${outcome.error}`,
          { errorKind: outcome.errorKind },
          task.taskId
        );
      }
    }
  }

  /**
   * A throwing listener must not fail the cycle once the change is recorded
   */
  private emitSafely(event: string, taskId: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.logger.error(`Listener for '${event}' failed`, toError(error), undefined, taskId);
    }
  }

  private updateTaskStatus(taskId: string, updates: Partial<TaskStatus>): void {
    const current = this.status.get(taskId);
    if (current) {
      this.status.set(taskId, { ...current, ...updates });
    }
  }
}

function assertSchedulable(task: MonitoringTask): void {
  if (task.cronExpression) {
    if (!cron.validate(task.cronExpression)) {
      throw new Error(`Invalid cron expression for task ${task.taskId}: ${task.cronExpression}`);
    }
    return;
  }
  if (!(task.checkIntervalMinutes > 0) || task.checkIntervalMinutes > MAX_INTERVAL_MINUTES) {
    throw new Error(
      `Check interval for task ${task.taskId} must be positive and at most ${MAX_INTERVAL_MINUTES} minutes: ${task.checkIntervalMinutes}`
    );
  }
}
