/**
 * State Store
 *
 * In-memory, per-task history of observed status records. `record` is the
 * only mutator and the single place where "did the status change" is decided.
 */

import { ChangeEvent, MonitoringTask, StatusRecord } from '../types';
import { MonitorLogger, createStoreLogger } from '../utils/logger';

export interface StateStoreOptions {
  /** Emit a ChangeEvent for the very first observation of a task */
  notifyOnFirstObservation?: boolean;
  /** Also treat a changed description under the same code as a change */
  compareDescriptions?: boolean;
  /** Oldest records are dropped beyond this size; 0 keeps everything */
  maxHistorySize?: number;
  logger?: MonitorLogger;
}

export interface StoreStatistics {
  totalTasks: number;
  totalRecords: number;
  taskDetails: Record<string, { recordCount: number; latestStatus: StatusRecord | null }>;
}

export class StateStore {
  private readonly histories: Map<string, StatusRecord[]> = new Map();
  private readonly options: Required<Omit<StateStoreOptions, 'logger'>>;
  private readonly logger: MonitorLogger;

  constructor(options: StateStoreOptions = {}) {
    this.options = {
      notifyOnFirstObservation: options.notifyOnFirstObservation ?? false,
      compareDescriptions: options.compareDescriptions ?? false,
      maxHistorySize: options.maxHistorySize ?? 1000
    };
    this.logger = options.logger || createStoreLogger();
  }

  /**
   * Append a status to the task's history and report whether it changed
   */
  record(task: MonitoringTask, status: StatusRecord): ChangeEvent | null {
    const history = this.histories.get(task.taskId) || [];
    const previous = history.length > 0 ? history[history.length - 1] : null;

    history.push(status);
    if (this.options.maxHistorySize > 0 && history.length > this.options.maxHistorySize) {
      history.splice(0, history.length - this.options.maxHistorySize);
    }
    this.histories.set(task.taskId, history);

    if (!this.isChange(previous, status)) {
      this.logger.debug(`Status unchanged: ${status.statusCode}`, undefined, task.taskId);
      return null;
    }

    return {
      task,
      previousStatus: previous,
      currentStatus: status,
      detectedAt: status.observedAt
    };
  }

  latest(taskId: string): StatusRecord | null {
    const history = this.histories.get(taskId);
    return history && history.length > 0 ? history[history.length - 1] : null;
  }

  /**
   * Records oldest to newest; `limit` keeps only the newest ones
   */
  history(taskId: string, limit?: number): StatusRecord[] {
    const history = this.histories.get(taskId) || [];
    if (limit === undefined) {
      return [...history];
    }
    return limit > 0 ? history.slice(-limit) : [];
  }

  clear(taskId?: string): void {
    if (taskId) {
      this.histories.delete(taskId);
      this.logger.info('Cleared status history', undefined, taskId);
    } else {
      this.histories.clear();
      this.logger.info('Cleared all status history');
    }
  }

  getStatistics(): StoreStatistics {
    const stats: StoreStatistics = {
      totalTasks: this.histories.size,
      totalRecords: 0,
      taskDetails: {}
    };

    for (const [taskId, history] of this.histories.entries()) {
      stats.totalRecords += history.length;
      stats.taskDetails[taskId] = {
        recordCount: history.length,
        latestStatus: history.length > 0 ? history[history.length - 1] : null
      };
    }

    return stats;
  }

  private isChange(previous: StatusRecord | null, current: StatusRecord): boolean {
    if (!previous) {
      return this.options.notifyOnFirstObservation;
    }
    if (previous.statusCode !== current.statusCode) {
      return true;
    }
    return this.options.compareDescriptions && previous.statusDescription !== current.statusDescription;
  }
}
