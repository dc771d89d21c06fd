#!/usr/bin/env node

/**
 * Order monitor command-line entry point
 */

import dotenv from 'dotenv';
import chalk from 'chalk';
import { Command } from 'commander';
import { Table } from 'console-table-printer';
import { ConfigManager } from '../config/config-manager';
import { MonitorService, TaskSummary } from '../service/monitor-service';
import { NotificationOutcome } from '../notification/notification-router';
import { CycleResult } from '../scheduler/task-scheduler';
import { toError } from '../utils/errors';

dotenv.config();

type GlobalOptions = {
  config?: string;
};

const program = new Command();

program
  .name('order-monitor')
  .description('Poll order status endpoints and notify on changes')
  .version('1.0.0')
  .option('-c, --config <path>', 'configuration document (YAML or JSON)');

program
  .command('start')
  .description('Start monitoring every enabled task')
  .action(() => {
    const service = buildService();
    service.start();

    let stopping = false;
    const shutdown = (signal: string) => {
      if (stopping) {
        return;
      }
      stopping = true;
      console.log(chalk.yellow(`\nReceived ${signal}, waiting for running checks...`));
      service.stop()
        .then(() => process.exit(0))
        .catch(error => fail('Shutdown failed', error));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGHUP', () => {
      try {
        const result = service.reload();
        console.log(chalk.blue(
          `Configuration reloaded: +${result.added.length} -${result.removed.length} ~${result.rescheduled.length}`
        ));
      } catch (error) {
        console.error(chalk.red('Reload failed, keeping current tasks:'), toError(error).message);
      }
    });
  });

program
  .command('check <taskId>')
  .description('Run a single check for one task and print the result')
  .action(async (taskId: string) => {
    try {
      const service = buildService();
      const result = await service.runOnce(taskId);
      printCycleResult(result);
      process.exit(result.state === 'failed' ? 1 : 0);
    } catch (error) {
      fail('Check failed', error);
    }
  });

program
  .command('summary')
  .description('Show the configured tasks')
  .option('--json', 'print JSON')
  .action((options: { json?: boolean }) => {
    try {
      const service = buildService();
      const summary = service.getSummary();
      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      printSummaryTable(summary);
    } catch (error) {
      fail('Cannot read configuration', error);
    }
  });

program
  .command('test-notify [taskId]')
  .description('Send a test message through every enabled channel')
  .action(async (taskId?: string) => {
    try {
      const service = buildService();
      const results = await service.testNotifications(taskId);
      let failures = 0;

      for (const [id, outcomes] of results) {
        console.log(chalk.bold(`\n${id}`));
        if (outcomes.length === 0) {
          console.log(chalk.gray('  no enabled recipients'));
        }
        failures += printOutcomes(outcomes);
      }

      process.exit(failures > 0 ? 1 : 0);
    } catch (error) {
      fail('Test notification failed', error);
    }
  });

function buildService(): MonitorService {
  const { config } = program.opts<GlobalOptions>();
  return MonitorService.fromConfigManager(new ConfigManager({ configPath: config }));
}

function printCycleResult(result: CycleResult): void {
  const color = result.state === 'failed' ? chalk.red : result.state === 'changed' ? chalk.green : chalk.cyan;
  console.log(`Task: ${chalk.cyan(result.taskId)}`);
  console.log(`Result: ${color(result.state)} in ${result.durationMs} ms`);

  if (result.status) {
    console.log(`Status: ${chalk.cyan(`${result.status.statusDescription} (${result.status.statusCode})`)}`);
  }
  if (result.change) {
    const previous = result.change.previousStatus;
    console.log(`Previous: ${previous ? `${previous.statusDescription} (${previous.statusCode})` : 'none'}`);
  }
  if (result.error) {
    console.log(`Error: ${chalk.red(`[${result.error.kind}] ${result.error.message}`)}`);
  }
  printOutcomes(result.outcomes);
}

function printOutcomes(outcomes: NotificationOutcome[]): number {
  let failures = 0;
  for (const outcome of outcomes) {
    if (outcome.success) {
      console.log(`  ${chalk.green('✓')} ${outcome.channel} ${outcome.recipient}`);
    } else {
      failures++;
      console.log(`  ${chalk.red('✗')} ${outcome.channel} ${outcome.recipient}: ${outcome.error} [${outcome.errorKind}]`);
    }
  }
  return failures;
}

function printSummaryTable(summary: TaskSummary[]): void {
  const table = new Table({
    columns: [
      { name: 'id', title: 'Task', alignment: 'left' },
      { name: 'name', title: 'Name', alignment: 'left', maxLen: 24 },
      { name: 'order', title: 'Order', alignment: 'left' },
      { name: 'enabled', title: 'Enabled', alignment: 'left' },
      { name: 'schedule', title: 'Schedule', alignment: 'left' },
      { name: 'channels', title: 'Channels', alignment: 'left' }
    ]
  });

  for (const task of summary) {
    table.addRow({
      id: task.taskId,
      name: task.taskName,
      order: task.orderId,
      enabled: task.enabled ? 'yes' : 'no',
      schedule: task.schedule,
      channels: task.channels.join(', ') || '-'
    }, { color: task.enabled ? 'green' : 'white' });
  }

  table.printTable();
  const enabled = summary.filter(t => t.enabled).length;
  console.log(`\n${summary.length} task(s), ${chalk.green(String(enabled))} enabled`);
}

function fail(message: string, error: unknown): never {
  console.error(chalk.red(`✗ ${message}:`), toError(error).message);
  process.exit(1);
}

if (process.argv.length <= 2) {
  program.help();
} else {
  program.parseAsync(process.argv).catch(error => fail('Command failed', error));
}
