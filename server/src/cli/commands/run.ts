import { Command } from 'commander';
import chalk from 'chalk';
import { PollScheduler } from '../../services/consolidation/pollScheduler.js';
import type { CycleResult } from '../../services/consolidation/types.js';
import { ShutdownCoordinator } from '../../utils/shutdownCoordinator.js';
import { createRuntime } from '../runtime.js';
import { heading, field, success, error, warn, table } from '../format.js';

function printCycle(result: CycleResult): void {
  heading(result.dryRun ? 'Dry Run' : 'Consolidation Run');
  field('Started', result.startedAt);
  field('Sources', result.sourcesFound);
  field('With new rows', result.sourcesWithNewRows);
  field('Skipped', result.sourcesSkipped);
  field('New rows', result.newRows);
  field('Rows written', result.dryRun ? null : result.rowsWritten);
  field('Duration', `${result.durationMs}ms`);

  if (result.flushes.length > 0) {
    console.log();
    table(
      result.flushes.map((f) => ({
        after: f.afterSource,
        status: f.status,
        rows: f.rows,
        prepended: f.prepended ? 'yes' : 'no',
      })),
      ['after', 'status', 'rows', 'prepended']
    );
  }

  const withRows = result.sources.filter((s) => s.newRows > 0);
  if (result.dryRun && withRows.length > 0) {
    console.log();
    table(
      withRows.map((s) => ({ '#': s.ordinal, company: s.displayName, new: s.newRows })),
      ['#', 'company', 'new']
    );
  }
  console.log();
}

/** Exit code for a finished cycle: 1 when the cycle or any flush failed */
export function cycleExitCode(result: CycleResult): number {
  if (result.error !== null) return 1;
  return result.flushes.some((f) => f.status !== 'written') ? 1 : 0;
}

export function registerRunCommands(program: Command): void {
  program
    .command('run')
    .description('Poll every source forever, writing new rows to the destination')
    .action(async () => {
      const { config, engine } = createRuntime();
      const scheduler = new PollScheduler(engine, config);
      const coordinator = new ShutdownCoordinator();

      coordinator.register('scheduler', () => {
        scheduler.stop();
        warn('Stopping after the current cycle; signal again to exit now');
      });
      const removeSignalHandlers = coordinator.installSignalHandlers();

      console.log(chalk.dim(`Destination: ${config.destination.spreadsheetId} / ${config.destination.sheetName}`));
      console.log(chalk.dim('Press Ctrl+C to stop\n'));

      try {
        await scheduler.start();
      } finally {
        removeSignalHandlers();
      }
      success(`Stopped after ${scheduler.getStatus().totalRuns} run(s)`);
    });

  program
    .command('once')
    .description('Run a single consolidation cycle and print a summary')
    .option('--dry-run', 'Classify rows without writing the destination or the ledger')
    .action(async (opts: { dryRun?: boolean }) => {
      const { engine } = createRuntime();
      const result = await engine.runCycle({ dryRun: opts.dryRun ?? false });

      printCycle(result);

      if (result.error !== null) {
        error(result.error);
      } else if (result.sourcesFound === 0) {
        warn('Catalog is empty; nothing to do');
      }

      const code = cycleExitCode(result);
      if (code !== 0) {
        process.exitCode = code;
      } else if (!result.dryRun) {
        success(`${result.rowsWritten} row(s) written`);
      }
    });
}
