/**
 * `stepwarden prune` command
 *
 * Deletes the history of runs with no activity in the given number of days.
 *
 * Usage:
 *   stepwarden prune                      Older than 30 days
 *   stepwarden prune --older-than 7 --dry-run
 */

import type { Command } from 'commander'
import { DEFAULT_RETENTION_DAYS, pruneHistory } from '../../modules/history/retention.js'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import {
  EXIT_SUCCESS,
  parseOutputFormat,
  reportError,
  writeJson,
  type OutputFormat,
} from '../utils/command-helpers.js'

export interface PruneActionOptions {
  olderThanDays: number
  dryRun: boolean
  outputFormat: OutputFormat
  runtime: RuntimeOptions
  now?: Date
}

export async function runPruneAction(options: PruneActionOptions): Promise<number> {
  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const report = pruneHistory(runtime.history, {
      olderThanDays: options.olderThanDays,
      dryRun: options.dryRun,
      ...(options.now !== undefined && { now: options.now }),
    })

    if (options.outputFormat === 'json') {
      writeJson({
        cutoff: report.cutoff,
        dry_run: report.dryRun,
        deleted_tasks: report.deletedTasks,
        processes: report.processes.map((p) => ({
          process_id: p.processId,
          last_activity: p.lastActivity,
          task_count: p.taskCount,
        })),
      })
      return EXIT_SUCCESS
    }

    if (report.processes.length === 0) {
      process.stdout.write(`No runs inactive since ${report.cutoff}\n`)
      return EXIT_SUCCESS
    }
    const verb = report.dryRun ? 'Would delete' : 'Deleted'
    for (const p of report.processes) {
      process.stdout.write(`${verb} ${p.processId} (${String(p.taskCount)} tasks, last active ${p.lastActivity})\n`)
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'prune')
  } finally {
    await runtime?.close()
  }
}

export function registerPruneCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('prune')
    .description('Delete the history of runs with no recent activity')
    .option('--older-than <days>', 'Inactivity window in days', String(DEFAULT_RETENTION_DAYS))
    .option('--dry-run', 'List what would be deleted without deleting it', false)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { olderThan: string; dryRun: boolean; outputFormat: string }) => {
      process.exitCode = await runPruneAction({
        olderThanDays: Number(opts.olderThan),
        dryRun: opts.dryRun,
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })
}
