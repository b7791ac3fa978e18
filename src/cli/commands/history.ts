/**
 * `stepwarden history` command
 *
 * Usage:
 *   stepwarden history                    Recent runs
 *   stepwarden history <process-id>       Steps and decisions of one run
 */

import type { Command } from 'commander'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import { renderProcessState, renderRunList } from '../formatters/history-formatter.js'
import {
  EXIT_SUCCESS,
  EXIT_USAGE,
  parseOutputFormat,
  reportError,
  writeJson,
  type OutputFormat,
} from '../utils/command-helpers.js'

export interface HistoryActionOptions {
  processId?: string
  limit: number
  outputFormat: OutputFormat
  runtime: RuntimeOptions
}

export async function runHistoryAction(options: HistoryActionOptions): Promise<number> {
  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)

    if (options.processId === undefined) {
      const runs = runtime.history.listRecentRuns(options.limit)
      if (options.outputFormat === 'json') {
        writeJson(
          runs.map((r) => ({
            process_id: r.processId,
            process_name: r.spec.name,
            status: r.status,
            current_index: r.currentIndex,
            total_steps: r.steps.length,
            parent_process_id: r.parentProcessId ?? null,
            updated_at: r.updatedAt,
          })),
        )
      } else {
        process.stdout.write(renderRunList(runs) + '\n')
      }
      return EXIT_SUCCESS
    }

    const state = runtime.history.readProcessState(options.processId)
    if (state === undefined) {
      process.stderr.write(`Error: Process not found: ${options.processId}\n`)
      return EXIT_USAGE
    }
    if (options.outputFormat === 'json') {
      writeJson({
        ...state,
        results: runtime.history.listResults(options.processId).map((r) => ({
          task_id: r.taskId,
          task_name: r.taskName,
          is_orchestrator: r.isOrchestrator,
          result: r.resultText,
        })),
      })
    } else {
      process.stdout.write(renderProcessState(state) + '\n')
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'history')
  } finally {
    await runtime?.close()
  }
}

export function registerHistoryCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('history [process-id]')
    .description('List recent runs, or show the steps and decisions of one run')
    .option('--limit <n>', 'Number of runs to list', '20')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (processId: string | undefined, opts: { limit: string; outputFormat: string }) => {
      process.exitCode = await runHistoryAction({
        ...(processId !== undefined && { processId }),
        limit: parseInt(opts.limit, 10) || 20,
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })
}
