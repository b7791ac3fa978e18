/**
 * `stepwarden continue` command
 *
 * Starts a follow-up run in the same worktree as an earlier one, linked to
 * it as its parent.
 *
 * Usage:
 *   stepwarden continue <task-id> --prompt "address review comments"
 *   stepwarden continue <task-id> --prompt "..." --process fixup
 */

import type { Command } from 'commander'
import { createResumptionResolver } from '../../modules/resumption/resumption-resolver.js'
import { runInParallel } from '../../modules/orchestrator/parallel.js'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import { EXIT_USAGE, parseOutputFormat, reportError, type OutputFormat } from '../utils/command-helpers.js'
import { reportOutcomes, withProgress } from './run.js'

export interface ContinueActionOptions {
  taskId: string
  prompt: string
  /** Process to run instead of the parent's */
  process?: string
  outputFormat: OutputFormat
  runtime: RuntimeOptions
}

export async function runContinueAction(options: ContinueActionOptions): Promise<number> {
  if (options.prompt.trim() === '') {
    process.stderr.write('Error: --prompt must not be empty\n')
    return EXIT_USAGE
  }

  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const spec = options.process !== undefined ? await runtime.processes.load(options.process) : undefined
    const run = createResumptionResolver(runtime.history).continueFrom(
      options.taskId,
      options.prompt,
      spec !== undefined ? { spec } : {},
    )
    const detach = withProgress(runtime, options.outputFormat)
    try {
      return reportOutcomes(await runInParallel([runtime.stateMachineFor(run)]), options.outputFormat)
    } finally {
      detach()
    }
  } catch (err) {
    return reportError(err, 'continue')
  } finally {
    await runtime?.close()
  }
}

export function registerContinueCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('continue <task-id>')
    .description('Start a follow-up run in the worktree of an earlier run')
    .requiredOption('-p, --prompt <text>', 'Request for the follow-up run')
    .option('--process <name>', 'Process to run instead of the parent run\'s')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (taskId: string, opts: { prompt: string; process?: string; outputFormat: string }) => {
      process.exitCode = await runContinueAction({
        taskId,
        prompt: opts.prompt,
        ...(opts.process !== undefined && { process: opts.process }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })
}
