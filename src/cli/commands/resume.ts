/**
 * `stepwarden resume` command
 *
 * Continues an interrupted or aborted run from its first unexecuted step.
 * The run is found through any task that belonged to it.
 *
 * Usage:
 *   stepwarden resume <task-id>
 *   stepwarden resume <branch> --by branch
 *   stepwarden resume <session-id> --by session_id
 *
 * Exit codes:
 *   0 - the run completed
 *   1 - the run aborted again, or an unexpected error
 *   2 - no matching task, or the run cannot be resumed
 */

import type { Command } from 'commander'
import {
  createResumptionResolver,
  RESUME_KEY_KINDS,
  type ResumeKeyKind,
} from '../../modules/resumption/resumption-resolver.js'
import { runInParallel } from '../../modules/orchestrator/parallel.js'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import { EXIT_USAGE, parseOutputFormat, reportError, type OutputFormat } from '../utils/command-helpers.js'
import { reportOutcomes, withProgress } from './run.js'

export interface ResumeActionOptions {
  key: string
  by: string
  outputFormat: OutputFormat
  runtime: RuntimeOptions
}

function isKeyKind(value: string): value is ResumeKeyKind {
  return RESUME_KEY_KINDS.some((kind) => kind === value)
}

export async function runResumeAction(options: ResumeActionOptions): Promise<number> {
  const kind = options.by
  if (!isKeyKind(kind)) {
    process.stderr.write(`Error: --by must be one of ${RESUME_KEY_KINDS.join(', ')}\n`)
    return EXIT_USAGE
  }

  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const run = createResumptionResolver(runtime.history).resolve(options.key, kind)
    const detach = withProgress(runtime, options.outputFormat)
    try {
      return reportOutcomes(await runInParallel([runtime.stateMachineFor(run)]), options.outputFormat)
    } finally {
      detach()
    }
  } catch (err) {
    return reportError(err, 'resume')
  } finally {
    await runtime?.close()
  }
}

export function registerResumeCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('resume <key>')
    .description('Resume an interrupted run, found by task id, branch or session id')
    .option('--by <kind>', `Key kind: ${RESUME_KEY_KINDS.join(' | ')}`, 'task_id')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (key: string, opts: { by: string; outputFormat: string }) => {
      process.exitCode = await runResumeAction({
        key,
        by: opts.by,
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })
}
