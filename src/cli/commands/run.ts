/**
 * `stepwarden run` command
 *
 * Starts one or more supervised runs of a process definition.
 *
 * Usage:
 *   stepwarden run <process>                      Run a named process
 *   stepwarden run path/to/process.yaml           Run a definition file
 *   stepwarden run <process> --prompt "..."       Pass a request to every step
 *   stepwarden run <process> --parallel 3         Three independent runs
 *
 * Exit codes:
 *   0 - every run completed
 *   1 - a run aborted, or an unexpected error
 *   2 - unknown process or invalid configuration
 */

import type { Command } from 'commander'
import { generateShortId } from '../../utils/helpers.js'
import { createProcessRun } from '../../modules/process/types.js'
import { runInParallel, type ParallelRunResult } from '../../modules/orchestrator/parallel.js'
import type { ProcessRunStateMachine } from '../../modules/orchestrator/process-run-state-machine.js'
import { attachProgressReporter } from '../formatters/progress-formatter.js'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE,
  parseOutputFormat,
  reportError,
  writeJson,
  type OutputFormat,
} from '../utils/command-helpers.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  process: string
  prompt?: string
  parallel: number
  outputFormat: OutputFormat
  runtime: RuntimeOptions
}

// ---------------------------------------------------------------------------
// Shared with resume and continue
// ---------------------------------------------------------------------------

/** Render parallel outcomes and turn them into an exit code. */
export function reportOutcomes(results: ParallelRunResult[], outputFormat: OutputFormat): number {
  if (outputFormat === 'json') {
    writeJson(
      results.map((r) =>
        r.ok
          ? {
              process_id: r.processId,
              status: r.outcome.status,
              ...(r.outcome.abortReason !== undefined && { abort_reason: r.outcome.abortReason }),
              ...(r.outcome.finalizeWarning !== undefined && { finalize_warning: r.outcome.finalizeWarning }),
              completed_steps: r.outcome.results.length,
            }
          : { process_id: r.processId, status: 'error', error: r.error },
      ),
    )
  } else {
    for (const r of results) {
      if (!r.ok) process.stderr.write(`Error in ${r.processId}: ${r.error}\n`)
    }
  }
  return results.every((r) => r.ok && r.outcome.status === 'completed') ? EXIT_SUCCESS : EXIT_ERROR
}

/** Attach human progress output when requested. */
export function withProgress(runtime: Runtime, outputFormat: OutputFormat): () => void {
  if (outputFormat !== 'human') return () => undefined
  return attachProgressReporter(runtime.eventBus, (line) => process.stdout.write(line + '\n'))
}

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

export async function runRunAction(options: RunActionOptions): Promise<number> {
  if (!Number.isInteger(options.parallel) || options.parallel < 1) {
    process.stderr.write('Error: --parallel must be a positive integer\n')
    return EXIT_USAGE
  }

  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const spec = await runtime.processes.load(options.process)

    const machines: ProcessRunStateMachine[] = []
    for (let i = 0; i < options.parallel; i++) {
      const run = createProcessRun({
        processId: generateShortId(),
        spec,
        worktree: await runtime.worktrees.acquire(),
        ...(options.prompt !== undefined && { userPrompt: options.prompt }),
      })
      machines.push(runtime.stateMachineFor(run))
    }

    const detach = withProgress(runtime, options.outputFormat)
    try {
      return reportOutcomes(await runInParallel(machines), options.outputFormat)
    } finally {
      detach()
    }
  } catch (err) {
    return reportError(err, 'run')
  } finally {
    await runtime?.close()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('run <process>')
    .description('Run a process definition under supervision')
    .option('-p, --prompt <text>', 'Request handed to every step of the run')
    .option('--parallel <n>', 'Number of independent runs to start', '1')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (processName: string, opts: { prompt?: string; parallel: string; outputFormat: string }) => {
      process.exitCode = await runRunAction({
        process: processName,
        ...(opts.prompt !== undefined && { prompt: opts.prompt }),
        parallel: parseInt(opts.parallel, 10),
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })
}
