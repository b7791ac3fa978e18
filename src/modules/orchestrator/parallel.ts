/**
 * Runs independent process runs side by side. Each job owns its own state
 * machine and worktree; the history database is the only shared resource.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import type { ProcessRunOutcome, ProcessRunStateMachine } from './process-run-state-machine.js'

const logger = createLogger('orchestrator:parallel')

export type ParallelRunResult =
  | { processId: string; ok: true; outcome: ProcessRunOutcome }
  | { processId: string; ok: false; error: string }

/**
 * Execute every machine concurrently. One run's rejection is reported in its
 * own slot and never cancels its siblings.
 */
export async function runInParallel(
  machines: readonly ProcessRunStateMachine[],
): Promise<ParallelRunResult[]> {
  const settled = await Promise.allSettled(machines.map((machine) => machine.execute()))

  return settled.map((result, i): ParallelRunResult => {
    const processId = machines[i]?.run.processId ?? `#${String(i)}`
    if (result.status === 'fulfilled') {
      return { processId, ok: true, outcome: result.value }
    }
    const error = errorMessage(result.reason)
    logger.error({ processId, error }, 'Parallel process run failed')
    return { processId, ok: false, error }
  })
}
