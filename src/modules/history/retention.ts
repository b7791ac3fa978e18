/**
 * History retention: delete processes that have been inactive for a number
 * of days. Runs are removed whole, so a resumable run never loses part of
 * its history.
 */

import { ValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { HistoryStore, InactiveProcess } from './history-store.js'

const logger = createLogger('history:retention')

const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_RETENTION_DAYS = 30

export interface PruneOptions {
  olderThanDays: number
  /** Report what would go without deleting anything */
  dryRun?: boolean
  now?: Date
}

export interface PruneReport {
  cutoff: string
  dryRun: boolean
  processes: InactiveProcess[]
  /** Task logs deleted; zero on a dry run */
  deletedTasks: number
}

export function pruneHistory(history: HistoryStore, options: PruneOptions): PruneReport {
  if (!Number.isInteger(options.olderThanDays) || options.olderThanDays < 1) {
    throw new ValidationError(`--older-than must be a whole number of days, got ${String(options.olderThanDays)}`, {
      olderThanDays: options.olderThanDays,
    })
  }
  const now = options.now ?? new Date()
  const cutoff = new Date(now.getTime() - options.olderThanDays * DAY_MS)
  const processes = history.listInactiveProcesses(cutoff)
  const dryRun = options.dryRun ?? false

  let deletedTasks = 0
  if (!dryRun) {
    for (const proc of processes) {
      deletedTasks += history.deleteProcessHistory(proc.processId)
    }
  }

  logger.info(
    { cutoff: cutoff.toISOString(), processes: processes.length, deletedTasks, dryRun },
    dryRun ? 'History prune dry run' : 'History pruned',
  )
  return { cutoff: cutoff.toISOString(), dryRun, processes, deletedTasks }
}
