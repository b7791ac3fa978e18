/**
 * Worktree references for process runs.
 *
 * Creating and removing worktrees is left to the user (or their tooling);
 * the orchestrator only needs to know where a run operates. The default
 * provider describes the worktree the CLI was started in.
 */

import { dirname, resolve } from 'node:path'
import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { WorktreeRef } from '../process/types.js'
import { runGitCommand } from './repository-inspector.js'

const logger = createLogger('git:worktree')

export interface WorktreeProvider {
  /** Describe the worktree a new run should operate in. */
  acquire(): Promise<WorktreeRef>
}

/**
 * Describes the git worktree containing `cwd`. Outside a repository the
 * reference is just the directory.
 */
export class CurrentWorktreeProvider implements WorktreeProvider {
  constructor(private readonly _cwd: string = process.cwd()) {}

  async acquire(): Promise<WorktreeRef> {
    const cwd = resolve(this._cwd)
    try {
      const top = (await runGitCommand(['rev-parse', '--show-toplevel'], cwd)).trim()
      const branch = (await runGitCommand(['rev-parse', '--abbrev-ref', 'HEAD'], cwd)).trim()
      const commonDir = (await runGitCommand(['rev-parse', '--git-common-dir'], cwd)).trim()
      return {
        path: top,
        branch: branch !== 'HEAD' ? branch : undefined,
        // --git-common-dir is relative to cwd in the main worktree, absolute in linked ones
        mainRepo: dirname(resolve(cwd, commonDir)),
      }
    } catch (err) {
      if (!(err instanceof GitError)) throw err
      logger.debug({ cwd, error: err.message }, 'Not inside a git worktree; using the directory as-is')
      return { path: cwd }
    }
  }
}
