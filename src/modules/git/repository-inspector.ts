/**
 * Read-only repository inspection for supervisor tools: diff and commit log
 * of a worktree since a reference. Uses child_process.spawn to run git.
 */

import { spawn } from 'node:child_process'
import { GitError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git:inspector')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CommitEntry {
  hash: string
  message: string
}

export interface RepositoryInspector {
  /** Commit hash HEAD points at */
  headCommit(worktree: string): Promise<string>
  /** Diff of the working tree (committed and uncommitted changes) since `sinceCommit` */
  diff(worktree: string, sinceCommit: string): Promise<string>
  /** Commits reachable from HEAD but not from `sinceCommit`, newest first */
  commitLog(worktree: string, sinceCommit: string): Promise<CommitEntry[]>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Run git and resolve with its stdout.
 * @throws {GitError} when git cannot be spawned or exits non-zero
 */
export function runGitCommand(args: string[], cwd: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    let stdout = ''
    let stderr = ''

    const proc = spawn('git', args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf-8')
    })
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf-8')
    })

    proc.on('error', (err: Error) => {
      reject(new GitError(`Failed to spawn git: ${err.message}`, { args, cwd }))
    })

    proc.on('close', (code: number | null) => {
      if (code !== 0) {
        logger.debug({ args, cwd, code, stderr: stderr.trim() }, 'git exited non-zero')
        reject(
          new GitError(stderr.trim() || `git ${args[0] ?? ''} exited with code ${String(code)}`, {
            args,
            cwd,
            code,
          }),
        )
        return
      }
      resolve(stdout)
    })
  })
}

/** Parse `git log --format="%H %s"` output. */
export function parseCommitLog(output: string): CommitEntry[] {
  const entries: CommitEntry[] = []
  for (const line of output.split('\n')) {
    const trimmed = line.trim()
    if (trimmed === '') continue
    const space = trimmed.indexOf(' ')
    if (space === -1) {
      entries.push({ hash: trimmed, message: '' })
    } else {
      entries.push({ hash: trimmed.slice(0, space), message: trimmed.slice(space + 1) })
    }
  }
  return entries
}

// ---------------------------------------------------------------------------
// GitRepositoryInspector
// ---------------------------------------------------------------------------

/**
 * Resolve a reference to the commit hash it names. References are checked
 * before they reach a git argument list, so an option-like value is never
 * passed through.
 * @throws {GitError} when the reference is not a commit
 */
export async function resolveCommit(worktree: string, ref: string): Promise<string> {
  if (ref === '' || ref.startsWith('-') || /\s/.test(ref)) {
    throw new GitError(`Not a commit reference: ${ref}`, { ref })
  }
  try {
    return (await runGitCommand(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], worktree)).trim()
  } catch (err) {
    if (err instanceof GitError) {
      throw new GitError(`Unknown commit: ${ref}`, { ref, cwd: worktree })
    }
    throw err
  }
}

export class GitRepositoryInspector implements RepositoryInspector {
  async headCommit(worktree: string): Promise<string> {
    return (await runGitCommand(['rev-parse', 'HEAD'], worktree)).trim()
  }

  async diff(worktree: string, sinceCommit: string): Promise<string> {
    const base = await resolveCommit(worktree, sinceCommit)
    return runGitCommand(['diff', base, '--'], worktree)
  }

  async commitLog(worktree: string, sinceCommit: string): Promise<CommitEntry[]> {
    const base = await resolveCommit(worktree, sinceCommit)
    const output = await runGitCommand(['log', '--format=%H %s', `${base}..HEAD`, '--'], worktree)
    return parseCommitLog(output)
  }
}

export function createRepositoryInspector(): RepositoryInspector {
  return new GitRepositoryInspector()
}
