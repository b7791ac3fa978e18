/**
 * Tests for CommandSummarizer
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { spawn, type ChildProcess } from 'node:child_process'
import { SummarizerError } from '../../../core/errors.js'
import { CommandSummarizer, SUMMARY_PROMPT, createSummarizer } from '../command-summarizer.js'

interface FakeProcess {
  proc: ChildProcess
  stdin: PassThrough
  kill: ReturnType<typeof vi.fn>
  writeStdout: (data: string) => void
  writeStderr: (data: string) => void
  emitClose: (code: number | null) => void
  emitError: (err: Error) => void
}

function createFakeProcess(): FakeProcess {
  const emitter = new EventEmitter()
  const stdin = new PassThrough()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const kill = vi.fn()
  const proc = Object.assign(emitter, { stdin, stdout, stderr, kill, pid: 5151 }) as unknown as ChildProcess

  return {
    proc,
    stdin,
    kill,
    writeStdout: (data) => stdout.push(data),
    writeStderr: (data) => stderr.push(data),
    emitClose: (code) => emitter.emit('close', code),
    emitError: (err) => emitter.emit('error', err),
  }
}

let current: FakeProcess

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => current.proc),
}))

async function drain(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve))
}

const settings = { enabled: true, model: 'haiku', timeout_ms: 5_000 }

beforeEach(() => {
  current = createFakeProcess()
  vi.mocked(spawn).mockClear()
})

afterEach(() => {
  vi.useRealTimers()
})

describe('CommandSummarizer', () => {
  it('pipes the result to the agent and returns its trimmed output', async () => {
    const summarizer = new CommandSummarizer({ settings, defaultCommand: 'agent' })
    let piped = ''
    current.stdin.on('data', (chunk: Buffer) => {
      piped += chunk.toString('utf-8')
    })

    const pending = summarizer.summarize('Long result text')
    await drain()
    current.writeStdout('  Added the login form.\n')
    await drain()
    current.emitClose(0)

    await expect(pending).resolves.toBe('Added the login form.')
    expect(piped).toBe('Long result text')
    expect(spawn).toHaveBeenCalledWith(
      'agent',
      ['--print', '--model', 'haiku', '--system-prompt', SUMMARY_PROMPT],
      { stdio: ['pipe', 'pipe', 'pipe'] },
    )
  })

  it('prefers its own command over the executor command', async () => {
    const summarizer = new CommandSummarizer({
      settings: { ...settings, command: 'summarize-cli' },
      defaultCommand: 'agent',
    })
    const pending = summarizer.summarize('text')
    current.writeStdout('ok')
    await drain()
    current.emitClose(0)

    await expect(pending).resolves.toBe('ok')
    expect(vi.mocked(spawn).mock.calls[0]?.[0]).toBe('summarize-cli')
  })

  it('rejects with the stderr tail on a non-zero exit', async () => {
    const summarizer = new CommandSummarizer({ settings, defaultCommand: 'agent' })
    const pending = summarizer.summarize('text')
    current.writeStderr('rate limited\n')
    await drain()
    current.emitClose(2)

    await expect(pending).rejects.toThrow(new SummarizerError('Summarizer failed: rate limited'))
  })

  it('rejects when the agent prints nothing', async () => {
    const summarizer = new CommandSummarizer({ settings, defaultCommand: 'agent' })
    const pending = summarizer.summarize('text')
    current.emitClose(0)

    await expect(pending).rejects.toThrow('Summarizer produced no output')
  })

  it('rejects when the command cannot be started', async () => {
    const summarizer = new CommandSummarizer({ settings, defaultCommand: 'agent' })
    const pending = summarizer.summarize('text')
    current.emitError(new Error('spawn agent ENOENT'))

    await expect(pending).rejects.toThrow('Failed to spawn agent: spawn agent ENOENT')
  })

  it('kills the agent once the timeout passes', async () => {
    vi.useFakeTimers()
    const summarizer = new CommandSummarizer({ settings, defaultCommand: 'agent' })
    const pending = summarizer.summarize('text')
    const outcome = expect(pending).rejects.toThrow('Summarizer timed out after 5000ms')

    vi.advanceTimersByTime(5_000)
    await outcome
    expect(current.kill).toHaveBeenCalledWith('SIGTERM')
  })
})

describe('createSummarizer', () => {
  it('returns nothing when summaries are disabled', () => {
    expect(createSummarizer({ settings: { ...settings, enabled: false }, defaultCommand: 'agent' })).toBeUndefined()
  })
})
