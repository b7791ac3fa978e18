/**
 * Tests for CommandExecutor
 *
 * Uses vi.mock to simulate child_process.spawn with fake processes
 * (EventEmitter + PassThrough streams) so no real subprocesses are spawned.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { spawn, type ChildProcess } from 'node:child_process'
import type { ExecutionRequest } from '../types.js'
import { createCommandExecutor, expandArgs, extractSessionId, extractUsage } from '../command-executor.js'
import { makeTask } from '../../../../test/helpers/fakes.js'

// ---------------------------------------------------------------------------
// Fake process factory
// ---------------------------------------------------------------------------

interface FakeProcess {
  proc: ChildProcess
  writeStdout: (data: string) => void
  writeStderr: (data: string) => void
  emitClose: (code: number | null) => void
  emitError: (err: Error) => void
}

function createFakeProcess(): FakeProcess {
  const emitter = new EventEmitter()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const proc = Object.assign(emitter, { stdout, stderr, pid: 4242 }) as unknown as ChildProcess

  return {
    proc,
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

/** Let stream data events reach their listeners. */
async function drain(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve))
}

function request(overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
  return {
    taskId: 'task-1',
    processId: 'proc-1',
    task: makeTask('implement'),
    worktree: { path: '/work/repo' },
    prompt: 'Implement the form',
    context: 'Step 2 of 3',
    isOrchestrator: false,
    ...overrides,
  }
}

const executor = createCommandExecutor({
  settings: {
    command: 'agent',
    args: ['--print', '{prompt}', '--system', '{context}', '--model', '{model}'],
    env: { AGENT_MODE: 'batch' },
  },
  databasePath: '/state/history.db',
})

beforeEach(() => {
  current = createFakeProcess()
  vi.mocked(spawn).mockClear()
})

// ---------------------------------------------------------------------------
// CommandExecutor
// ---------------------------------------------------------------------------

describe('CommandExecutor', () => {
  it('spawns the agent in the worktree with its identity in the environment', async () => {
    const pending = executor.run(request({ model: 'sonnet' }))
    current.emitClose(0)
    await pending

    const call = vi.mocked(spawn).mock.calls[0]
    expect(call?.[0]).toBe('agent')
    expect(call?.[1]).toEqual(['--print', 'Implement the form', '--system', 'Step 2 of 3', '--model', 'sonnet'])
    const options = call?.[2]
    expect(options?.cwd).toBe('/work/repo')
    expect(options?.env).toMatchObject({
      AGENT_MODE: 'batch',
      STEPWARDEN_TASK_ID: 'task-1',
      STEPWARDEN_PROCESS_ID: 'proc-1',
      STEPWARDEN_DB: '/state/history.db',
    })
  })

  it('drops the model flag when no model is set', async () => {
    const pending = executor.run(request())
    current.emitClose(0)
    await pending

    expect(vi.mocked(spawn).mock.calls[0]?.[1]).toEqual(['--print', 'Implement the form', '--system', 'Step 2 of 3'])
  })

  it('reports the session id found on stdout', async () => {
    const pending = executor.run(request())
    current.writeStdout('starting\n{"type":"init","session_id":"sess-1')
    current.writeStdout('23"}\n{"type":"result","session_id":"sess-999"}\n')
    await drain()
    current.emitClose(0)

    await expect(pending).resolves.toEqual({ exitCode: 0, sessionId: 'sess-123' })
  })

  it('picks up a session id on a final line without a newline', async () => {
    const pending = executor.run(request())
    current.writeStdout('{"sessionId":"sess-tail"}')
    await drain()
    current.emitClose(0)

    await expect(pending).resolves.toEqual({ exitCode: 0, sessionId: 'sess-tail' })
  })

  it('returns the masked stderr tail on failure', async () => {
    const pending = executor.run(request())
    current.writeStderr('auth failed for sk-ant-REDACTED\n')
    await drain()
    current.emitClose(3)

    await expect(pending).resolves.toEqual({ exitCode: 3, error: 'auth failed for ***' })
  })

  it('describes a failure without stderr by its exit code', async () => {
    const pending = executor.run(request())
    current.emitClose(7)

    await expect(pending).resolves.toEqual({ exitCode: 7, error: 'Process exited with code 7' })
  })

  it('treats a signal exit as exit code 1', async () => {
    const pending = executor.run(request())
    current.emitClose(null)

    await expect(pending).resolves.toEqual({ exitCode: 1, error: 'Process exited with code 1' })
  })

  it('passes the task tool allowlist to the agent', async () => {
    const restricted = createCommandExecutor({
      settings: { command: 'agent', args: ['--allowedTools', '{tools}', '--system', '{context}'], env: {} },
      databasePath: '/state/history.db',
    })
    const pending = restricted.run(request({ task: makeTask('review', { tools: ['load_result', 'write_result'] }) }))
    current.emitClose(0)
    await pending

    expect(vi.mocked(spawn).mock.calls[0]?.[1]).toEqual([
      '--allowedTools',
      'load_result,write_result',
      '--system',
      'Step 2 of 3\nTools for this task: load_result, write_result',
    ])
  })

  it('leaves tools unrestricted for a wildcard allowlist', async () => {
    const restricted = createCommandExecutor({
      settings: { command: 'agent', args: ['--allowedTools', '{tools}', '--system', '{context}'], env: {} },
      databasePath: '/state/history.db',
    })
    const pending = restricted.run(request({ task: makeTask('review', { tools: ['*'] }) }))
    current.emitClose(0)
    await pending

    expect(vi.mocked(spawn).mock.calls[0]?.[1]).toEqual(['--system', 'Step 2 of 3'])
  })

  it('reports cost and token usage from the result line', async () => {
    const pending = executor.run(request())
    current.writeStdout(
      '{"type":"result","session_id":"sess-7","total_cost_usd":0.42,"usage":{"input_tokens":1200,"output_tokens":340}}\n',
    )
    await drain()
    current.emitClose(0)

    await expect(pending).resolves.toEqual({
      exitCode: 0,
      sessionId: 'sess-7',
      usage: { costUsd: 0.42, inputTokens: 1200, outputTokens: 340 },
    })
  })

  it('resolves with -1 when the binary cannot be spawned', async () => {
    const pending = executor.run(request())
    current.emitError(new Error('spawn agent ENOENT'))
    current.emitClose(-2)

    await expect(pending).resolves.toEqual({ exitCode: -1, error: 'Failed to spawn agent: spawn agent ENOENT' })
  })
})

// ---------------------------------------------------------------------------
// expandArgs
// ---------------------------------------------------------------------------

describe('expandArgs', () => {
  const none = {
    prompt: undefined,
    context: undefined,
    model: undefined,
    engine: undefined,
    image: undefined,
    tools: undefined,
  }

  it('keeps literal arguments', () => {
    expect(expandArgs(['--json', 'run'], none)).toEqual(['--json', 'run'])
  })

  it('substitutes every placeholder inside one argument', () => {
    expect(expandArgs(['{engine}/{model}'], { ...none, engine: 'claude', model: 'opus' })).toEqual(['claude/opus'])
  })

  it('keeps an argument when at least one placeholder resolves', () => {
    expect(expandArgs(['{engine}:{model}'], { ...none, engine: 'claude' })).toEqual(['claude:'])
  })

  it('drops an unresolved argument and the flag before it', () => {
    expect(expandArgs(['--image', '{image}', '-p', '{prompt}'], { ...none, prompt: 'go' })).toEqual(['-p', 'go'])
  })

  it('drops an unresolved positional argument alone', () => {
    expect(expandArgs(['exec', '{prompt}'], { ...none, prompt: '' })).toEqual(['exec'])
  })
})

// ---------------------------------------------------------------------------
// extractSessionId
// ---------------------------------------------------------------------------

describe('extractSessionId', () => {
  it('reads session_id and sessionId keys', () => {
    expect(extractSessionId('{"session_id":"a"}')).toBe('a')
    expect(extractSessionId('  {"sessionId":"b"}  ')).toBe('b')
  })

  it('ignores plain text, malformed JSON and empty ids', () => {
    expect(extractSessionId('session_id: a')).toBeUndefined()
    expect(extractSessionId('{"session_id":')).toBeUndefined()
    expect(extractSessionId('{"session_id":""}')).toBeUndefined()
    expect(extractSessionId('{"session_id":42}')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// extractUsage
// ---------------------------------------------------------------------------

describe('extractUsage', () => {
  it('keeps the fields that are present', () => {
    expect(extractUsage('{"type":"result","total_cost_usd":1.5}')).toEqual({ costUsd: 1.5 })
  })

  it('ignores lines that are not result reports', () => {
    expect(extractUsage('{"type":"assistant","usage":{"input_tokens":5}}')).toBeUndefined()
    expect(extractUsage('{"type":"result","total_cost_usd":"free"}')).toBeUndefined()
    expect(extractUsage('done')).toBeUndefined()
  })
})
