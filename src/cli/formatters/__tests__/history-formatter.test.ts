/**
 * Unit tests for the `stepwarden history` text rendering.
 */

import { describe, it, expect } from 'vitest'
import { renderProcessState, renderRunList } from '../history-formatter.js'
import type { ProcessRunSnapshot, ProcessState } from '../../../modules/history/history-store.js'

function snapshot(overrides: Partial<ProcessRunSnapshot> = {}): ProcessRunSnapshot {
  return {
    processId: 'a1b2c3d4',
    spec: { name: 'feature', steps: [] },
    steps: [
      { task: 'plan', skipOrchestrator: false },
      { task: 'implement', skipOrchestrator: false },
    ],
    currentIndex: 1,
    status: 'running',
    injectionCounts: {},
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:05:00.000Z',
    ...overrides,
  }
}

describe('renderRunList', () => {
  it('says so when nothing is recorded', () => {
    expect(renderRunList([])).toBe('No process runs recorded.')
  })

  it('renders one row per run under a header', () => {
    const lines = renderRunList([snapshot()]).split('\n')

    expect(lines).toHaveLength(2)
    expect(lines[0]).toBe('PROCESS ID  NAME                 STATUS     STEP     UPDATED')
    expect(lines[1]).toBe('a1b2c3d4    feature              running    1/2      2026-01-01T00:05:00.000Z')
  })
})

describe('renderProcessState', () => {
  const state: ProcessState = {
    process_id: 'a1b2c3d4',
    process_name: 'feature',
    status: 'aborted',
    abort_reason: 'Step 1 (implement) failed with exit code 1',
    current_index: 1,
    total_steps: 3,
    completed_steps: [
      { step_index: 0, task_name: 'plan', task_id: 't-plan', success: true, exit_code: 0, duration_ms: 1500 },
    ],
    pending_steps: [
      { step_index: 1, task: 'implement' },
      { step_index: 2, task: 'lint', origin_step_index: 1 },
    ],
    orchestrator_decisions: [
      {
        phase: 'pre_step',
        step_index: 1,
        decision: 'inject',
        reasoning: 'needs lint',
        injected_steps: [{ task: 'lint' }],
        task_id: 't-pre',
        created_at: '2026-01-01T00:01:00.000Z',
      },
    ],
  }

  it('renders status, completed and pending steps, and decisions', () => {
    expect(renderProcessState(state)).toBe(
      [
        'Process feature (a1b2c3d4)',
        'Status: aborted (Step 1 (implement) failed with exit code 1)',
        'Progress: 1/3',
        '',
        'Completed:',
        '  1. plan [t-plan] in 1.5s',
        '',
        'Pending:',
        '  2. implement',
        '  3. lint [injected]',
        '',
        'Decisions:',
        '  pre_step @1: inject (lint) - needs lint',
      ].join('\n'),
    )
  })

  it('omits empty sections', () => {
    const bare: ProcessState = {
      ...state,
      status: 'running',
      completed_steps: [],
      pending_steps: [],
      orchestrator_decisions: [],
    }
    delete bare.abort_reason

    expect(renderProcessState(bare)).toBe('Process feature (a1b2c3d4)\nStatus: running\nProgress: 1/3')
  })
})
