/**
 * Tests for ToolScopeGate and the built-in tool catalogue.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ScopeViolationError, SummarizerError, ValidationError } from '../../../core/errors.js'
import { createProcessRun } from '../../process/types.js'
import type { HistoryStore } from '../../history/history-store.js'
import type { RepositoryInspector } from '../../git/repository-inspector.js'
import type { TemplateRegistry } from '../../templates/types.js'
import { createToolScopeGate, type ToolScopeGate } from '../tool-scope-gate.js'
import { truncateDiff } from '../tools.js'
import { fakeInspector, openTestHistory, registryWith, spec, step } from '../../../../test/helpers/fakes.js'

const SHARED = [
  'write_result',
  'load_result',
  'read_result_summary',
  'list_results',
  'write_artifact',
  'load_artifact',
  'list_artifacts',
  'list_artifact_templates',
  'load_artifact_template',
  'write_knowledge',
  'get_knowledge',
  'view_knowledge_history',
]

const templates: TemplateRegistry = {
  getByName: (name) =>
    name === 'design-doc'
      ? { name, description: 'Design', format: 'markdown', tags: ['design'], content: '# Title\n', source: '/t/design-doc' }
      : undefined,
  list: () => [
    { name: 'design-doc', description: 'Design', format: 'markdown', tags: ['design'], content: '# Title\n', source: '/t/design-doc' },
  ],
}

let history: HistoryStore
let inspector: RepositoryInspector
let gate: ToolScopeGate

function seed(): void {
  const run = createProcessRun({
    processId: 'proc-1',
    spec: spec('feature', [step('plan'), step('implement'), step('review')]),
    worktree: { path: '/work/repo', branch: 'feature/tools' },
    baseCommit: 'base123',
  })
  run.currentIndex = 1
  history.saveProcessRun(run)

  history.appendTaskLog({ task_id: 'w1', process_id: 'proc-1', task_name: 'plan', step_index: 0 })
  history.appendTaskLog({
    task_id: 'sup-pre',
    process_id: 'proc-1',
    task_name: 'orchestrator-pre',
    is_orchestrator: true,
    orchestrator_phase: 'pre_step',
    step_index: 1,
  })
  history.appendTaskLog({
    task_id: 'sup-post',
    process_id: 'proc-1',
    task_name: 'orchestrator-post',
    is_orchestrator: true,
    orchestrator_phase: 'post_step',
    step_index: 0,
  })
  history.appendTaskLog({
    task_id: 'sup-fin',
    process_id: 'proc-1',
    task_name: 'orchestrator-finalize',
    is_orchestrator: true,
    orchestrator_phase: 'finalize',
    step_index: 3,
  })
}

beforeEach(() => {
  history = openTestHistory().history
  inspector = fakeInspector({
    diff: 'diff --git a/login.ts b/login.ts',
    commits: [{ hash: 'c1', message: 'Add login form' }],
  })
  gate = createToolScopeGate({ history, registry: registryWith('plan', 'implement', 'review', 'lint'), inspector })
  seed()
})

describe('ToolScopeGate', () => {
  // -------------------------------------------------------------------------
  describe('listTools', () => {
    it('shows only shared tools to an unidentified caller', () => {
      expect(gate.listTools(undefined).map((t) => t.name)).toEqual(SHARED)
    })

    it('shows only shared tools to a worker', () => {
      expect(gate.listTools('w1').map((t) => t.name)).toEqual(SHARED)
    })

    it('shows every tool to a supervisor', () => {
      expect(gate.listTools('sup-pre').map((t) => t.name)).toEqual([
        ...SHARED,
        'get_process_state',
        'set_process_decision',
        'inject_steps',
        'get_git_diff',
        'get_commit_log',
      ])
    })

    it('re-reads the identity on every listing', () => {
      expect(gate.isOrchestrator('late')).toBe(false)
      history.appendTaskLog({ task_id: 'late', process_id: 'proc-1', task_name: 'orchestrator-pre', is_orchestrator: true })
      expect(gate.isOrchestrator('late')).toBe(true)
    })
  })

  // -------------------------------------------------------------------------
  describe('scope enforcement', () => {
    it('rejects an orchestrator tool called by a worker and records nothing', async () => {
      const call = gate.callTool('w1', 'set_process_decision', { decision: 'abort', reasoning: 'stop' })

      await expect(call).rejects.toBeInstanceOf(ScopeViolationError)
      await expect(call).rejects.toThrow('Tool "set_process_decision" is only available to orchestrator tasks')
      expect(history.readDecisions('proc-1')).toEqual([])
    })

    it('rejects an orchestrator tool called without an identity', async () => {
      await expect(gate.callTool(undefined, 'get_process_state', {})).rejects.toBeInstanceOf(ScopeViolationError)
    })

    it('rejects an orchestrator tool called with an unknown task id', async () => {
      await expect(gate.callTool('ghost', 'get_git_diff', {})).rejects.toBeInstanceOf(ScopeViolationError)
    })

    it('rejects an unknown tool', async () => {
      await expect(gate.callTool('sup-pre', 'rm_rf', {})).rejects.toThrow('Unknown tool: rm_rf')
    })
  })

  // -------------------------------------------------------------------------
  describe('shared tools', () => {
    it('writes and loads a result by task name', async () => {
      await expect(
        gate.callTool('w1', 'write_result', { result: 'Plan ready', key_files: ['PLAN.md'] }),
      ).resolves.toMatchObject({ stored: true, task_id: 'w1' })

      await expect(gate.callTool('sup-pre', 'load_result', { task_name: 'plan' })).resolves.toMatchObject({
        task_id: 'w1',
        result: 'Plan ready',
        key_files: ['PLAN.md'],
        tags: [],
      })
    })

    it('loads a result by task id', async () => {
      await gate.callTool('w1', 'write_result', { result: 'Plan ready' })
      await expect(gate.callTool(undefined, 'load_result', { task_id: 'w1' })).resolves.toMatchObject({
        result: 'Plan ready',
      })
    })

    it('fails to load a result that does not exist', async () => {
      await expect(gate.callTool('w1', 'load_result', { task_name: 'review' })).rejects.toThrow(
        'No result found for review',
      )
    })

    it('requires a registered caller to write a result', async () => {
      await expect(gate.callTool(undefined, 'write_result', { result: 'x' })).rejects.toThrow(
        'write_result requires a caller registered in task_log',
      )
    })

    it('rejects malformed arguments before running the tool', async () => {
      const call = gate.callTool('w1', 'write_result', { key_files: [] })
      await expect(call).rejects.toBeInstanceOf(ValidationError)
      await expect(call).rejects.toThrow('Invalid arguments for write_result: result: Required')
    })

    it('rejects a load without task_id or task_name', async () => {
      await expect(gate.callTool('w1', 'load_result', {})).rejects.toThrow(
        'Invalid arguments for load_result: either task_id or task_name is required',
      )
    })

    it('lists every result of the process to a supervisor', async () => {
      await gate.callTool('w1', 'write_result', { result: 'Plan ready' })
      await gate.callTool('sup-post', 'write_result', { result: 'Plan looks complete', tags: ['review'] })

      await expect(gate.callTool('sup-pre', 'list_results', {})).resolves.toEqual([
        {
          task_id: 'w1',
          is_orchestrator: false,
          task_name: 'plan',
          result: 'Plan ready',
          summary: null,
          key_files: [],
          tags: [],
        },
        {
          task_id: 'sup-post',
          is_orchestrator: true,
          task_name: 'orchestrator-post',
          result: 'Plan looks complete',
          summary: null,
          key_files: [],
          tags: ['review'],
        },
      ])
    })

    it('lists only worker results to a worker, without task ids', async () => {
      await gate.callTool('w1', 'write_result', { result: 'Plan ready' })
      await gate.callTool('sup-post', 'write_result', { result: 'Plan looks complete' })

      await expect(gate.callTool('w1', 'list_results', {})).resolves.toEqual([
        { task_name: 'plan', result: 'Plan ready', summary: null, key_files: [], tags: [] },
      ])
    })

    it('hides supervisor results from workers and unknown callers', async () => {
      await gate.callTool('sup-post', 'write_result', { result: 'Plan looks complete' })

      await expect(gate.callTool('w1', 'load_result', { task_id: 'sup-post' })).rejects.toThrow(
        'No result found for sup-post',
      )
      await expect(gate.callTool('w1', 'load_result', { task_name: 'orchestrator-post' })).rejects.toThrow(
        'No result found for orchestrator-post',
      )
      await expect(gate.callTool(undefined, 'load_result', { task_id: 'sup-post' })).rejects.toThrow(
        'No result found for sup-post',
      )
      await expect(gate.callTool('sup-fin', 'load_result', { task_id: 'sup-post' })).resolves.toMatchObject({
        result: 'Plan looks complete',
      })
    })

    it('skips the summary when the server has no summarizer', async () => {
      await expect(gate.callTool('w1', 'write_result', { result: 'Plan ready' })).resolves.toMatchObject({
        summary_preview: 'Compression skipped',
      })
      await expect(gate.callTool('sup-pre', 'read_result_summary', { task_name: 'plan' })).rejects.toThrow(
        'No summary available for plan; use load_result for the full text',
      )
    })
  })

  // -------------------------------------------------------------------------
  describe('result summaries', () => {
    it('stores the summary of a written result and reads it back', async () => {
      const summarize = vi.fn((text: string) => Promise.resolve(`TLDR ${text}`))
      const summarizing = createToolScopeGate({ history, registry: registryWith('plan'), summarizer: { summarize } })

      await expect(
        summarizing.callTool('w1', 'write_result', { result: 'Plan ready', key_files: ['PLAN.md'] }),
      ).resolves.toMatchObject({ stored: true, summary_preview: 'TLDR Plan ready' })
      expect(summarize).toHaveBeenCalledWith('Plan ready')

      await expect(summarizing.callTool('w1', 'read_result_summary', { task_name: 'plan' })).resolves.toMatchObject({
        task_id: 'w1',
        summary: 'TLDR Plan ready',
        key_files: ['PLAN.md'],
      })
    })

    it('cuts the preview to 200 characters', async () => {
      const summarizing = createToolScopeGate({
        history,
        registry: registryWith('plan'),
        summarizer: { summarize: () => Promise.resolve('x'.repeat(250)) },
      })

      const response = await summarizing.callTool('w1', 'write_result', { result: 'Plan ready' })
      expect(response).toMatchObject({ summary_preview: 'x'.repeat(200) })
    })

    it('keeps the result when summarizing fails', async () => {
      const failing = createToolScopeGate({
        history,
        registry: registryWith('plan'),
        summarizer: { summarize: () => Promise.reject(new SummarizerError('Summarizer timed out after 60000ms')) },
      })

      await expect(failing.callTool('w1', 'write_result', { result: 'Plan ready' })).resolves.toMatchObject({
        stored: true,
        summary_preview: 'Compression skipped',
      })
      expect(history.getResult('w1')?.resultText).toBe('Plan ready')
      expect(history.getResult('w1')?.summary).toBeUndefined()
    })
  })

  // -------------------------------------------------------------------------
  describe('artifact tools', () => {
    it('writes, lists and loads an artifact', async () => {
      const written = await gate.callTool('w1', 'write_artifact', {
        title: 'Login design',
        content: '# Login',
        format: 'markdown',
        template_name: 'design-doc',
        tags: ['auth'],
      })
      expect(written).toMatchObject({ stored: true, title: 'Login design', format: 'markdown' })
      const id = history.listArtifactsForTask('w1')[0]?.id ?? ''

      await expect(gate.callTool('w1', 'list_artifacts', {})).resolves.toEqual([
        {
          artifact_id: id,
          title: 'Login design',
          format: 'markdown',
          template_name: 'design-doc',
          tags: ['auth'],
          task_name: 'plan',
          created_at: expect.any(String),
        },
      ])
      await expect(gate.callTool('sup-pre', 'load_artifact', { artifact_id: id })).resolves.toMatchObject({
        artifact_id: id,
        task_id: 'w1',
        is_orchestrator: false,
        content: '# Login',
      })
    })

    it('rejects JSON artifacts that do not parse', async () => {
      await expect(
        gate.callTool('w1', 'write_artifact', { title: 'Contract', content: '{nope', format: 'json' }),
      ).rejects.toThrow('Invalid artifact: content is not valid JSON')
    })

    it('rejects an unknown format before writing', async () => {
      await expect(
        gate.callTool('w1', 'write_artifact', { title: 'Slides', content: 'x', format: 'pdf' }),
      ).rejects.toBeInstanceOf(ValidationError)
      expect(history.listArtifactsForProcess('proc-1')).toEqual([])
    })

    it('hides supervisor artifacts from workers', async () => {
      await gate.callTool('sup-post', 'write_artifact', { title: 'Review notes', content: 'ok', format: 'text' })
      const id = history.listArtifactsForTask('sup-post')[0]?.id ?? ''

      await expect(gate.callTool('w1', 'list_artifacts', {})).resolves.toEqual([])
      await expect(gate.callTool('w1', 'list_artifacts', { task_id: 'sup-post' })).resolves.toEqual([])
      await expect(gate.callTool('w1', 'load_artifact', { artifact_id: id })).rejects.toThrow(
        `No artifact found for ${id}`,
      )
      await expect(gate.callTool('sup-pre', 'list_artifacts', {})).resolves.toHaveLength(1)
    })

    it('lists and loads templates', async () => {
      const withTemplates = createToolScopeGate({ history, registry: registryWith(), templates })

      await expect(withTemplates.callTool('w1', 'list_artifact_templates', {})).resolves.toEqual([
        { name: 'design-doc', description: 'Design', format: 'markdown', tags: ['design'] },
      ])
      await expect(
        withTemplates.callTool('w1', 'load_artifact_template', { template_name: 'design-doc' }),
      ).resolves.toEqual({ name: 'design-doc', description: 'Design', format: 'markdown', tags: ['design'], content: '# Title\n' })
      await expect(
        withTemplates.callTool('w1', 'load_artifact_template', { template_name: 'prd' }),
      ).rejects.toThrow('Unknown template: prd. Available: design-doc')
    })

    it('fails when the server has no templates', async () => {
      await expect(gate.callTool('w1', 'list_artifact_templates', {})).rejects.toThrow(
        'Artifact templates are not available in this server',
      )
    })
  })

  // -------------------------------------------------------------------------
  describe('knowledge tools', () => {
    it('versions every write of a key', async () => {
      await expect(
        gate.callTool('w1', 'write_knowledge', { key: 'api-design', content: 'REST', reason: 'first draft' }),
      ).resolves.toMatchObject({ stored: true, key: 'api-design', version: 1 })
      await expect(
        gate.callTool(undefined, 'write_knowledge', { key: 'api-design', content: 'REST + SSE', reason: 'streaming' }),
      ).resolves.toMatchObject({ version: 2 })

      await expect(gate.callTool('w1', 'get_knowledge', { key: 'api-design' })).resolves.toMatchObject({
        version: 2,
        content: 'REST + SSE',
        reason: 'streaming',
      })
      await expect(gate.callTool('w1', 'get_knowledge', { key: 'api-design', version: 1 })).resolves.toMatchObject({
        content: 'REST',
      })
      await expect(gate.callTool('w1', 'view_knowledge_history', { key: 'api-design' })).resolves.toEqual([
        { version: 1, reason: 'first draft', preview: 'REST', created_at: expect.any(String) },
        { version: 2, reason: 'streaming', preview: 'REST + SSE', created_at: expect.any(String) },
      ])
    })

    it('reports a missing key or version', async () => {
      await expect(gate.callTool('w1', 'get_knowledge', { key: 'nothing' })).rejects.toThrow(
        'No knowledge found for nothing',
      )
      await gate.callTool('w1', 'write_knowledge', { key: 'k', content: 'c', reason: 'r' })
      await expect(gate.callTool('w1', 'get_knowledge', { key: 'k', version: 4 })).rejects.toThrow(
        'No knowledge found for k version 4',
      )
      await expect(gate.callTool('w1', 'view_knowledge_history', { key: 'nothing' })).rejects.toThrow(
        'No knowledge found for nothing',
      )
    })

    it('requires a reason for every version', async () => {
      await expect(
        gate.callTool('w1', 'write_knowledge', { key: 'k', content: 'c', reason: '' }),
      ).rejects.toThrow('Invalid knowledge entry: reason is required')
    })
  })

  // -------------------------------------------------------------------------
  describe('decision tools', () => {
    it('records an inject decision for the caller phase and step', async () => {
      const response = await gate.callTool('sup-pre', 'set_process_decision', {
        decision: 'inject',
        reasoning: 'lint before implementing',
        injected_steps: [{ task_name: 'lint', prompt: 'Fix lint errors' }],
      })

      expect(response).toEqual({
        recorded: true,
        phase: 'pre_step',
        step_index: 1,
        decision: 'inject',
        injected_steps: ['lint'],
      })
      expect(history.readLatestDecision('sup-pre', 'pre_step', 1)?.injectedSteps).toEqual([
        { task: 'lint', prompt: 'Fix lint errors', skipOrchestrator: false },
      ])
    })

    it('rejects an inject that names an unknown task and records nothing', async () => {
      await expect(
        gate.callTool('sup-pre', 'inject_steps', { steps: [{ task_name: 'lint' }, { task_name: 'mystery' }] }),
      ).rejects.toThrow('Unknown task name(s): mystery')
      expect(history.readDecisions('proc-1')).toEqual([])
    })

    it('rejects an inject decision without steps', async () => {
      await expect(
        gate.callTool('sup-pre', 'set_process_decision', { decision: 'inject', reasoning: 'x' }),
      ).rejects.toThrow('injected_steps is required when decision is "inject"')
    })

    it('rejects steps attached to a proceed decision', async () => {
      await expect(
        gate.callTool('sup-pre', 'set_process_decision', {
          decision: 'proceed',
          reasoning: 'x',
          injected_steps: [{ task_name: 'lint' }],
        }),
      ).rejects.toThrow('injected_steps must not be provided when decision is "proceed"')
    })

    it('builds a default reasoning for inject_steps', async () => {
      await gate.callTool('sup-pre', 'inject_steps', { steps: [{ task_name: 'lint' }, { task_name: 'review' }] })
      expect(history.readLatestDecision('sup-pre', 'pre_step', 1)?.reasoning).toBe('Injected 2 step(s): lint, review')
    })

    it('does not let a post_step review record a decision', async () => {
      await expect(
        gate.callTool('sup-post', 'set_process_decision', { decision: 'abort', reasoning: 'bad' }),
      ).rejects.toThrow('post_step reviews record results with write_result, not decisions')
    })

    it('does not let finalize inject steps', async () => {
      await expect(gate.callTool('sup-fin', 'inject_steps', { steps: [{ task_name: 'lint' }] })).rejects.toThrow(
        'Steps can only be injected from the pre_step phase, not finalize',
      )
    })

    it('lets finalize abort', async () => {
      await gate.callTool('sup-fin', 'set_process_decision', { decision: 'abort', reasoning: 'tests missing' })
      expect(history.readLatestDecision('sup-fin', 'finalize', 3)?.decision).toBe('abort')
    })

    it('rejects a supervisor row without a phase', async () => {
      history.appendTaskLog({ task_id: 'bare', process_id: 'proc-1', task_name: 'orchestrator-pre', is_orchestrator: true })
      await expect(
        gate.callTool('bare', 'set_process_decision', { decision: 'proceed', reasoning: '' }),
      ).rejects.toThrow('Task bare is not a supervisor phase invocation')
    })
  })

  // -------------------------------------------------------------------------
  describe('state and repository tools', () => {
    it('returns the process state for the caller process', async () => {
      await expect(gate.callTool('sup-pre', 'get_process_state', {})).resolves.toMatchObject({
        process_id: 'proc-1',
        process_name: 'feature',
        current_index: 1,
        total_steps: 3,
      })
    })

    it('diffs against the base commit of the run', async () => {
      await expect(gate.callTool('sup-pre', 'get_git_diff', {})).resolves.toEqual({
        since_commit: 'base123',
        truncated: false,
        diff: 'diff --git a/login.ts b/login.ts',
      })
      expect(inspector.diff).toHaveBeenCalledWith('/work/repo', 'base123')
    })

    it('lists commits since an explicit commit', async () => {
      await expect(gate.callTool('sup-pre', 'get_commit_log', { since_commit: 'abc' })).resolves.toEqual({
        since_commit: 'abc',
        commits: [{ hash: 'c1', message: 'Add login form' }],
      })
      expect(inspector.commitLog).toHaveBeenCalledWith('/work/repo', 'abc')
    })

    it('rejects an option-like since_commit before reaching git', async () => {
      const call = gate.callTool('sup-pre', 'get_git_diff', { since_commit: '--output=/tmp/x' })

      await expect(call).rejects.toBeInstanceOf(ValidationError)
      await expect(call).rejects.toThrow(
        'Invalid arguments for get_git_diff: since_commit: must be a commit reference, not an option',
      )
      expect(inspector.diff).not.toHaveBeenCalled()
    })

    it('fails when the server has no repository inspector', async () => {
      const bare = createToolScopeGate({ history, registry: registryWith() })
      await expect(bare.callTool('sup-pre', 'get_git_diff', {})).rejects.toThrow(
        'Repository inspection is not available in this server',
      )
    })
  })
})

describe('truncateDiff', () => {
  it('leaves a small diff untouched', () => {
    expect(truncateDiff('abc', 10)).toEqual({ diff: 'abc', truncated: false })
  })

  it('cuts a large diff and notes the sizes', () => {
    expect(truncateDiff('abcdef', 4)).toEqual({
      diff: 'abcd\n\n[diff truncated: showing 4 of 6 bytes]',
      truncated: true,
    })
  })

  it('backs off to a character boundary', () => {
    expect(truncateDiff('a\u00e9\u20acb', 4)).toEqual({
      diff: 'a\u00e9\n\n[diff truncated: showing 3 of 7 bytes]',
      truncated: true,
    })
  })
})
