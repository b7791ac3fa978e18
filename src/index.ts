/**
 * stepwarden - main module exports
 * Public API surface for embedding supervised process runs
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, logger, setLogLevel } from './utils/logger.js'
export { generateShortId, formatDuration } from './utils/helpers.js'

// Event Bus
export type { TypedEventBus, ProcessEvents } from './core/event-bus.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export { createConfigSystem, ConfigSystemImpl } from './modules/config/config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './modules/config/config-system.js'
export type {
  StepwardenConfig,
  PartialStepwardenConfig,
  OrchestratorSettings,
  ExecutorSettings,
  SummarizerSettings,
} from './modules/config/config-schema.js'

// Persistence
export { createDatabaseService, IN_MEMORY_DATABASE } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations, getSchemaVersion } from './persistence/migrations/index.js'

// History
export { createHistoryStore } from './modules/history/history-store-impl.js'
export type {
  HistoryStore,
  TaskLog,
  TaskResult,
  Artifact,
  KnowledgeEntry,
  ProcessRunSnapshot,
  ProcessState,
} from './modules/history/history-store.js'
export { pruneHistory } from './modules/history/retention.js'
export type { PruneOptions, PruneReport } from './modules/history/retention.js'

// Process definitions
export type {
  ProcessRun,
  ProcessSpec,
  ProcessStep,
  StepResult,
  OrchestratorConfig,
  OrchestratorDecision,
  DecisionKind,
  DecisionPhase,
  WorktreeRef,
} from './modules/process/types.js'
export { createProcessRun } from './modules/process/types.js'
export { ProcessLoader, parseProcessDefinition } from './modules/process/process-loader.js'

// Tasks
export type { TaskDefinition, TaskRegistry } from './modules/tasks/types.js'
export { createTaskRegistry } from './modules/tasks/task-registry-impl.js'

// Artifact templates
export type { ArtifactTemplate, TemplateRegistry } from './modules/templates/types.js'
export { createTemplateRegistry } from './modules/templates/template-registry-impl.js'

// Execution
export type { Executor, ExecutionRequest, ExecutionResult } from './modules/executor/types.js'
export { createCommandExecutor } from './modules/executor/command-executor.js'
export type { ResultSummarizer } from './modules/summarizer/types.js'
export { createSummarizer } from './modules/summarizer/command-summarizer.js'
export type { RepositoryInspector } from './modules/git/repository-inspector.js'
export { createRepositoryInspector } from './modules/git/repository-inspector.js'
export type { WorktreeProvider } from './modules/git/worktree-provider.js'
export { CurrentWorktreeProvider } from './modules/git/worktree-provider.js'

// Orchestration
export { InjectionGuard } from './modules/orchestrator/injection-guard.js'
export { createOrchestratorSupervisor, OrchestratorSupervisor } from './modules/orchestrator/orchestrator-supervisor.js'
export {
  createProcessRunStateMachine,
  ProcessRunStateMachine,
} from './modules/orchestrator/process-run-state-machine.js'
export type { ProcessRunOutcome, RunState } from './modules/orchestrator/process-run-state-machine.js'
export { runInParallel } from './modules/orchestrator/parallel.js'
export type { ParallelRunResult } from './modules/orchestrator/parallel.js'

// Resumption
export { createResumptionResolver, ResumptionResolver } from './modules/resumption/resumption-resolver.js'
export type { ResumeKeyKind } from './modules/resumption/resumption-resolver.js'

// Tool scope
export { createToolScopeGate, ToolScopeGate } from './modules/tool-scope/tool-scope-gate.js'
export { createToolServer, serveStdio } from './modules/tool-scope/mcp-server.js'
export type { ToolScope, ToolDescriptor } from './modules/tool-scope/types.js'
