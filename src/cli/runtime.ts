/**
 * Wires the collaborators every command needs: configuration, the history
 * database, task, process and template definitions, the agent executor, the
 * result summarizer and the repository inspector.
 */

import { resolve } from 'node:path'
import { ServiceRegistry } from '../core/di.js'
import { setLogLevel } from '../utils/logger.js'
import { createEventBus, type TypedEventBus } from '../core/event-bus.js'
import { createDatabaseService, type DatabaseService } from '../persistence/database.js'
import { createConfigSystem, type ConfigSystemImpl } from '../modules/config/config-system-impl.js'
import type { PartialStepwardenConfig } from '../modules/config/config-schema.js'
import { createHistoryStore } from '../modules/history/history-store-impl.js'
import type { HistoryStore } from '../modules/history/history-store.js'
import { createTaskRegistry } from '../modules/tasks/task-registry-impl.js'
import type { TaskRegistry } from '../modules/tasks/types.js'
import { createTemplateRegistry } from '../modules/templates/template-registry-impl.js'
import type { TemplateRegistry } from '../modules/templates/types.js'
import { createSummarizer } from '../modules/summarizer/command-summarizer.js'
import type { ResultSummarizer } from '../modules/summarizer/types.js'
import { ProcessLoader } from '../modules/process/process-loader.js'
import { createCommandExecutor } from '../modules/executor/command-executor.js'
import type { Executor } from '../modules/executor/types.js'
import { createRepositoryInspector, type RepositoryInspector } from '../modules/git/repository-inspector.js'
import { CurrentWorktreeProvider, type WorktreeProvider } from '../modules/git/worktree-provider.js'
import { createOrchestratorSupervisor } from '../modules/orchestrator/orchestrator-supervisor.js'
import {
  createProcessRunStateMachine,
  type ProcessRunStateMachine,
} from '../modules/orchestrator/process-run-state-machine.js'
import type { ProcessRun } from '../modules/process/types.js'

export interface RuntimeOptions {
  projectRoot?: string
  projectConfigDir?: string
  globalConfigDir?: string
  cliOverrides?: PartialStepwardenConfig
  env?: NodeJS.ProcessEnv
  /** Replacements for the collaborators that leave the process */
  executor?: Executor
  inspector?: RepositoryInspector
  worktreeProvider?: WorktreeProvider
  summarizer?: ResultSummarizer
}

export interface Runtime {
  config: ConfigSystemImpl
  database: DatabaseService
  history: HistoryStore
  registry: TaskRegistry
  templates: TemplateRegistry
  /** Absent when summaries are disabled */
  summarizer: ResultSummarizer | undefined
  processes: ProcessLoader
  executor: Executor
  inspector: RepositoryInspector
  worktrees: WorktreeProvider
  eventBus: TypedEventBus
  /** Build a state machine for `run` from the loaded configuration */
  stateMachineFor(run: ProcessRun): ProcessRunStateMachine
  close(): Promise<void>
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const projectRoot = resolve(options.projectRoot ?? process.cwd())
  const config = createConfigSystem({
    projectConfigDir: options.projectConfigDir ?? resolve(projectRoot, '.stepwarden'),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    ...(options.cliOverrides !== undefined && { cliOverrides: options.cliOverrides }),
    ...(options.env !== undefined && { env: options.env }),
  })
  await config.load()
  const settings = config.getConfig()
  // An explicit LOG_LEVEL wins over the configured level.
  if ((options.env ?? process.env).LOG_LEVEL === undefined) {
    setLogLevel(settings.global.log_level)
  }

  const services = new ServiceRegistry()
  const databasePath = config.getDatabasePath()
  const database = createDatabaseService(databasePath)
  services.register('database', database)
  await services.initializeAll()

  try {
    const history = createHistoryStore(database.db)
    const registry = await createTaskRegistry({
      projectDir: config.projectConfigDir,
      globalDir: config.globalConfigDir,
    })
    const templates = await createTemplateRegistry({
      projectDir: config.projectConfigDir,
      globalDir: config.globalConfigDir,
    })
    const summarizer =
      options.summarizer ??
      createSummarizer({ settings: settings.summarizer, defaultCommand: settings.executor.command })
    const processes = new ProcessLoader({
      projectDir: config.projectConfigDir,
      globalDir: config.globalConfigDir,
    })
    const executor =
      options.executor ?? createCommandExecutor({ settings: settings.executor, databasePath })
    const inspector = options.inspector ?? createRepositoryInspector()
    const worktrees = options.worktreeProvider ?? new CurrentWorktreeProvider(projectRoot)
    const eventBus = createEventBus()
    const supervisor = createOrchestratorSupervisor({ history, executor, registry, eventBus })

    return {
      config,
      database,
      history,
      registry,
      templates,
      summarizer,
      processes,
      executor,
      inspector,
      worktrees,
      eventBus,
      stateMachineFor(run) {
        return createProcessRunStateMachine(run, {
          history,
          executor,
          registry,
          supervisor,
          eventBus,
          inspector,
          orchestratorSettings: settings.orchestrator,
          defaults: {
            ...(settings.global.engine !== undefined && { engine: settings.global.engine }),
            ...(settings.global.model !== undefined && { model: settings.global.model }),
          },
        })
      },
      close: () => services.shutdownAll(),
    }
  } catch (err) {
    await services.shutdownAll()
    throw err
  }
}
