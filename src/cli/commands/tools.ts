/**
 * `stepwarden tools` command group
 *
 * Subcommands:
 *   - `stepwarden tools list`             tools visible to a task identity
 *   - `stepwarden tools call <name>`      call one tool as a task identity
 *   - `stepwarden tools serve`            Model Context Protocol server on stdio
 *
 * The identity comes from --task-id, else STEPWARDEN_TASK_ID, which the
 * executor sets for every agent it launches.
 */

import type { Command } from 'commander'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { createToolScopeGate, type ToolScopeGate } from '../../modules/tool-scope/tool-scope-gate.js'
import { handleToolCall, serveStdio } from '../../modules/tool-scope/mcp-server.js'
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE,
  parseOutputFormat,
  reportError,
  writeJson,
  type OutputFormat,
} from '../utils/command-helpers.js'

const logger = createLogger('tools-cmd')

export interface ToolsActionOptions {
  taskId?: string
  runtime: RuntimeOptions
}

function resolveTaskId(explicit: string | undefined, env: NodeJS.ProcessEnv): string | undefined {
  const value = explicit ?? env['STEPWARDEN_TASK_ID']
  return value !== undefined && value !== '' ? value : undefined
}

function gateFor(runtime: Runtime): ToolScopeGate {
  return createToolScopeGate({
    history: runtime.history,
    registry: runtime.registry,
    inspector: runtime.inspector,
    templates: runtime.templates,
    ...(runtime.summarizer !== undefined && { summarizer: runtime.summarizer }),
  })
}

// ---------------------------------------------------------------------------
// `tools list`
// ---------------------------------------------------------------------------

export async function runToolsList(options: ToolsActionOptions & { outputFormat: OutputFormat }): Promise<number> {
  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const taskId = resolveTaskId(options.taskId, options.runtime.env ?? process.env)
    const tools = gateFor(runtime).listTools(taskId)
    if (options.outputFormat === 'json') {
      writeJson(tools.map((t) => ({ name: t.name, scope: t.scope, description: t.description })))
    } else {
      for (const tool of tools) {
        process.stdout.write(`${tool.name.padEnd(22)} ${tool.scope.padEnd(12)} ${tool.description}\n`)
      }
    }
    return EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'tools list')
  } finally {
    await runtime?.close()
  }
}

// ---------------------------------------------------------------------------
// `tools call`
// ---------------------------------------------------------------------------

export async function runToolsCall(
  name: string,
  rawArgs: string,
  options: ToolsActionOptions,
): Promise<number> {
  let args: unknown
  try {
    args = JSON.parse(rawArgs)
  } catch (err) {
    process.stderr.write(`Error: --args is not valid JSON: ${errorMessage(err)}\n`)
    return EXIT_USAGE
  }

  let runtime: Runtime | undefined
  try {
    runtime = await createRuntime(options.runtime)
    const taskId = resolveTaskId(options.taskId, options.runtime.env ?? process.env)
    const response = await handleToolCall(gateFor(runtime), taskId, name, args)
    for (const item of response.content) {
      process.stdout.write(item.text + '\n')
    }
    return response.isError === true ? EXIT_ERROR : EXIT_SUCCESS
  } catch (err) {
    return reportError(err, 'tools call')
  } finally {
    await runtime?.close()
  }
}

// ---------------------------------------------------------------------------
// `tools serve`
// ---------------------------------------------------------------------------

export async function runToolsServe(options: ToolsActionOptions, version: string): Promise<number> {
  let runtime: Runtime
  try {
    runtime = await createRuntime(options.runtime)
  } catch (err) {
    return reportError(err, 'tools serve')
  }

  const taskId = resolveTaskId(options.taskId, options.runtime.env ?? process.env)
  if (taskId === undefined) {
    logger.warn('No task identity given; only shared tools are available')
  }
  const open = runtime
  try {
    await serveStdio(gateFor(open), taskId, version, () => {
      open.close().catch((err: unknown) => {
        logger.error({ err }, 'Failed to close tool server runtime')
      })
    })
    return EXIT_SUCCESS
  } catch (err) {
    await open.close()
    return reportError(err, 'tools serve')
  }
}

// ---------------------------------------------------------------------------
// registerToolsCommand
// ---------------------------------------------------------------------------

export function registerToolsCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  const tools = program.command('tools').description('Inspect and serve the agent tool set')

  tools
    .command('list')
    .description('List the tools visible to a task identity')
    .option('--task-id <id>', 'Caller identity (default: $STEPWARDEN_TASK_ID)')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: { taskId?: string; outputFormat: string }) => {
      process.exitCode = await runToolsList({
        ...(opts.taskId !== undefined && { taskId: opts.taskId }),
        outputFormat: parseOutputFormat(opts.outputFormat),
        runtime: { projectRoot },
      })
    })

  tools
    .command('call <name>')
    .description('Call one tool as a task identity and print its JSON result')
    .option('--task-id <id>', 'Caller identity (default: $STEPWARDEN_TASK_ID)')
    .option('--args <json>', 'Tool arguments as a JSON object', '{}')
    .action(async (name: string, opts: { taskId?: string; args: string }) => {
      process.exitCode = await runToolsCall(name, opts.args, {
        ...(opts.taskId !== undefined && { taskId: opts.taskId }),
        runtime: { projectRoot },
      })
    })

  tools
    .command('serve')
    .description('Serve the tool set over the Model Context Protocol on stdio')
    .option('--task-id <id>', 'Caller identity (default: $STEPWARDEN_TASK_ID)')
    .action(async (opts: { taskId?: string }) => {
      const dbPath = process.env['STEPWARDEN_DB']
      process.exitCode = await runToolsServe(
        {
          ...(opts.taskId !== undefined && { taskId: opts.taskId }),
          runtime: {
            projectRoot,
            ...(dbPath !== undefined && dbPath !== '' && { cliOverrides: { global: { database_path: dbPath } } }),
          },
        },
        version,
      )
    })
}
