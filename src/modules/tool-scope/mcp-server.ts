/**
 * Model Context Protocol server over stdio, launched by the agent CLI for one
 * task. The caller identity is fixed when the server starts; the gate still
 * re-reads its task_log row on every request.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js'
import { StepwardenError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import type { ToolScopeGate } from './tool-scope-gate.js'

const logger = createLogger('tool-scope:mcp')

export interface ToolCallResponse {
  [key: string]: unknown
  content: { type: 'text'; text: string }[]
  isError?: boolean
}

function text(data: unknown): ToolCallResponse {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] }
}

function errorResponse(err: unknown): ToolCallResponse {
  const payload =
    err instanceof StepwardenError
      ? { error: err.message, code: err.code }
      : { error: errorMessage(err) }
  return { content: [{ type: 'text', text: JSON.stringify(payload) }], isError: true }
}

/** Run one tool call through the gate and shape the outcome for the protocol. */
export async function handleToolCall(
  gate: ToolScopeGate,
  taskId: string | undefined,
  name: string,
  args: unknown,
): Promise<ToolCallResponse> {
  try {
    return text(await gate.callTool(taskId, name, args))
  } catch (err) {
    if (!(err instanceof StepwardenError)) {
      logger.error({ err, tool: name, taskId: taskId ?? null }, 'Tool call failed')
    }
    return errorResponse(err)
  }
}

export function createToolServer(gate: ToolScopeGate, taskId: string | undefined, version: string): Server {
  const server = new Server({ name: 'stepwarden', version }, { capabilities: { tools: {} } })

  server.setRequestHandler(ListToolsRequestSchema, () =>
    Promise.resolve({
      tools: gate.listTools(taskId).map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    }),
  )

  server.setRequestHandler(CallToolRequestSchema, (request) =>
    handleToolCall(gate, taskId, request.params.name, request.params.arguments ?? {}),
  )

  return server
}

/**
 * Serve the gate on stdin/stdout. Resolves once connected; `onClose` runs
 * when the client disconnects.
 */
export async function serveStdio(
  gate: ToolScopeGate,
  taskId: string | undefined,
  version: string,
  onClose?: () => void,
): Promise<Server> {
  const server = createToolServer(gate, taskId, version)
  if (onClose !== undefined) server.onclose = onClose
  await server.connect(new StdioServerTransport())
  logger.debug({ taskId: taskId ?? null }, 'Tool server listening on stdio')
  return server
}
