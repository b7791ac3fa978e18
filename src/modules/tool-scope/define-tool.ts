import type { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import type { RegisteredTool, ToolDefinition } from './types.js'

/**
 * Bind a zod input schema to a handler. Arguments are parsed before the
 * handler runs, so a malformed call fails without touching any state.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  const { input, handler, ...descriptor } = definition
  return {
    ...descriptor,
    async call(args, ctx) {
      const parsed = input.safeParse(args ?? {})
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ')
        throw new ValidationError(`Invalid arguments for ${descriptor.name}: ${issues}`, {
          tool: descriptor.name,
          issues: parsed.error.issues,
        })
      }
      return await handler(parsed.data, ctx)
    },
  }
}
