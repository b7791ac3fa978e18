/**
 * CommandSummarizer: pipes a result through the agent CLI in print mode with
 * a summarizing system prompt, and returns what it prints.
 */

import { spawn } from 'node:child_process'
import { SummarizerError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { SummarizerSettings } from '../config/config-schema.js'
import type { ResultSummarizer } from './types.js'

const logger = createLogger('summarizer')

const STDERR_TAIL_CHARS = 1_000

export const SUMMARY_PROMPT = [
  'You are a technical summarizer. Produce a TLDR summary of the following task result.',
  '',
  'Include:',
  '1. A 2-3 sentence executive summary',
  '2. Key decisions or findings as bullet points',
  '3. Relevant source code locations as file:line references',
  '',
  'Keep the entire output under 500 tokens. Be precise and actionable. Focus on relevant files over a long text.',
].join('\n')

export interface CommandSummarizerOptions {
  settings: SummarizerSettings
  /** Used when the summarizer settings name no command of their own */
  defaultCommand: string
}

export class CommandSummarizer implements ResultSummarizer {
  constructor(private readonly _options: CommandSummarizerOptions) {}

  summarize(text: string): Promise<string> {
    const { settings, defaultCommand } = this._options
    const command = settings.command ?? defaultCommand
    const args = ['--print', '--model', settings.model, '--system-prompt', SUMMARY_PROMPT]

    return new Promise<string>((resolve, reject) => {
      let settled = false
      let stdout = ''
      let stderr = ''

      const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] })

      const timer = setTimeout(() => {
        fail(new SummarizerError(`Summarizer timed out after ${String(settings.timeout_ms)}ms`, { command }))
        proc.kill('SIGTERM')
      }, settings.timeout_ms)

      function fail(err: SummarizerError): void {
        if (settled) return
        settled = true
        clearTimeout(timer)
        reject(err)
      }

      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString('utf-8')
      })
      proc.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString('utf-8')).slice(-STDERR_TAIL_CHARS)
      })

      proc.on('error', (err: Error) => {
        fail(new SummarizerError(`Failed to spawn ${command}: ${err.message}`, { command }))
      })

      proc.on('close', (code: number | null) => {
        if (settled) return
        if (code !== 0) {
          const tail = stderr.trim()
          fail(
            new SummarizerError(`Summarizer failed: ${tail !== '' ? tail : `exit code ${String(code)}`}`, {
              command,
              exitCode: code,
            }),
          )
          return
        }
        const summary = stdout.trim()
        if (summary === '') {
          fail(new SummarizerError('Summarizer produced no output', { command }))
          return
        }
        settled = true
        clearTimeout(timer)
        logger.debug({ chars: summary.length }, 'Result summarized')
        resolve(summary)
      })

      proc.stdin.on('error', (err: Error) => {
        logger.debug({ error: err.message }, 'Summarizer closed its input early')
      })
      proc.stdin.end(text)
    })
  }
}

export function createSummarizer(options: CommandSummarizerOptions): ResultSummarizer | undefined {
  return options.settings.enabled ? new CommandSummarizer(options) : undefined
}
