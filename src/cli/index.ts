#!/usr/bin/env node
/**
 * stepwarden CLI - main entry point
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { isPlainObject } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { registerRunCommand } from './commands/run.js'
import { registerResumeCommand } from './commands/resume.js'
import { registerContinueCommand } from './commands/continue.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerPruneCommand } from './commands/prune.js'
import { registerToolsCommand } from './commands/tools.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Read the version from package.json, which sits two levels above src/cli and dist/cli alike. */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  try {
    const pkg: unknown = JSON.parse(await readFile(resolve(here, '../../package.json'), 'utf-8'))
    if (isPlainObject(pkg) && typeof pkg['version'] === 'string') return pkg['version']
  } catch (err) {
    logger.debug({ err }, 'Could not read package version')
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('stepwarden')
    .description('Supervised multi-step runs of AI coding agents')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version, projectRoot)
  registerResumeCommand(program, version, projectRoot)
  registerContinueCommand(program, version, projectRoot)
  registerHistoryCommand(program, version, projectRoot)
  registerPruneCommand(program, version, projectRoot)
  registerToolsCommand(program, version, projectRoot)
  registerConfigCommand(program, version, projectRoot)

  return program
}

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
