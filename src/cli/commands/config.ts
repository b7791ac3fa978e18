/**
 * `stepwarden config` command group
 *
 * Subcommands:
 *   - `stepwarden config show`         display merged config (credentials masked)
 *   - `stepwarden config get <key>`    print one value by dot-notation key
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { isPlainObject } from '../../utils/helpers.js'
import { EXIT_SUCCESS, EXIT_USAGE, reportError } from '../utils/command-helpers.js'

export interface ConfigCommandOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

function systemFor(opts: ConfigCommandOptions): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export async function runConfigShow(
  opts: ConfigCommandOptions & { format?: 'yaml' | 'json' } = {},
): Promise<number> {
  const system = systemFor(opts)
  try {
    await system.load()
  } catch (err) {
    return reportError(err, 'config show')
  }

  const masked = system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# stepwarden configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = systemFor(opts)
  try {
    await system.load()
  } catch (err) {
    return reportError(err, 'config get')
  }

  // Read from the masked tree so credentials never reach stdout.
  let value: unknown = system.getMasked()
  for (const part of key.split('.')) {
    value = isPlainObject(value) ? value[part] : undefined
  }
  if (value === undefined) {
    process.stderr.write(`Error: Unknown or unset configuration key: ${key}\n`)
    return EXIT_USAGE
  }
  process.stdout.write((typeof value === 'string' ? value : JSON.stringify(value, null, 2)) + '\n')
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command, _version = '0.0.0', projectRoot = process.cwd()): void {
  const configCmd = program.command('config').description('Inspect stepwarden configuration')
  const projectConfigDir = `${projectRoot}/.stepwarden`

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--global-config-dir <dir>', 'Path to the global .stepwarden/ directory')
    .action(async (opts: { format: string; globalConfigDir?: string }) => {
      process.exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        projectConfigDir,
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value, e.g. orchestrator.max_injections')
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key, { projectConfigDir })
    })
}
