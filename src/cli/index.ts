#!/usr/bin/env node
/**
 * `verdict` command-line entry point: debate, serve, config.
 */

import { Command } from 'commander'
import { readFile } from 'fs/promises'
import { fileURLToPath } from 'url'
import { toError } from '../core/errors.js'
import { isPlainObject } from '../utils/helpers.js'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerDebateCommand } from './commands/debate.js'
import { registerServeCommand } from './commands/serve.js'

const logger = createLogger('cli')

/** Version from package.json; src/cli and dist/cli both sit two levels below it */
export async function getPackageVersion(): Promise<string> {
  const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url))
  try {
    const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
    if (isPlainObject(pkg) && typeof pkg.version === 'string') return pkg.version
  } catch (err) {
    logger.debug({ err: toError(err).message, pkgPath }, 'Package version unavailable')
  }
  return '0.0.0'
}

export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()
  const program = new Command()
    .name('verdict')
    .description('Adversarial multi-agent debates with audited verdicts')
    .version(version, '-v, --version', 'Output the current version')

  registerDebateCommand(program)
  registerServeCommand(program, version)
  registerConfigCommand(program)
  return program
}

async function main(): Promise<void> {
  const program = await createProgram()
  await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
  const err = toError(error)
  logger.error({ err: err.message }, 'CLI error')
  process.stderr.write(`Error: ${err.message}\n`)
  process.exitCode = 1
})
