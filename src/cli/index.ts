#!/usr/bin/env node
/**
 * issue-autofix CLI: main entry point
 * Provides the `autofix` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'
import { readFile } from 'node:fs/promises'
import { createLogger } from '../utils/logger.js'
import { isPlainObject } from '../utils/helpers.js'
import { registerRunCommand } from './commands/run.js'
import { registerStatusCommand } from './commands/status.js'

const logger = createLogger('cli')

/** Read the version from package.json, found relative to this file */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // src/cli/ and dist/cli/ both sit two levels below the package root
  const pkgPath = resolve(here, '../../package.json')
  try {
    const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
    if (isPlainObject(pkg) && typeof pkg.version === 'string') return pkg.version
  } catch (err) {
    logger.debug({ pkgPath, err }, 'Could not read package version')
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('autofix')
    .description('Triage, fix and review bug reports with a bounded multi-agent pipeline')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerStatusCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
