#!/usr/bin/env node
/**
 * vault-enroll CLI
 *
 * Grants bootstrapped nodes access to encrypted vault items
 */

import { createCLI, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { VaultEnrollConfig } from '../types.js'
import { loadConfig } from '../lib/config-loader.js'
import { formatErrorForCli, isVaultEnrollError } from '../lib/errors.js'
import { toCliArgs } from './args.js'
import { runGrant } from './commands/grant.js'
import { c, enrollFormatter } from './lib/colors.js'
import * as ui from './ui.js'

const VERSION = process.env.VAULT_ENROLL_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from dist/cli or src/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

const cliSchema: CLISchema = {
  name: 'vault-enroll',
  version: VERSION,
  description: 'Grant bootstrapped nodes access to encrypted vault items',
  strict: true,
  formatter: enrollFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    backend: {
      short: 'b',
      type: 'string',
      description: 'Backend URL override (s3://, file://, memory://)'
    },
    config: {
      short: 'c',
      type: 'string',
      description: 'Config file (default: nearest .vault-enroll/config.yaml)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    }
  },

  commands: {
    grant: {
      description: 'Authorize a node on vault items once its client is searchable',
      positional: [
        { name: 'node', required: true, description: 'Client name the node registered under' }
      ],
      options: {
        'vault-list': {
          type: 'string',
          description: 'JSON object of vaults to items, e.g. {"vault":["item1","item2"]}'
        },
        'vault-file': {
          type: 'string',
          description: 'File holding the JSON object of vaults to items'
        },
        'vault-item': {
          type: 'string',
          description: 'Comma-separated vault:item pairs'
        },
        interval: {
          type: 'number',
          description: 'Milliseconds between directory searches (default: 1000)'
        },
        'dry-run': {
          type: 'boolean',
          default: false,
          description: 'Print the items that would be updated and exit'
        },
        json: {
          type: 'boolean',
          default: false,
          description: 'Output in JSON format'
        }
      }
    }
  }
}

const cli = createCLI(cliSchema)

async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs({
    command: result.command,
    options: result.options as Record<string, unknown>,
    positional: result.positional as Record<string, unknown>
  })

  if (args.command.length === 0 || args.help) {
    ui.output(cli.help(result.command))
    return
  }

  if (args.version) {
    ui.output(`vault-enroll v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      ui.error(error)
    }
    process.exit(1)
  }

  ui.setQuiet(args.quiet)

  try {
    const config: VaultEnrollConfig = loadConfig(process.cwd(), args.config)

    switch (args.command[0]) {
      case 'grant':
        await runGrant({ args, config })
        break

      default:
        ui.error(`Unknown command: ${c.command(args.command[0])}`)
        ui.log(`Run "${c.command('vault-enroll --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    if (isVaultEnrollError(err)) {
      ui.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (args.verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (args.verbose && err instanceof Error && err.stack) {
      ui.error(err.stack)
    } else {
      ui.error(err instanceof Error ? err.message : String(err))
    }
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  ui.error(formatErrorForCli(err))
  process.exit(1)
})
