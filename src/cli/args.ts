/**
 * Maps cli-args-parser results onto typed CLI arguments
 */

export interface ParsedArgs {
  command: string[]
  options: Record<string, unknown>
  positional: Record<string, unknown>
}

export interface CLIArgs {
  command: string[]
  node?: string
  // Global options
  help: boolean
  version: boolean
  backend?: string
  config?: string
  verbose: boolean
  quiet: boolean
  // grant options
  vaultList?: string
  vaultFile?: string
  vaultItem?: string
  interval?: number
  dryRun: boolean
  json: boolean
}

function str(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function num(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

export function toCliArgs(result: ParsedArgs): CLIArgs {
  const opts = result.options
  const pos = result.positional

  return {
    command: [...result.command],
    node: str(pos.node),
    help: opts.help === true,
    version: opts.version === true,
    backend: str(opts.backend),
    config: str(opts.config),
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
    vaultList: str(opts['vault-list']),
    vaultFile: str(opts['vault-file']),
    vaultItem: str(opts['vault-item']),
    interval: num(opts.interval),
    dryRun: opts['dry-run'] === true,
    json: opts.json === true
  }
}

/**
 * Split a comma-separated --vault-item value
 *
 * @example
 * splitVaultItems('passwords:root, certs:web') // ['passwords:root', 'certs:web']
 */
export function splitVaultItems(value?: string): string[] {
  if (!value) return []
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean)
}
