/**
 * Vault specification inputs
 *
 * Three option keys can describe the vault items to update. They are ranked:
 *   bootstrap_vault_item (parsed) > bootstrap_vault_json > bootstrap_vault_file
 * The highest ranked present input wins, the others are ignored with a warning.
 */

import fs from 'node:fs'
import type {
  VaultItems,
  VaultOptionKey,
  VaultOptionSet,
  VaultSpecInput,
  VaultTarget
} from '../types.js'
import { InvalidVaultItemFlagError, InvalidVaultSpecError } from './errors.js'

/**
 * Option keys ordered from highest to lowest priority
 */
export const VAULT_OPTION_PRIORITY: readonly VaultOptionKey[] = [
  'bootstrap_vault_item',
  'bootstrap_vault_json',
  'bootstrap_vault_file'
]

/**
 * Flag names shown to users for each option key
 */
export const VAULT_OPTION_FLAGS: Record<VaultOptionKey, string> = {
  bootstrap_vault_item: '--vault-item',
  bootstrap_vault_json: '--vault-list',
  bootstrap_vault_file: '--vault-file'
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return false
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.keys(value).length > 0
  }
  return true
}

/**
 * Option keys that carry a value, highest priority first
 */
export function presentVaultOptions(options: VaultOptionSet): VaultOptionKey[] {
  return VAULT_OPTION_PRIORITY.filter(key => isPresent(options[key]))
}

/**
 * Warning for conflicting inputs, or null when at most one input is given
 *
 * @example
 * conflictWarning({ bootstrap_vault_json: '{}', bootstrap_vault_file: 'v.json' })
 * // '--vault-list given with --vault-file, ignoring the latter'
 */
export function conflictWarning(options: VaultOptionSet): string | null {
  const [winner, ...ignored] = presentVaultOptions(options)
  if (!winner || ignored.length === 0) return null

  const ignoredFlags = ignored.map(key => VAULT_OPTION_FLAGS[key])
  const tail = ignored.length === 1 ? 'ignoring the latter' : 'ignoring the latter two'
  return `${VAULT_OPTION_FLAGS[winner]} given with ${ignoredFlags.join(' and ')}, ${tail}`
}

/**
 * Read the effective specification. JSON and file errors are not caught.
 */
export function readVaultSpec(options: VaultOptionSet): unknown {
  const [winner] = presentVaultOptions(options)

  switch (winner) {
    case 'bootstrap_vault_item':
      return options.bootstrap_vault_item
    case 'bootstrap_vault_json':
      return JSON.parse(String(options.bootstrap_vault_json))
    case 'bootstrap_vault_file':
      return JSON.parse(fs.readFileSync(String(options.bootstrap_vault_file), 'utf-8'))
    default:
      return {}
  }
}

function toVaultItems(vault: string, value: unknown): VaultItems {
  if (typeof value === 'string') {
    if (!value) throw new InvalidVaultSpecError('item name is empty', vault)
    return { kind: 'single', item: value }
  }

  if (Array.isArray(value)) {
    const items: string[] = []
    for (const entry of value) {
      if (typeof entry !== 'string' || !entry) {
        throw new InvalidVaultSpecError('item names must be non-empty strings', vault)
      }
      items.push(entry)
    }
    return { kind: 'list', items }
  }

  throw new InvalidVaultSpecError(`expected an item name or a list of item names, got ${typeof value}`, vault)
}

/**
 * Validate a parsed specification into per-vault item groups
 */
export function parseVaultSpec(spec: unknown): Map<string, VaultItems> {
  if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) {
    throw new InvalidVaultSpecError(`expected an object, got ${Array.isArray(spec) ? 'array' : spec === null ? 'null' : typeof spec}`)
  }

  const vaults = new Map<string, VaultItems>()
  for (const [vault, value] of Object.entries(spec)) {
    if (!vault) throw new InvalidVaultSpecError('vault name is empty')
    vaults.set(vault, toVaultItems(vault, value))
  }
  return vaults
}

/**
 * Flatten a specification into (vault, item) pairs, preserving order.
 * A repeated item keeps its first position.
 *
 * @example
 * normalizeVaultSpec({ vault1: 'itemA', vault2: ['itemB', 'itemC'] })
 * // [{ vault: 'vault1', item: 'itemA' }, { vault: 'vault2', item: 'itemB' }, { vault: 'vault2', item: 'itemC' }]
 */
export function normalizeVaultSpec(spec: unknown): VaultTarget[] {
  const targets: VaultTarget[] = []

  for (const [vault, items] of parseVaultSpec(spec)) {
    const names = items.kind === 'single' ? [items.item] : items.items
    for (const item of new Set(names)) {
      targets.push({ vault, item })
    }
  }

  return targets
}

/**
 * Accumulate "vault:item" flag values into a parsed specification
 *
 * @example
 * parseVaultItemFlags(['passwords:root', 'passwords:deploy', 'certs:web'])
 * // { passwords: ['root', 'deploy'], certs: ['web'] }
 */
export function parseVaultItemFlags(values: string[]): VaultSpecInput {
  const spec: Record<string, string[]> = {}

  for (const raw of values) {
    const value = raw.trim()
    const parts = value.split(':')
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new InvalidVaultItemFlagError(value)
    }

    const [vault, item] = parts
    const items = spec[vault] ?? (spec[vault] = [])
    if (!items.includes(item)) {
      items.push(item)
    }
  }

  return spec
}
