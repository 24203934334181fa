/**
 * vault-enroll Config Loader
 *
 * Loads .vault-enroll/config.yaml (plus config.local.yaml for overrides that
 * should not be committed) and merges it into the option set the handler reads.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type {
  BackendConfig,
  DirectoryConfig,
  VaultConfig,
  VaultEnrollConfig,
  VaultOptionSet,
  VaultSpecInput
} from '../types.js'
import { ConfigNotFoundError, InvalidConfigError } from './errors.js'
import { parseVaultItemFlags } from './vault-spec.js'

const CONFIG_DIR = '.vault-enroll'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: VaultEnrollConfig = {
  version: '1',
  backend: {},
  directory: {
    poll_interval: 1000
  },
  vault: {}
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in every string of a parsed document
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(expandEnvVarsInValue)
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, expandEnvVarsInValue(entry)])
    )
  }
  return value
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Expand env vars in the backend section only. Vault and item names are
 * taken literally.
 */
function expandBackendEnvVars(doc: unknown): unknown {
  if (!isObject(doc) || doc.backend === undefined) return doc
  return { ...doc, backend: expandEnvVarsInValue(doc.backend) }
}

function optionalString(section: Record<string, unknown>, key: string, where: string, configPath: string): string | undefined {
  const value = section[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`${where}.${key} must be a string`, configPath)
  }
  return value
}

function sectionOf(doc: Record<string, unknown>, key: string, configPath: string): Record<string, unknown> | undefined {
  const value = doc[key]
  if (value === undefined || value === null) return undefined
  if (!isObject(value)) {
    throw new InvalidConfigError(`${key} must be a mapping`, configPath)
  }
  return value
}

function toVaultItems(value: unknown, configPath: string): VaultSpecInput | undefined {
  if (value === undefined || value === null) return undefined
  if (!isObject(value)) {
    throw new InvalidConfigError('vault.items must be a mapping of vault names to items', configPath)
  }

  const items: VaultSpecInput = {}
  for (const [vault, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      items[vault] = entry
    } else if (Array.isArray(entry) && entry.every((name): name is string => typeof name === 'string')) {
      items[vault] = entry
    } else {
      throw new InvalidConfigError(`vault.items.${vault} must be an item name or a list of item names`, configPath)
    }
  }
  return items
}

/**
 * Validate a parsed YAML document
 */
export function toConfig(doc: unknown, configPath: string): VaultEnrollConfig {
  if (doc === undefined || doc === null) return {}
  if (!isObject(doc)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const config: VaultEnrollConfig = {}

  if (doc.version !== undefined) {
    config.version = String(doc.version)
  }

  const backend = sectionOf(doc, 'backend', configPath)
  if (backend) {
    const section: BackendConfig = {}
    const url = optionalString(backend, 'url', 'backend', configPath)
    const passphrase = optionalString(backend, 'passphrase', 'backend', configPath)
    if (url !== undefined) section.url = url
    if (passphrase !== undefined) section.passphrase = passphrase
    config.backend = section
  }

  const directory = sectionOf(doc, 'directory', configPath)
  if (directory) {
    const section: DirectoryConfig = {}
    const interval = directory.poll_interval
    if (interval !== undefined && interval !== null) {
      const ms = Number(interval)
      if (!Number.isFinite(ms) || ms < 0) {
        throw new InvalidConfigError('directory.poll_interval must be a non-negative number of milliseconds', configPath)
      }
      section.poll_interval = ms
    }
    config.directory = section
  }

  const vault = sectionOf(doc, 'vault', configPath)
  if (vault) {
    const section: VaultConfig = {}
    const json = optionalString(vault, 'json', 'vault', configPath)
    const file = optionalString(vault, 'file', 'vault', configPath)
    const items = toVaultItems(vault.items, configPath)
    if (json !== undefined) section.json = json
    if (file !== undefined) section.file = file
    if (items !== undefined) section.items = items
    config.vault = section
  }

  return config
}

/**
 * Find the .vault-enroll directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }
    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required = true): VaultEnrollConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  return toConfig(expandBackendEnvVars(parsed), configPath)
}

/**
 * Merge two configs section by section; defined values in source win
 */
export function mergeConfig(target: VaultEnrollConfig, source: VaultEnrollConfig): VaultEnrollConfig {
  return {
    version: source.version ?? target.version,
    backend: { ...target.backend, ...source.backend },
    directory: { ...target.directory, ...source.directory },
    vault: { ...target.vault, ...source.vault }
  }
}

/**
 * Environment overrides for the backend section
 */
export function applyEnvOverrides(config: VaultEnrollConfig, env: NodeJS.ProcessEnv = process.env): VaultEnrollConfig {
  const backend: BackendConfig = { ...config.backend }
  if (env.VAULT_ENROLL_BACKEND_URL) backend.url = env.VAULT_ENROLL_BACKEND_URL
  if (env.VAULT_ENROLL_PASSPHRASE) backend.passphrase = env.VAULT_ENROLL_PASSPHRASE
  return { ...config, backend }
}

/**
 * Load configuration from the nearest .vault-enroll/config.yaml
 *
 * A relative vault.file is resolved against the project root (the directory
 * holding .vault-enroll).
 *
 * @param configPath - explicit config file; must exist when given
 */
export function loadConfig(startDir?: string, configPath?: string): VaultEnrollConfig {
  let filePath: string
  if (configPath) {
    filePath = path.resolve(configPath)
  } else {
    const configDir = findConfigDir(startDir)
    if (!configDir) {
      return applyEnvOverrides(mergeConfig(DEFAULT_CONFIG, {}))
    }
    filePath = path.join(configDir, CONFIG_FILE)
  }

  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile(filePath))

  const localConfig = loadConfigFile(path.join(path.dirname(filePath), CONFIG_LOCAL_FILE), false)
  config = mergeConfig(config, localConfig)

  const file = config.vault?.file
  if (file && !path.isAbsolute(file)) {
    const projectRoot = path.dirname(path.dirname(filePath))
    config = { ...config, vault: { ...config.vault, file: path.resolve(projectRoot, file) } }
  }

  return applyEnvOverrides(config)
}

export interface VaultFlags {
  /** --vault-list */
  vaultList?: string
  /** --vault-file */
  vaultFile?: string
  /** --vault-item, one "vault:item" per entry */
  vaultItems?: string[]
}

/**
 * Build the handler's option set. Any vault flag replaces the config's
 * vault section as a whole.
 */
export function buildVaultOptionSet(config: VaultEnrollConfig, flags: VaultFlags = {}): VaultOptionSet {
  const vaultItems = flags.vaultItems ?? []
  const fromFlags = Boolean(flags.vaultList || flags.vaultFile || vaultItems.length > 0)

  if (fromFlags) {
    return {
      bootstrap_vault_json: flags.vaultList,
      bootstrap_vault_file: flags.vaultFile ? path.resolve(flags.vaultFile) : undefined,
      bootstrap_vault_item: vaultItems.length > 0 ? parseVaultItemFlags(vaultItems) : undefined
    }
  }

  return {
    bootstrap_vault_json: config.vault?.json,
    bootstrap_vault_file: config.vault?.file,
    bootstrap_vault_item: config.vault?.items
  }
}
