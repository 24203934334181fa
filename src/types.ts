/**
 * vault-enroll Types
 */

// =============================================================================
// Vault specification
// =============================================================================

/**
 * Items to update inside one vault: a single item name or a list of names
 */
export type VaultItemsInput = string | string[]

/**
 * Vault specification as written by users
 *
 * ```json
 * { "vault1": "item", "vault2": ["item1", "item2"] }
 * ```
 */
export type VaultSpecInput = Record<string, VaultItemsInput>

/**
 * Items of one vault after validation
 */
export type VaultItems =
  | { kind: 'single'; item: string }
  | { kind: 'list'; items: string[] }

/**
 * A single (vault, item) pair to grant access to
 */
export interface VaultTarget {
  vault: string
  item: string
}

/**
 * Merged option set the handler reads its vault work from.
 * Supplied once at construction and never mutated.
 */
export interface VaultOptionSet {
  /** Serialized JSON vault specification */
  readonly bootstrap_vault_json?: string | null
  /** Path to a file holding a JSON vault specification */
  readonly bootstrap_vault_file?: string | null
  /** Already parsed vault specification */
  readonly bootstrap_vault_item?: VaultSpecInput | null
}

export type VaultOptionKey = keyof VaultOptionSet

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Output sink for human-readable messages
 */
export interface Ui {
  info(message: string): void
  warn(message: string): void
}

/**
 * A client (node identity) registered in the directory
 */
export interface ClientRecord {
  name: string
  publicKey?: string
  admin?: boolean
}

export type SearchKind = 'client'

/**
 * Directory that answers "is client X searchable yet"
 */
export interface ClientDirectory {
  search(kind: SearchKind, filter: string): Promise<ClientRecord[]>
}

/**
 * An encrypted vault item loaded from the store
 */
export interface VaultItem {
  readonly vault: string
  readonly name: string
  /** Replace the search filter selecting the clients allowed to decrypt */
  setAuthorizedClients(filter: string): void
  save(): Promise<void>
}

/**
 * Store holding encrypted vault items
 */
export interface VaultStore {
  load(vault: string, item: string): Promise<VaultItem>
}

/**
 * Resolves the vault store. Rejects when the store integration is unavailable.
 */
export type VaultStoreLoader = () => Promise<VaultStore>

// =============================================================================
// Handler
// =============================================================================

export interface VaultHandlerOptions {
  options?: VaultOptionSet
  ui: Ui
  directory: ClientDirectory
  loadStore: VaultStoreLoader
  /** Delay before each directory query (ms) */
  pollInterval?: number
  sleep?: (ms: number) => Promise<void>
}

export interface VaultGrantResult {
  nodeName: string
  /** False when no vault input was given and nothing ran */
  performed: boolean
  updated: VaultTarget[]
}

// =============================================================================
// Configuration
// =============================================================================

export interface BackendConfig {
  /** s3db.js connection string (s3://, file://, memory://) */
  url?: string
  passphrase?: string
}

export interface DirectoryConfig {
  /** Milliseconds between discovery attempts */
  poll_interval?: number
}

export interface VaultConfig {
  json?: string
  file?: string
  items?: VaultSpecInput
}

/**
 * Contents of .vault-enroll/config.yaml
 */
export interface VaultEnrollConfig {
  version?: string
  backend?: BackendConfig
  directory?: DirectoryConfig
  vault?: VaultConfig
}
