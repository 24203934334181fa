/**
 * vault-enroll
 *
 * Grants freshly bootstrapped nodes access to encrypted vault items.
 *
 * @example
 * ```ts
 * import { VaultHandler, S3dbConnection, S3dbClientDirectory, s3dbVaultStoreLoader } from 'vault-enroll'
 *
 * const connection = new S3dbConnection({ connectionString: 's3://bucket/vaults?region=us-east-1' })
 * const directory = new S3dbClientDirectory(connection)
 * const handler = new VaultHandler({
 *   options: { bootstrap_vault_json: '{"passwords": ["root", "deploy"]}' },
 *   ui: { info: console.error, warn: console.error },
 *   directory,
 *   loadStore: s3dbVaultStoreLoader(connection, directory)
 * })
 *
 * await handler.run('web-01')
 * ```
 */

export { VaultHandler } from './handler.js'

export type {
  ClientDirectory,
  ClientRecord,
  SearchKind,
  Ui,
  VaultEnrollConfig,
  VaultGrantResult,
  VaultHandlerOptions,
  VaultItem,
  VaultItems,
  VaultItemsInput,
  VaultOptionKey,
  VaultOptionSet,
  VaultSpecInput,
  VaultStore,
  VaultStoreLoader,
  VaultTarget
} from './types.js'

export {
  VAULT_OPTION_PRIORITY,
  conflictWarning,
  normalizeVaultSpec,
  parseVaultItemFlags,
  parseVaultSpec,
  presentVaultOptions,
  readVaultSpec
} from './lib/vault-spec.js'

export {
  DEFAULT_POLL_INTERVAL,
  WAITING_MESSAGE,
  isClientSearchable,
  waitForClient
} from './lib/client-waiter.js'

export { updateVaultItem, updateVaultItems } from './lib/vault-updater.js'
export { CapabilityProbe } from './lib/store-probe.js'
export { clientNameFilter, parseSearchQuery, compileSearchQuery } from './lib/search-query.js'

export {
  loadConfig,
  findConfigDir,
  buildVaultOptionSet,
  DEFAULT_CONFIG
} from './lib/config-loader.js'

export { S3dbConnection, generateItemId, maskCredentials } from './backend/s3db.js'
export type { S3dbConnectionOptions } from './backend/s3db.js'
export { S3dbClientDirectory } from './backend/directory.js'
export { S3dbVaultStore, S3dbVaultItem, s3dbVaultStoreLoader } from './backend/vault-store.js'

export * from './lib/errors.js'
