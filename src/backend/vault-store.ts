/**
 * Vault store on top of the s3db.js "vault-items" resource
 *
 * An item's access list is driven by a search query: saving resolves the
 * query through the client directory and records every matching client.
 * Clients authorized earlier keep their access.
 */

import type { ClientDirectory, VaultItem, VaultStore } from '../types.js'
import { VaultItemNotFoundError } from '../lib/errors.js'
import { generateItemId, type S3dbConnection, type S3dbRecord, type S3dbResource } from './s3db.js'

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

export class S3dbVaultItem implements VaultItem {
  private searchQuery: string | null
  private clients: string[]

  constructor(
    private readonly resource: S3dbResource,
    private readonly directory: ClientDirectory,
    private readonly id: string,
    readonly vault: string,
    readonly name: string,
    record: S3dbRecord
  ) {
    const { searchQuery } = record
    this.searchQuery = typeof searchQuery === 'string' ? searchQuery : null
    this.clients = stringList(record.clients)
  }

  getSearchQuery(): string | null {
    return this.searchQuery
  }

  getClients(): string[] {
    return [...this.clients]
  }

  setAuthorizedClients(filter: string): void {
    this.searchQuery = filter
  }

  /**
   * Resolve the search query and persist the access list
   */
  async save(): Promise<void> {
    const clients = [...this.clients]
    if (this.searchQuery) {
      const matches = await this.directory.search('client', this.searchQuery)
      for (const client of matches) {
        if (!clients.includes(client.name)) {
          clients.push(client.name)
        }
      }
    }

    await this.resource.update(this.id, {
      searchQuery: this.searchQuery ?? undefined,
      clients
    })
    this.clients = clients
  }
}

export class S3dbVaultStore implements VaultStore {
  constructor(
    private readonly connection: S3dbConnection,
    private readonly directory: ClientDirectory
  ) {}

  async load(vault: string, item: string): Promise<S3dbVaultItem> {
    const { items } = await this.connection.open()
    const id = generateItemId(vault, item)
    const record = await items.getOrNull(id)

    if (!record) {
      throw new VaultItemNotFoundError(vault, item)
    }

    return new S3dbVaultItem(items, this.directory, id, vault, item, record)
  }

  /**
   * Create an empty item (no authorized clients)
   */
  async create(vault: string, item: string): Promise<S3dbVaultItem> {
    const { items } = await this.connection.open()
    const id = generateItemId(vault, item)
    const record = await items.insert({ id, vault, item, clients: [] })
    return new S3dbVaultItem(items, this.directory, id, vault, item, record)
  }
}

/**
 * Loader for the handler: opens the connection, which imports s3db.js
 */
export function s3dbVaultStoreLoader(
  connection: S3dbConnection,
  directory: ClientDirectory
): () => Promise<VaultStore> {
  return async () => {
    await connection.open()
    return new S3dbVaultStore(connection, directory)
  }
}
