/**
 * Client directory on top of the s3db.js "clients" resource
 */

import type { ClientDirectory, ClientRecord, SearchKind } from '../types.js'
import { compileSearchQuery, exactClientName, parseSearchQuery } from '../lib/search-query.js'
import type { S3dbConnection, S3dbRecord } from './s3db.js'

const LIST_LIMIT = 1000

function toClientRecord(record: S3dbRecord): ClientRecord | null {
  const { name, publicKey, admin } = record
  if (typeof name !== 'string' || !name) return null

  const client: ClientRecord = { name }
  if (typeof publicKey === 'string') client.publicKey = publicKey
  if (typeof admin === 'boolean') client.admin = admin
  return client
}

export class S3dbClientDirectory implements ClientDirectory {
  constructor(private readonly connection: S3dbConnection) {}

  /**
   * Search registered clients
   *
   * An exact name:<x> filter is a single lookup by id; anything else lists
   * the resource and matches in memory.
   */
  async search(_kind: SearchKind, filter: string): Promise<ClientRecord[]> {
    const query = parseSearchQuery(filter)
    const { clients } = await this.connection.open()

    const name = exactClientName(query)
    if (name !== null) {
      const found = await clients.getOrNull(name)
      const client = found ? toClientRecord(found) : null
      return client ? [client] : []
    }

    const matches = compileSearchQuery(query)
    const records = await clients.list({ limit: LIST_LIMIT })
    const results: ClientRecord[] = []
    for (const record of records) {
      const client = toClientRecord(record)
      if (client && matches(record)) {
        results.push(client)
      }
    }
    return results
  }

  /**
   * Insert or update a client, keyed by name
   */
  async register(client: ClientRecord): Promise<ClientRecord> {
    const { clients } = await this.connection.open()
    const existing = await clients.getOrNull(client.name)

    const data: S3dbRecord = { ...client }
    const saved = existing
      ? await clients.update(client.name, data)
      : await clients.insert({ id: client.name, ...data })

    return toClientRecord(saved) ?? client
  }
}
