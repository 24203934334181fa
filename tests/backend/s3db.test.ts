/**
 * Tests for s3db.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import os from 'node:os'
import {
  CLIENTS_RESOURCE,
  DEFAULT_CONNECTION_STRING,
  S3DB_MODULE,
  S3dbConnection,
  VAULT_ITEMS_RESOURCE,
  generateItemId,
  isS3dbModule,
  maskCredentials
} from '../../src/backend/s3db.js'
import { ConnectionError, MissingDependencyError } from '../../src/lib/errors.js'
import { createFakeS3db } from '../helpers/fake-s3db.js'

describe('s3db backend', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('maskCredentials', () => {
    it('should mask the secret in a URL', () => {
      expect(maskCredentials('s3://test-key:test-secret@vaults/store')).toBe('s3://test-key:***@vaults/store')
    })

    it('should leave URLs without credentials alone', () => {
      expect(maskCredentials('file:///var/lib/vault-enroll')).toBe('file:///var/lib/vault-enroll')
    })
  })

  describe('generateItemId', () => {
    it('should encode vault and item as base64url', () => {
      expect(generateItemId('certs', 'web')).toBe('Y2VydHN8d2Vi')
    })

    it('should keep the vault and item boundary', () => {
      expect(generateItemId('ab', 'c')).not.toBe(generateItemId('a', 'bc'))
    })

    it('should stay path safe', () => {
      expect(generateItemId('??>', '~~~')).toBe('Pz8-fH5-fg')
    })
  })

  describe('isS3dbModule', () => {
    it('should accept a module exporting an S3db class', () => {
      expect(isS3dbModule(createFakeS3db().module)).toBe(true)
    })

    it('should reject anything else', () => {
      expect(isS3dbModule(null)).toBe(false)
      expect(isS3dbModule({})).toBe(false)
      expect(isS3dbModule({ S3db: 'nope' })).toBe(false)
    })
  })

  describe('S3dbConnection', () => {
    it('should default to a local file store', () => {
      const connection = new S3dbConnection()
      expect(connection.getConnectionString()).toBe(DEFAULT_CONNECTION_STRING)
      expect(DEFAULT_CONNECTION_STRING).toBe(`file://${os.homedir()}/.vault-enroll/store`)
    })

    it('should import the lite build and connect once', async () => {
      const fake = createFakeS3db()
      const importModule = vi.fn(async (_specifier: string): Promise<unknown> => fake.module)
      const connection = new S3dbConnection({
        connectionString: 'memory://vaults',
        passphrase: 'test-secret',
        importModule
      })

      const first = await connection.open()
      const second = await connection.open()

      expect(first).toBe(second)
      expect(importModule).toHaveBeenCalledTimes(1)
      expect(importModule).toHaveBeenCalledWith(S3DB_MODULE)
      expect(fake.instances).toHaveLength(1)
      expect(fake.instances[0].options).toEqual({
        connectionString: 'memory://vaults',
        passphrase: 'test-secret',
        logLevel: 'silent'
      })
      expect(fake.instances[0].connected).toBe(true)
      expect(connection.isConnected()).toBe(true)
    })

    it('should create the clients and vault items resources', async () => {
      const fake = createFakeS3db()
      const connection = new S3dbConnection({ importModule: async () => fake.module })

      await connection.open()

      expect([...fake.instances[0].resources.keys()]).toEqual([CLIENTS_RESOURCE, VAULT_ITEMS_RESOURCE])
      expect(fake.instances[0].resources.get(VAULT_ITEMS_RESOURCE)?.schema.behavior).toBe('body-overflow')
    })

    it('should report a missing package', async () => {
      const connection = new S3dbConnection({
        importModule: async () => {
          throw new Error("Cannot find package 's3db.js'")
        }
      })

      const failure = connection.open()
      await expect(failure).rejects.toBeInstanceOf(MissingDependencyError)
      await expect(failure).rejects.toThrow('Cannot configure vault items when the s3db.js package is not installed')
      expect(connection.isConnected()).toBe(false)
    })

    it('should report a module without the S3db export', async () => {
      const connection = new S3dbConnection({ importModule: async () => ({ default: {} }) })
      await expect(connection.open()).rejects.toBeInstanceOf(MissingDependencyError)
    })

    it('should wrap connection failures and mask credentials', async () => {
      const fake = createFakeS3db({ connectError: new Error('access denied') })
      const connection = new S3dbConnection({
        connectionString: 's3://test-key:test-secret@vaults',
        importModule: async () => fake.module
      })

      const failure = connection.open()
      await expect(failure).rejects.toBeInstanceOf(ConnectionError)
      await expect(failure).rejects.toThrow('Failed to connect to backend s3://test-key:***@vaults: access denied')
      expect(connection.isConnected()).toBe(false)
    })

    it('should log masked progress when verbose', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
      const fake = createFakeS3db()
      const connection = new S3dbConnection({
        connectionString: 's3://test-key:test-secret@vaults',
        verbose: true,
        importModule: async () => fake.module
      })

      await connection.open()

      expect(stderr.mock.calls).toEqual([
        ['[vault-enroll] Connecting to: s3://test-key:***@vaults'],
        ['[vault-enroll] Connected to: s3://test-key:***@vaults']
      ])
      expect(fake.instances[0].options.logLevel).toBe('debug')
    })

    it('should disconnect on close and reopen afterwards', async () => {
      const fake = createFakeS3db()
      const connection = new S3dbConnection({ importModule: async () => fake.module })

      await connection.open()
      await connection.close()

      expect(fake.instances[0].disconnected).toBe(true)
      expect(connection.isConnected()).toBe(false)

      await connection.open()
      expect(fake.instances).toHaveLength(2)
    })

    it('should do nothing when closing an unopened connection', async () => {
      const connection = new S3dbConnection({ importModule: async () => createFakeS3db().module })
      await expect(connection.close()).resolves.toBeUndefined()
    })
  })
})
