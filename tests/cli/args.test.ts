/**
 * Tests for args.ts
 */

import { describe, it, expect } from 'vitest'
import { splitVaultItems, toCliArgs } from '../../src/cli/args.js'

describe('cli args', () => {
  describe('toCliArgs', () => {
    it('should map a grant invocation', () => {
      const args = toCliArgs({
        command: ['grant'],
        positional: { node: 'web-01' },
        options: {
          help: false,
          version: false,
          backend: 'memory://test',
          verbose: true,
          'vault-item': 'certs:web',
          interval: 250,
          'dry-run': true,
          json: false
        }
      })

      expect(args).toEqual({
        command: ['grant'],
        node: 'web-01',
        help: false,
        version: false,
        backend: 'memory://test',
        config: undefined,
        verbose: true,
        quiet: false,
        vaultList: undefined,
        vaultFile: undefined,
        vaultItem: 'certs:web',
        interval: 250,
        dryRun: true,
        json: false
      })
    })

    it('should parse numeric strings for the interval', () => {
      const args = toCliArgs({ command: ['grant'], positional: {}, options: { interval: '500' } })
      expect(args.interval).toBe(500)
    })

    it('should drop an interval that is not a number', () => {
      const args = toCliArgs({ command: ['grant'], positional: {}, options: { interval: 'soon' } })
      expect(args.interval).toBeUndefined()
    })

    it('should treat empty strings as absent', () => {
      const args = toCliArgs({ command: ['grant'], positional: { node: '' }, options: { 'vault-list': '' } })
      expect(args.node).toBeUndefined()
      expect(args.vaultList).toBeUndefined()
    })

    it('should not share the command array', () => {
      const command = ['grant']
      const args = toCliArgs({ command, positional: {}, options: {} })
      command.push('extra')
      expect(args.command).toEqual(['grant'])
    })
  })

  describe('splitVaultItems', () => {
    it('should split and trim comma-separated pairs', () => {
      expect(splitVaultItems('passwords:root, certs:web')).toEqual(['passwords:root', 'certs:web'])
    })

    it('should drop empty entries', () => {
      expect(splitVaultItems('a:b,,  ,c:d,')).toEqual(['a:b', 'c:d'])
    })

    it('should return nothing for no value', () => {
      expect(splitVaultItems()).toEqual([])
      expect(splitVaultItems('')).toEqual([])
    })
  })
})
