/**
 * Vault Handler
 *
 * Grants a newly bootstrapped node access to vault items:
 *
 *   work requested? -> warn on conflicting inputs -> resolve targets
 *     -> probe store -> wait for client to be searchable -> update items
 *
 * Nothing is attempted when no vault input is given.
 */

import type {
  ClientDirectory,
  Ui,
  VaultGrantResult,
  VaultHandlerOptions,
  VaultOptionSet,
  VaultStore,
  VaultTarget
} from './types.js'
import { InvalidNodeNameError, MissingNodeNameError } from './lib/errors.js'
import {
  conflictWarning,
  normalizeVaultSpec,
  presentVaultOptions,
  readVaultSpec
} from './lib/vault-spec.js'
import { DEFAULT_POLL_INTERVAL, sleep, waitForClient } from './lib/client-waiter.js'
import { updateVaultItems } from './lib/vault-updater.js'
import { CapabilityProbe } from './lib/store-probe.js'

// Would turn the name:<node> filter into a pattern or split it into terms
const UNSAFE_NODE_NAME = /[*?\s]/

export class VaultHandler {
  readonly options: Readonly<VaultOptionSet>
  private ui: Ui
  private directory: ClientDirectory
  private store: CapabilityProbe<VaultStore>
  private pollInterval: number
  private sleep: (ms: number) => Promise<void>
  private targets: VaultTarget[] | null = null

  constructor(options: VaultHandlerOptions) {
    this.options = Object.freeze({ ...options.options })
    this.ui = options.ui
    this.directory = options.directory
    this.store = new CapabilityProbe(options.loadStore)
    this.pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL
    this.sleep = options.sleep ?? sleep
  }

  /**
   * Whether any vault input was given
   */
  doingVault(): boolean {
    return presentVaultOptions(this.options).length > 0
  }

  /**
   * Warn when more than one vault input is given. Never throws.
   */
  sanityCheck(): void {
    const warning = conflictWarning(this.options)
    if (warning) {
      this.ui.warn(warning)
    }
  }

  /**
   * (vault, item) pairs to update, resolved on first call
   */
  vaultTargets(): VaultTarget[] {
    if (!this.targets) {
      this.targets = normalizeVaultSpec(readVaultSpec(this.options))
    }
    return this.targets
  }

  /**
   * Probe the vault store once per handler
   */
  requireVaultStore(): Promise<VaultStore> {
    return this.store.require()
  }

  /**
   * Update the vault items for a newly created node
   *
   * @param nodeName - name of the client the node registered
   */
  async run(nodeName: string): Promise<VaultGrantResult> {
    if (!this.doingVault()) {
      return { nodeName, performed: false, updated: [] }
    }

    this.sanityCheck()

    if (!nodeName) {
      throw new MissingNodeNameError()
    }
    if (UNSAFE_NODE_NAME.test(nodeName)) {
      throw new InvalidNodeNameError(nodeName)
    }

    const targets = this.vaultTargets()
    const store = await this.requireVaultStore()

    await waitForClient(this.directory, nodeName, {
      ui: this.ui,
      interval: this.pollInterval,
      sleep: this.sleep
    })

    const updated = await updateVaultItems(store, targets, nodeName)
    return { nodeName, performed: true, updated }
  }
}
