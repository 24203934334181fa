/**
 * Authorization updater
 *
 * Grants a client access to each vault item in turn. Failures are not caught:
 * the first load or save error ends the run, leaving earlier items updated.
 */

import type { VaultItem, VaultStore, VaultTarget } from '../types.js'
import { clientNameFilter } from './search-query.js'

/**
 * Load one item, authorize the client on it and save it
 */
export async function updateVaultItem(
  store: VaultStore,
  target: VaultTarget,
  nodeName: string
): Promise<VaultItem> {
  const item = await store.load(target.vault, target.item)
  item.setAuthorizedClients(clientNameFilter(nodeName))
  await item.save()
  return item
}

/**
 * Update every target in order
 *
 * @returns the targets that were saved
 */
export async function updateVaultItems(
  store: VaultStore,
  targets: VaultTarget[],
  nodeName: string
): Promise<VaultTarget[]> {
  const updated: VaultTarget[] = []

  for (const target of targets) {
    await updateVaultItem(store, target, nodeName)
    updated.push(target)
  }

  return updated
}
