/**
 * vault-enroll grant <node>
 *
 * Waits for the node's client to become searchable, then authorizes it on
 * every requested vault item.
 */

import type { CLIArgs } from '../args.js'
import { splitVaultItems } from '../args.js'
import type { VaultEnrollConfig, VaultTarget } from '../../types.js'
import { VaultHandler } from '../../handler.js'
import { buildVaultOptionSet } from '../../lib/config-loader.js'
import { S3dbConnection, maskCredentials } from '../../backend/s3db.js'
import { S3dbClientDirectory } from '../../backend/directory.js'
import { s3dbVaultStoreLoader } from '../../backend/vault-store.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface GrantContext {
  args: CLIArgs
  config: VaultEnrollConfig
}

function printTargets(nodeName: string, targets: VaultTarget[], json: boolean): void {
  if (json) {
    ui.output(JSON.stringify({ node: nodeName, items: targets }, null, 2))
    return
  }

  ui.output(ui.formatTable(
    [
      { key: 'vault', header: 'VAULT' },
      { key: 'item', header: 'ITEM' },
      { key: 'client', header: 'CLIENT' }
    ],
    targets.map(target => ({ vault: target.vault, item: target.item, client: nodeName }))
  ))
}

export async function runGrant(context: GrantContext): Promise<void> {
  const { args, config } = context
  const nodeName = args.node ?? ''

  const options = buildVaultOptionSet(config, {
    vaultList: args.vaultList,
    vaultFile: args.vaultFile,
    vaultItems: splitVaultItems(args.vaultItem)
  })

  const connection = new S3dbConnection({
    connectionString: args.backend ?? config.backend?.url,
    passphrase: config.backend?.passphrase,
    verbose: args.verbose
  })
  const directory = new S3dbClientDirectory(connection)

  const handler = new VaultHandler({
    options,
    ui,
    directory,
    loadStore: s3dbVaultStoreLoader(connection, directory),
    pollInterval: args.interval ?? config.directory?.poll_interval
  })

  if (!handler.doingVault()) {
    ui.log('No vault items requested, nothing to do')
    return
  }

  if (args.dryRun) {
    handler.sanityCheck()
    const targets = handler.vaultTargets()
    ui.log(`${c.muted('Dry run:')} would authorize ${c.node(nodeName || '<node>')} on ${targets.length} item(s)`)
    printTargets(nodeName, targets, args.json)
    return
  }

  try {
    ui.verbose(`Granting ${nodeName} access via ${maskCredentials(connection.getConnectionString())}`, args.verbose)
    const result = await handler.run(nodeName)
    ui.success(`Authorized ${c.node(nodeName)} on ${result.updated.length} vault item(s)`)
    printTargets(nodeName, result.updated, args.json)
  } finally {
    await connection.close()
  }
}
