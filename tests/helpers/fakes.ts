/**
 * In-memory collaborators for handler tests
 */

import type { ClientDirectory, ClientRecord, SearchKind, Ui, VaultItem, VaultStore } from '../../src/types.js'

export class RecordingUi implements Ui {
  infos: string[] = []
  warns: string[] = []

  info(message: string): void {
    this.infos.push(message)
  }

  warn(message: string): void {
    this.warns.push(message)
  }
}

/**
 * Answers searches from a script; the last response repeats forever
 */
export class ScriptedDirectory implements ClientDirectory {
  queries: Array<{ kind: SearchKind; filter: string }> = []

  constructor(private responses: ClientRecord[][] = [[{ name: 'web-01' }]]) {}

  async search(kind: SearchKind, filter: string): Promise<ClientRecord[]> {
    this.queries.push({ kind, filter })
    const next = this.responses.length > 1 ? this.responses.shift() : this.responses[0]
    return next ?? []
  }
}

class RecordingItem implements VaultItem {
  filter: string | null = null

  constructor(
    readonly vault: string,
    readonly name: string,
    private readonly calls: string[],
    private readonly failSave: boolean
  ) {}

  setAuthorizedClients(filter: string): void {
    this.filter = filter
    this.calls.push(`clients ${this.vault}/${this.name} ${filter}`)
  }

  async save(): Promise<void> {
    if (this.failSave) {
      throw new Error(`save failed: ${this.vault}/${this.name}`)
    }
    this.calls.push(`save ${this.vault}/${this.name}`)
  }
}

/**
 * Records every load, authorization and save in order
 */
export class RecordingStore implements VaultStore {
  calls: string[] = []
  failSaveOn = new Set<string>()

  async load(vault: string, item: string): Promise<VaultItem> {
    this.calls.push(`load ${vault}/${item}`)
    return new RecordingItem(vault, item, this.calls, this.failSaveOn.has(`${vault}/${item}`))
  }
}
