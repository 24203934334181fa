/**
 * Directory poller
 *
 * A freshly bootstrapped node registers its client before the directory has
 * indexed it. Vault items can only be granted to searchable clients, so we
 * spin until the client shows up. There is no timeout: registration latency
 * is unbounded and the operator interrupts the process to give up.
 */

import type { ClientDirectory, Ui } from '../types.js'
import { clientNameFilter } from './search-query.js'

export const DEFAULT_POLL_INTERVAL = 1000

export const WAITING_MESSAGE = 'Updating vault items, waiting for client to be searchable..'

export interface WaitForClientOptions {
  ui: Ui
  /** Delay before each query (ms) */
  interval?: number
  sleep?: (ms: number) => Promise<void>
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Query the directory once, after waiting one interval
 *
 * @returns true if the client is searchable
 */
export async function isClientSearchable(
  directory: ClientDirectory,
  nodeName: string,
  options: { interval?: number; sleep?: (ms: number) => Promise<void> } = {}
): Promise<boolean> {
  const { interval = DEFAULT_POLL_INTERVAL, sleep: wait = sleep } = options

  await wait(interval)
  const results = await directory.search('client', clientNameFilter(nodeName))
  return results.length > 0
}

/**
 * Resolve once the directory returns the client
 *
 * Every miss is reported through ui.info before the next attempt.
 */
export async function waitForClient(
  directory: ClientDirectory,
  nodeName: string,
  options: WaitForClientOptions
): Promise<void> {
  const { ui, ...pollOptions } = options

  while (!(await isClientSearchable(directory, nodeName, pollOptions))) {
    ui.info(WAITING_MESSAGE)
  }
}
