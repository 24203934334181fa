/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): Pretty UI with tables, colors
 * - Pipe: Clean output, no UI elements, data only to stdout
 *
 * The module itself satisfies the handler's Ui collaborator (info + warn).
 */

import { Table, renderToString } from 'tuiuiu.js'
import { c, symbols } from './lib/colors.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

let quiet = false

/**
 * Suppress informational messages (warnings and errors still shown)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

export function isQuiet(): boolean {
  return quiet
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quiet) {
    console.error(message)
  }
}

/**
 * Progress message, shown unless quiet
 */
export function info(message: string): void {
  if (!quiet) {
    console.error(`${symbols.info} ${c.info(message)}`)
  }
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[vault-enroll] ${message}`)
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`${symbols.error} ${c.error(message)}`)
}

/**
 * Log success message (only in TTY mode)
 */
export function success(message: string): void {
  if (isTTY && !quiet) {
    console.error(`${symbols.success} ${c.success(message)}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`${symbols.warning} ${c.warning(`Warning: ${message}`)}`)
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    // Simple tab-separated output for pipes
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => row[col.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  // Pretty table for TTY using tuiuiu.js
  const table = Table({
    columns: columns.map(col => ({
      key: col.key,
      header: col.header,
      align: col.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}
