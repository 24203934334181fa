/**
 * vault-enroll CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils
 * Supports NO_COLOR / FORCE_COLOR environment variables
 */

import { colorize, style } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  // Respect FORCE_COLOR
  if (process.env.FORCE_COLOR !== undefined) return true
  // Colored output goes to stderr
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const bold = (text: string): string => {
  if (!enabled) return text
  return style(text, 'bold')
}

const dim = (text: string): string => {
  if (!enabled) return text
  return style(text, 'dim')
}

/**
 * Help/version formatter for cli-args-parser
 */
export const enrollFormatter: Formatter = {
  'section-header': s => bold(s),
  'program-name': s => bold(color(s, 'cyan')),
  'version': s => color(s, 'cyan'),
  'description': s => s,
  'command-name': s => color(s, 'cyan'),
  'command-alias': s => color(s, 'gray'),
  'command-description': s => s,
  'option-flag': s => color(s, 'cyan'),
  'option-type': s => color(s, 'blue'),
  'option-default': s => dim(s),
  'option-description': s => s,
  'positional-name': s => color(s, 'blue'),
  'error-header': s => bold(color(s, 'red')),
  'error-message': s => color(s, 'red'),
  'error-option': s => color(s, 'cyan'),
}

// Semantic colors
export const c = {
  command: (text: string) => bold(color(text, 'cyan')),
  vault: (text: string) => color(text, 'blue'),
  item: (text: string) => color(text, 'cyan'),
  node: (text: string) => bold(color(text, 'cyan')),

  success: (text: string) => color(text, 'green'),
  error: (text: string) => color(text, 'red'),
  warning: (text: string) => color(text, 'yellow'),
  info: (text: string) => color(text, 'cyan'),

  header: (text: string) => bold(text),
  muted: (text: string) => dim(text),
}

export const symbols = {
  success: enabled ? color('✓', 'green') : '[OK]',
  error: enabled ? color('✗', 'red') : '[ERROR]',
  warning: enabled ? color('⚠', 'yellow') : '[WARN]',
  info: enabled ? color('ℹ', 'cyan') : '[INFO]',
  arrow: enabled ? color('→', 'cyan') : '->',
}
