/**
 * Directory search filters
 *
 * Supported syntax:
 *   name:web-01                 exact match
 *   name:web-*                  glob (* and ?)
 *   name:web-* AND admin:false  all terms must match
 *   *:*                         everything
 */

import { InvalidSearchQueryError } from './errors.js'

export interface SearchTerm {
  field: string
  value: string
}

export interface SearchQuery {
  /** Empty for *:* */
  terms: SearchTerm[]
}

/**
 * Filter selecting a single client by name
 */
export function clientNameFilter(name: string): string {
  return `name:${name}`
}

export function parseSearchQuery(query: string): SearchQuery {
  const trimmed = query.trim()
  if (!trimmed) {
    throw new InvalidSearchQueryError(query, 'query is empty')
  }
  if (trimmed === '*:*') {
    return { terms: [] }
  }

  const terms = trimmed.split(/\s+AND\s+/i).map(part => {
    const separator = part.indexOf(':')
    if (separator <= 0 || separator === part.length - 1) {
      throw new InvalidSearchQueryError(query, `expected field:value, got "${part}"`)
    }
    return {
      field: part.slice(0, separator),
      value: part.slice(separator + 1)
    }
  })

  return { terms }
}

function compileGlob(pattern: string): (value: string) => boolean {
  if (!/[*?]/.test(pattern)) {
    return value => value === pattern
  }
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&')
  const regex = new RegExp('^' + escaped.replace(/\*/g, '.*').replace(/\?/g, '.') + '$')
  return value => regex.test(value)
}

/**
 * Compile a query into a predicate over flat records.
 * Non-string fields are compared through their string form.
 */
export function compileSearchQuery(query: SearchQuery): (record: Record<string, unknown>) => boolean {
  const matchers = query.terms.map(term => ({
    field: term.field,
    test: compileGlob(term.value)
  }))

  return record => matchers.every(({ field, test }) => {
    const value = record[field]
    if (value === undefined || value === null) return false
    return test(String(value))
  })
}

/**
 * Name selected by a single exact name term, if that is all the query does
 */
export function exactClientName(query: SearchQuery): string | null {
  if (query.terms.length !== 1) return null
  const [term] = query.terms
  if (term.field !== 'name' || /[*?]/.test(term.value)) return null
  return term.value
}
