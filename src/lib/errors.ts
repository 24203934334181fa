/**
 * vault-enroll Error Hierarchy
 *
 * Hierarchy:
 *   VaultEnrollError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   └── InvalidVaultSpecError
 *   ├── DependencyError (optional integrations)
 *   │   └── MissingDependencyError
 *   ├── BackendError (backend connectivity)
 *   │   └── ConnectionError
 *   ├── ValidationError (input validation)
 *   │   ├── MissingNodeNameError
 *   │   ├── InvalidNodeNameError
 *   │   ├── InvalidVaultItemFlagError
 *   │   └── InvalidSearchQueryError
 *   └── OperationError (operational failures)
 *       └── VaultItemNotFoundError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all vault-enroll errors
 */
export class VaultEnrollError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'VaultEnrollError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends VaultEnrollError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when an explicitly requested config file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(`Config file not found: ${searchedPath}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Create .vault-enroll/config.yaml or drop the config path override',
      context: { searchedPath }
    })
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .vault-enroll/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when a vault specification is not a map of vault names to item names
 */
export class InvalidVaultSpecError extends ConfigError {
  constructor(reason: string, vault?: string) {
    super(
      vault ? `Invalid vault specification for "${vault}": ${reason}` : `Invalid vault specification: ${reason}`,
      'INVALID_VAULT_SPEC',
      {
        suggestion: 'Use a JSON object like {"vault1": "item", "vault2": ["item1", "item2"]}',
        context: vault ? { vault } : undefined
      }
    )
    this.name = 'InvalidVaultSpecError'
  }
}

// =============================================================================
// Dependency Errors
// =============================================================================

export class DependencyError extends VaultEnrollError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'DependencyError'
  }
}

/**
 * Thrown when the vault store integration cannot be loaded
 */
export class MissingDependencyError extends DependencyError {
  readonly dependency: string

  constructor(dependency: string, cause?: unknown) {
    super(
      `Cannot configure vault items when the ${dependency} package is not installed`,
      'MISSING_DEPENDENCY',
      {
        suggestion: `Install it with "npm install ${dependency}"`,
        context: { dependency },
        cause
      }
    )
    this.name = 'MissingDependencyError'
    this.dependency = dependency
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

export class BackendError extends VaultEnrollError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'BackendError'
  }
}

/**
 * Thrown when the backend refuses the connection
 */
export class ConnectionError extends BackendError {
  constructor(url: string, reason: string, cause?: unknown) {
    super(`Failed to connect to backend ${url}: ${reason}`, 'CONNECTION_FAILED', {
      suggestion: 'Check your backend URL and credentials',
      context: { url },
      cause
    })
    this.name = 'ConnectionError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends VaultEnrollError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when a grant is requested without a node name
 */
export class MissingNodeNameError extends ValidationError {
  constructor() {
    super('Node name required and not supplied', 'MISSING_NODE_NAME', {
      suggestion: 'Pass the name the node registered its client under'
    })
    this.name = 'MissingNodeNameError'
  }
}

/**
 * Thrown when a node name would be read as a search pattern
 */
export class InvalidNodeNameError extends ValidationError {
  constructor(nodeName: string) {
    super(`Invalid node name "${nodeName}": wildcards and whitespace are not allowed`, 'INVALID_NODE_NAME', {
      suggestion: 'Pass the exact name the node registered its client under',
      context: { nodeName }
    })
    this.name = 'InvalidNodeNameError'
  }
}

/**
 * Thrown when a --vault-item value is not "vault:item"
 */
export class InvalidVaultItemFlagError extends ValidationError {
  constructor(value: string) {
    super(`Invalid vault item "${value}"`, 'INVALID_VAULT_ITEM', {
      suggestion: 'Use the form vault:item',
      context: { value }
    })
    this.name = 'InvalidVaultItemFlagError'
  }
}

/**
 * Thrown when a directory search filter cannot be parsed
 */
export class InvalidSearchQueryError extends ValidationError {
  constructor(query: string, reason: string) {
    super(`Invalid search query "${query}": ${reason}`, 'INVALID_SEARCH_QUERY', {
      suggestion: 'Use field:value terms joined by AND, e.g. name:web-01',
      context: { query }
    })
    this.name = 'InvalidSearchQueryError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends VaultEnrollError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

/**
 * Thrown when a vault item does not exist in the store
 */
export class VaultItemNotFoundError extends OperationError {
  constructor(vault: string, item: string) {
    super(`Vault item "${vault}/${item}" not found`, 'VAULT_ITEM_NOT_FOUND', {
      suggestion: 'Create the item in the vault before granting access to it',
      context: { vault, item }
    })
    this.name = 'VaultItemNotFoundError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isVaultEnrollError(error: unknown): error is VaultEnrollError {
  return error instanceof VaultEnrollError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isDependencyError(error: unknown): error is DependencyError {
  return error instanceof DependencyError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isVaultEnrollError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}
