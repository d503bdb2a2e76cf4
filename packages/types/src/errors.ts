/**
 * Error identifiers
 *
 * String codes carried in the message of errors returned through `Safe`.
 * The execution engine itself never fails; these cover the load and
 * configuration boundary only.
 */

/**
 * Program load errors
 */
export const LOAD_ERRORS = {
  INVALID_WORD: 'invalid_word',
  INVALID_BASE_ADDRESS: 'invalid_base_address',
  INVALID_STEP_BUDGET: 'invalid_step_budget',
} as const

export type LoadError = (typeof LOAD_ERRORS)[keyof typeof LOAD_ERRORS]

/**
 * Environment configuration errors
 */
export const CONFIG_ERRORS = {
  INVALID_ENVIRONMENT: 'invalid_environment',
  INVALID_BASE_ADDRESS: 'invalid_base_address',
} as const

export type ConfigError = (typeof CONFIG_ERRORS)[keyof typeof CONFIG_ERRORS]
