/**
 * rvsim core package
 *
 * Ambient stack shared by the workspace: logging, environment loading and
 * 32-bit word utilities.
 */

export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
// Export Zod schemas
export * from './zod'
