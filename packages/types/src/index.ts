/**
 * Centralized type definitions for the rvsim workspace
 *
 * Single source of truth for the interfaces and result helpers shared by the
 * core and cpu packages.
 */

// Register-immediate instruction types
export * from './cpu'
// Safe result tuples
export * from './safe'
