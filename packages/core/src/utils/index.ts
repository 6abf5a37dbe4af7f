/**
 * Utility exports for the rvsim core package
 */

// 32-bit word helpers
export * from './bits'
