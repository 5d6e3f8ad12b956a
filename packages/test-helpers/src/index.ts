/**
 * si-vault-test-helpers — Test utilities for si-vault consumers.
 *
 * @packageDocumentation
 */

export { InMemorySunStore } from './in-memory-sun.js'
export type { SunStoreCall } from './in-memory-sun.js'
export { TestVault } from './test-vault.js'
export type { TestRuntime, TestVaultOptions } from './test-vault.js'
