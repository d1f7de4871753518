/**
 * @tessera/types - Shared type definitions for the Tessera note ledger
 *
 * This is the leaf package in the dependency tree.
 * Every other @tessera/* package depends on this one.
 */

export * from './common.js';
export * from './notes.js';
export * from './proofs.js';
export * from './ledger.js';
export * from './events.js';
export * from './errors.js';
