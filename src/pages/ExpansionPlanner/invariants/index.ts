/**
 * Expansion invariants
 *
 * Executable checks over catalogs and plans. They produce violations
 * (errors/warnings) instead of throwing.
 */

export * from './types';
export * from './catalogIntegrity';
export * from './planIntegrity';
