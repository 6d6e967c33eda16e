/**
 * Store client contract and its implementations.
 */

export * from './store-client';
export * from './filter-expression';
export * from './memory-store';
export * from './v3io-client';
