/**
 * Domain model exports.
 */

export * from './document';
export * from './envelope';
export * from './errors';
