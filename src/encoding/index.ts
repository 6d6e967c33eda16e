/**
 * Document encoding: attribute flattening, filter building, YAML/JSON codec
 * and dot-path merge patches.
 */

export * from './attributes';
export * from './codec';
export * from './filter';
export * from './merge-patch';
