/**
 * Domain model exports.
 */

export * from './analysis';
export * from './artifact';
export * from './audit';
export * from './errors';
export * from './refinement';
