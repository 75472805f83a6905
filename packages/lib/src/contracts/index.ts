/**
 * Record Model Contracts
 *
 * @module contracts
 */

export * from './lead';
export * from './tracked-contact';
export * from './playlist';
