/**
 * Lead Scorer Contracts
 *
 * Re-exports all contract types and schemas.
 *
 * @module contracts
 */

export * from './scoring-result';
export * from './crm-sync';
