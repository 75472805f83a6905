/**
 * Technographics Contracts
 *
 * @module technographics/contracts
 */

export * from './tech-signals';
