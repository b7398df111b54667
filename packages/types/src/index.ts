/**
 * @crowdfund/types
 *
 * Shared zod schemas and inferred types for the campaign escrow packages.
 */

export * from './campaign.schema.js';
export * from './settings.schema.js';
