/**
 * @crowdfund/core - Domain logic for the crowdfunding escrow
 *
 * Campaign state machine, contribution ledger and settlement protocol,
 * consumed by whatever surface hosts the campaigns.
 */

export * from './campaigns/index.js';
