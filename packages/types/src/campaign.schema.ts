/**
 * Campaign input schemas
 * Used to validate operation arguments before they reach the ledger
 */

import { z } from 'zod';

/**
 * Identity of an owner or contributor (wallet address, account id, ...)
 */
export const IdentitySchema = z
  .string()
  .trim()
  .min(1, 'Identity is required')
  .max(256, 'Identity must be 256 characters or less');

export type Identity = z.infer<typeof IdentitySchema>;

/**
 * Whole, non-negative amount in the campaign's smallest unit
 */
export const AmountSchema = z
  .number()
  .int('Amount must be a whole number')
  .nonnegative('Amount cannot be negative')
  .max(Number.MAX_SAFE_INTEGER, 'Amount exceeds the safe integer range');

export const PositiveAmountSchema = AmountSchema.refine(
  (amount) => amount > 0,
  'Amount must be greater than zero'
);

// Parameters accepted from the registry when a campaign is created
export const CreateCampaignRequestSchema = z.object({
  owner: IdentitySchema,
  goalAmount: PositiveAmountSchema,
});

export type CreateCampaignRequest = z.infer<typeof CreateCampaignRequestSchema>;

export const ContributeRequestSchema = z.object({
  contributor: IdentitySchema,
  amount: PositiveAmountSchema,
});

export type ContributeRequest = z.infer<typeof ContributeRequestSchema>;
