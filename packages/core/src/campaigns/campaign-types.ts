/**
 * Campaign Domain Types
 *
 * Type definitions shared by the ledger, state machine, settlement engine
 * and the Campaign composition root.
 */

import type { Identity } from '@crowdfund/types';

export type { Identity } from '@crowdfund/types';

export type CampaignStatus = 'active' | 'closed';

export type ClosureReason = 'goal_reached' | 'deadline_passed' | 'owner_closed';

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export type TransferResult =
  | { ok: true; reference?: string }
  | { ok: false; reason: string };

/**
 * Moves value out of escrow. May fail for reasons outside this system
 * (recipient rejects, provider unavailable); a rejected promise counts as a failure.
 *
 * Transfers run inside the campaign's lock. A transfer may start an operation
 * on the same campaign, but must not await it: that operation is queued behind
 * the one running the transfer, so awaiting it deadlocks the campaign.
 */
export interface TransferCapability {
  transfer(to: Identity, amount: number): Promise<TransferResult>;
}

/**
 * Mints one unique credential to `to` and returns its id.
 * Any rejection aborts the contribution that triggered it.
 */
export interface CredentialIssuer {
  issue(to: Identity): Promise<number>;
}

export interface LedgerReceipt {
  contributor: Identity;
  oldTotal: number;
  newTotal: number;
  firstContribution: boolean;
}

export interface Payout {
  recipient: Identity;
  amount: number;
  reference?: string;
}

export interface PayoutFailure {
  recipient: Identity;
  amount: number;
  reason: string;
}

export interface SettlementReport {
  settled: Payout[];
  failed: PayoutFailure[];
  /** Contributors whose balance was already zero */
  skipped: Identity[];
  totalSettled: number;
  totalFailed: number;
}

export interface ContributeResult {
  contributor: Identity;
  amount: number;
  newTotal: number;
  credentialIds: number[];
  goalReached: boolean;
}

export interface CampaignSnapshot {
  id: string;
  owner: Identity;
  goalAmount: number;
  currentAmount: number;
  escrowBalance: number;
  createdAt: Date;
  deadline: Date;
  status: CampaignStatus;
  closureReason: ClosureReason | null;
  contributorCount: number;
  credentialsIssued: number;
}
