/**
 * Campaign
 *
 * Composition root for one crowdfunding campaign. Wires the contribution
 * ledger, the state machine and the settlement engine behind the public
 * operations. Every operation runs inside the campaign's lock, so reads and
 * writes of two operations never interleave.
 */

import {
  ContributeRequestSchema,
  CreateCampaignRequestSchema,
  IdentitySchema,
  type CampaignSettings,
} from '@crowdfund/types';
import {
  createCampaignLogger,
  logger as defaultLogger,
  type Logger,
} from '@crowdfund/observability';
import { ContributionLedger } from './contribution-ledger.js';
import { CampaignStateMachine } from './campaign-state.js';
import { SettlementEngine } from './settlement-engine.js';
import { CampaignLock } from './campaign-lock.js';
import { CampaignEventEmitter } from './campaign-events.js';
import { parseOrThrow } from './campaign-validation.js';
import {
  IssuanceError,
  PermissionError,
  StateError,
  ValidationError,
  describeError,
} from './campaign-errors.js';
import {
  systemClock,
  type CampaignSnapshot,
  type Clock,
  type ContributeResult,
  type CredentialIssuer,
  type Identity,
  type LedgerReceipt,
  type Payout,
  type PayoutFailure,
  type SettlementReport,
  type TransferCapability,
} from './campaign-types.js';

export interface CampaignParams {
  id: string;
  owner: Identity;
  goalAmount: number;
  /** Creation time in ms; the deadline is this plus the configured duration */
  createdAt: number;
  settings: CampaignSettings;
  credentialIssuer: CredentialIssuer;
  transfer: TransferCapability;
  clock?: Clock;
  events?: CampaignEventEmitter;
  logger?: Logger;
}

export class Campaign {
  readonly id: string;
  readonly owner: Identity;
  readonly goalAmount: number;
  readonly createdAt: number;

  private readonly settings: CampaignSettings;
  private readonly issuer: CredentialIssuer;
  private readonly transfer: TransferCapability;
  private readonly events: CampaignEventEmitter;
  private readonly logger: Logger;

  private readonly ledger = new ContributionLedger();
  private readonly state: CampaignStateMachine;
  private readonly settlement: SettlementEngine;
  private readonly lock = new CampaignLock();

  private currentAmount = 0;
  private escrowBalance = 0;
  private credentialsIssued = 0;
  private lastCredentialId: number | null = null;
  private credentials = new Map<Identity, number[]>();
  private outstanding = new Map<Identity, PayoutFailure>();

  constructor(params: CampaignParams) {
    const request = parseOrThrow(CreateCampaignRequestSchema, {
      owner: params.owner,
      goalAmount: params.goalAmount,
    });

    this.id = params.id;
    this.owner = request.owner;
    this.goalAmount = request.goalAmount;
    this.createdAt = params.createdAt;
    this.settings = params.settings;
    this.issuer = params.credentialIssuer;
    this.transfer = params.transfer;
    this.logger = createCampaignLogger(params.id, params.logger ?? defaultLogger);
    this.events = params.events ?? new CampaignEventEmitter(this.logger);
    this.settlement = new SettlementEngine(this.logger);
    this.state = new CampaignStateMachine({
      goalAmount: request.goalAmount,
      deadline: params.createdAt + params.settings.durationSeconds * 1000,
      clock: params.clock ?? systemClock,
    });
  }

  get deadline(): Date {
    return new Date(this.state.deadline);
  }

  /**
   * Record a contribution and issue one credential per whole unit crossed
   *
   * Business rules:
   * - Campaign must be active (open and before its deadline)
   * - Amount must be at least the configured minimum
   * - Issuance failure aborts the whole contribution, ledger update included
   * - Reaching the goal closes the campaign as successful
   */
  contribute(contributor: Identity, amount: number): Promise<ContributeResult> {
    return this.lock.runExclusive(async () => {
      const request = parseOrThrow(ContributeRequestSchema, { contributor, amount });

      this.observeDeadline();
      if (!this.state.isActive()) {
        throw new StateError(
          `Contributions are not accepted: campaign is closed (${this.describeClosure()})`
        );
      }
      if (request.amount < this.settings.minContribution) {
        throw new ValidationError(
          `Contribution of ${request.amount} is below the minimum of ${this.settings.minContribution}`
        );
      }

      this.assertWithinAmountLimit(request.contributor, request.amount);

      const receipt = this.ledger.record(request.contributor, request.amount);

      let credentialIds: number[];
      try {
        credentialIds = await this.issueCredentials(receipt);
      } catch (error) {
        this.ledger.revert(receipt);
        throw error;
      }

      const owned = this.credentials.get(request.contributor) ?? [];
      this.credentials.set(request.contributor, [...owned, ...credentialIds]);
      this.credentialsIssued += credentialIds.length;
      this.currentAmount += request.amount;
      this.escrowBalance += request.amount;

      const goalReached = this.state.closeIfGoalReached(this.currentAmount);
      if (goalReached) {
        this.logger.info(
          { currentAmount: this.currentAmount, goalAmount: this.goalAmount },
          'Funding goal reached; campaign closed'
        );
      }

      this.events.emit({
        type: 'campaign.contributed',
        campaignId: this.id,
        contributor: request.contributor,
        amount: request.amount,
        credentialIds,
        goalReached,
      });

      return {
        contributor: request.contributor,
        amount: request.amount,
        newTotal: receipt.newTotal,
        credentialIds,
        goalReached,
      };
    });
  }

  /**
   * Owner cancels an active campaign and every contributor is refunded
   * Failed refunds are kept as outstanding and can be retried
   */
  close(caller: Identity): Promise<SettlementReport> {
    return this.lock.runExclusive(async () => {
      this.assertOwner(caller, 'close the campaign');

      this.observeDeadline();
      if (!this.state.isActive()) {
        throw new StateError(`Campaign cannot be closed: already closed (${this.describeClosure()})`);
      }

      this.state.closeByOwner();
      const report = await this.settlement.distributeAll(this.ledger, this.transfer);

      this.escrowBalance -= report.totalSettled;
      for (const failure of report.failed) {
        this.outstanding.set(failure.recipient, failure);
      }

      this.events.emit({
        type: 'campaign.closed',
        campaignId: this.id,
        owner: this.owner,
        reason: 'owner_closed',
        report,
      });

      return report;
    });
  }

  /**
   * Self-service refund after a campaign closed without reaching its goal
   * Repeat calls return a zero payout
   */
  refund(contributor: Identity): Promise<Payout> {
    return this.lock.runExclusive(async () => {
      const recipient = parseOrThrow(IdentitySchema, contributor);

      this.observeDeadline();
      if (!this.state.isClosed()) {
        throw new StateError('Refunds are only available after the campaign has closed');
      }
      if (!this.state.isFailed(this.currentAmount)) {
        throw new StateError('Refunds are not available: the campaign reached its goal');
      }

      const payout = await this.settlement.refundOne(this.ledger, recipient, this.transfer);
      if (payout.amount > 0) {
        this.escrowBalance -= payout.amount;
        this.events.emit({
          type: 'campaign.refunded',
          campaignId: this.id,
          contributor: recipient,
          amount: payout.amount,
        });
      }

      return payout;
    });
  }

  /**
   * Owner collects the pooled funds of a successful campaign
   * The tracked escrow balance drops by the amount paid, so a second call finds nothing
   */
  withdraw(caller: Identity): Promise<Payout> {
    return this.lock.runExclusive(async () => {
      this.assertOwner(caller, 'withdraw funds');

      this.observeDeadline();
      if (!this.state.isClosed()) {
        throw new StateError('Funds can only be withdrawn after the campaign has closed');
      }
      if (!this.state.isSuccessful(this.currentAmount)) {
        throw new StateError(
          `Funds cannot be withdrawn: campaign raised ${this.currentAmount} of its ${this.goalAmount} goal`
        );
      }
      if (this.escrowBalance === 0) {
        throw new StateError('Nothing left to withdraw');
      }

      const payout = await this.settlement.withdrawToOwner(
        this.owner,
        this.escrowBalance,
        this.transfer
      );
      this.escrowBalance -= payout.amount;

      this.events.emit({
        type: 'campaign.withdrawn',
        campaignId: this.id,
        owner: this.owner,
        amount: payout.amount,
      });

      return payout;
    });
  }

  /**
   * Retry the refunds that failed when the owner closed the campaign
   */
  retryFailedRefunds(): Promise<SettlementReport> {
    return this.lock.runExclusive(async () => {
      if (this.outstanding.size === 0) {
        throw new StateError('There are no failed refunds to retry');
      }

      const report = await this.settlement.retryFailures(
        [...this.outstanding.values()],
        this.transfer
      );

      for (const payout of report.settled) {
        this.outstanding.delete(payout.recipient);
        this.escrowBalance -= payout.amount;
        this.events.emit({
          type: 'campaign.refunded',
          campaignId: this.id,
          contributor: payout.recipient,
          amount: payout.amount,
        });
      }
      for (const failure of report.failed) {
        this.outstanding.set(failure.recipient, failure);
      }

      return report;
    });
  }

  isActive(): boolean {
    return this.state.isActive();
  }

  isClosed(): boolean {
    return this.state.isClosed();
  }

  isSuccessful(): boolean {
    return this.state.isSuccessful(this.currentAmount);
  }

  isFailed(): boolean {
    return this.state.isFailed(this.currentAmount);
  }

  balanceOf(contributor: Identity): number {
    return this.ledger.balanceOf(parseOrThrow(IdentitySchema, contributor));
  }

  credentialsOf(contributor: Identity): number[] {
    return [...(this.credentials.get(parseOrThrow(IdentitySchema, contributor)) ?? [])];
  }

  contributors(): readonly Identity[] {
    return this.ledger.contributors();
  }

  outstandingRefunds(): PayoutFailure[] {
    return [...this.outstanding.values()];
  }

  /** Sum of ledger balances; O(n), for consistency checks */
  totalOutstanding(): number {
    return this.ledger.totalOutstanding();
  }

  snapshot(): CampaignSnapshot {
    return {
      id: this.id,
      owner: this.owner,
      goalAmount: this.goalAmount,
      currentAmount: this.currentAmount,
      escrowBalance: this.escrowBalance,
      createdAt: new Date(this.createdAt),
      deadline: this.deadline,
      status: this.state.isClosed() ? 'closed' : 'active',
      closureReason: this.state.closureReason ?? (this.state.isClosed() ? 'deadline_passed' : null),
      contributorCount: this.ledger.contributors().length,
      credentialsIssued: this.credentialsIssued,
    };
  }

  private async issueCredentials(receipt: LedgerReceipt): Promise<number[]> {
    const unit = this.settings.credentialUnit;
    const count = Math.floor(receipt.newTotal / unit) - Math.floor(receipt.oldTotal / unit);
    const issued: number[] = [];
    let lastId: number | null = this.lastCredentialId;

    for (let i = 0; i < count; i += 1) {
      let id: number;
      try {
        id = await this.issuer.issue(receipt.contributor);
      } catch (error) {
        this.logOrphanedCredentials(receipt.contributor, issued);
        throw new IssuanceError(receipt.contributor, describeError(error), { cause: error });
      }

      if (!Number.isSafeInteger(id) || id < 0 || (lastId !== null && id <= lastId)) {
        this.logOrphanedCredentials(receipt.contributor, issued);
        throw new IssuanceError(
          receipt.contributor,
          lastId === null
            ? `issuer returned id ${id}, expected a non-negative integer`
            : `issuer returned id ${id}, expected an integer greater than ${lastId}`
        );
      }

      issued.push(id);
      lastId = id;
    }

    this.lastCredentialId = lastId;
    return issued;
  }

  private logOrphanedCredentials(contributor: Identity, credentialIds: number[]) {
    if (credentialIds.length > 0) {
      this.logger.error(
        { contributor, credentialIds },
        'Contribution aborted after credentials were issued'
      );
    }
  }

  private observeDeadline() {
    if (this.state.observeDeadline()) {
      this.logger.info(
        { currentAmount: this.currentAmount, goalAmount: this.goalAmount },
        'Deadline passed; campaign closed'
      );
    }
  }

  private assertOwner(caller: Identity, operation: string) {
    const result = IdentitySchema.safeParse(caller);
    if (!result.success || result.data !== this.owner) {
      throw new PermissionError(caller, operation);
    }
  }

  /** Raised totals and balances stay exact only up to Number.MAX_SAFE_INTEGER */
  private assertWithinAmountLimit(contributor: Identity, amount: number) {
    const limit = Number.MAX_SAFE_INTEGER;
    if (
      amount > limit - this.currentAmount ||
      amount > limit - this.ledger.balanceOf(contributor)
    ) {
      throw new ValidationError(
        `Contribution of ${amount} would take the campaign total past ${limit}`
      );
    }
  }

  private describeClosure(): string {
    return (this.state.closureReason ?? 'deadline_passed').replace('_', ' ');
  }
}
