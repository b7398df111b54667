/**
 * Settlement Engine
 *
 * Moves value out of escrow exactly once per contributor per terminal event.
 *
 * Every balance is zeroed before its transfer is attempted, so a transfer
 * capability that calls back into the ledger finds nothing left to settle.
 * Batch payouts isolate failures: one rejected recipient is recorded in the
 * report and the batch carries on with the next contributor.
 */

import type { Logger } from '@crowdfund/observability';
import { TransferError, describeError } from './campaign-errors.js';
import type { ContributionLedger } from './contribution-ledger.js';
import type {
  Identity,
  Payout,
  PayoutFailure,
  SettlementReport,
  TransferCapability,
  TransferResult,
} from './campaign-types.js';

export function emptySettlementReport(): SettlementReport {
  return { settled: [], failed: [], skipped: [], totalSettled: 0, totalFailed: 0 };
}

async function attemptTransfer(
  transfer: TransferCapability,
  to: Identity,
  amount: number
): Promise<TransferResult> {
  try {
    return await transfer.transfer(to, amount);
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

function toPayout(recipient: Identity, amount: number, result: { reference?: string }): Payout {
  return result.reference === undefined
    ? { recipient, amount }
    : { recipient, amount, reference: result.reference };
}

export class SettlementEngine {
  constructor(private logger: Logger) {}

  /**
   * Refund every contributor in index order
   * Transfers run one at a time; each completes before the next starts
   */
  async distributeAll(
    ledger: ContributionLedger,
    transfer: TransferCapability
  ): Promise<SettlementReport> {
    const report = emptySettlementReport();

    for (const contributor of ledger.contributors()) {
      const amount = ledger.settle(contributor);
      if (amount === 0) {
        report.skipped.push(contributor);
        continue;
      }

      const result = await attemptTransfer(transfer, contributor, amount);
      this.applyResult(report, contributor, amount, result);
    }

    this.logger.info(
      {
        settled: report.settled.length,
        failed: report.failed.length,
        skipped: report.skipped.length,
        totalSettled: report.totalSettled,
        totalFailed: report.totalFailed,
      },
      'Batch settlement finished'
    );

    return report;
  }

  /**
   * Pay the pooled amount to the owner
   * The caller decrements its tracked total only after this resolves
   */
  async withdrawToOwner(
    owner: Identity,
    amount: number,
    transfer: TransferCapability
  ): Promise<Payout> {
    const result = await attemptTransfer(transfer, owner, amount);
    if (!result.ok) {
      this.logger.warn({ recipient: owner, amount, reason: result.reason }, 'Withdrawal failed');
      throw new TransferError(owner, amount, result.reason);
    }
    return toPayout(owner, amount, result);
  }

  /**
   * Settle and pay a single contributor
   * A zero balance is a successful no-op; a failed transfer restores the balance
   */
  async refundOne(
    ledger: ContributionLedger,
    contributor: Identity,
    transfer: TransferCapability
  ): Promise<Payout> {
    const amount = ledger.settle(contributor);
    if (amount === 0) {
      return { recipient: contributor, amount: 0 };
    }

    const result = await attemptTransfer(transfer, contributor, amount);
    if (!result.ok) {
      ledger.restore(contributor, amount);
      this.logger.warn({ recipient: contributor, amount, reason: result.reason }, 'Refund failed');
      throw new TransferError(contributor, amount, result.reason);
    }
    return toPayout(contributor, amount, result);
  }

  /**
   * Retry the failed subset of an earlier batch
   */
  async retryFailures(
    failures: readonly PayoutFailure[],
    transfer: TransferCapability
  ): Promise<SettlementReport> {
    const report = emptySettlementReport();

    for (const failure of failures) {
      const result = await attemptTransfer(transfer, failure.recipient, failure.amount);
      this.applyResult(report, failure.recipient, failure.amount, result);
    }

    return report;
  }

  private applyResult(
    report: SettlementReport,
    recipient: Identity,
    amount: number,
    result: TransferResult
  ): void {
    if (result.ok) {
      report.settled.push(toPayout(recipient, amount, result));
      report.totalSettled += amount;
      return;
    }

    report.failed.push({ recipient, amount, reason: result.reason });
    report.totalFailed += amount;
    this.logger.warn({ recipient, amount, reason: result.reason }, 'Transfer failed during batch settlement');
  }
}
