/**
 * Contribution Ledger
 *
 * Pure bookkeeping: cumulative amount per contributor plus the ordered
 * index of distinct contributors. No transfer logic lives here.
 */

import { ValidationError } from './campaign-errors.js';
import type { Identity, LedgerReceipt } from './campaign-types.js';

function assertWholeAmount(amount: number, operation: string): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError(`${operation} requires a positive whole amount, got ${amount}`);
  }
}

export class ContributionLedger {
  private balances = new Map<Identity, number>();
  private index: Identity[] = [];

  /**
   * Add `amount` to the contributor's cumulative total
   * Returns both totals so callers can derive credential counts without a second lookup
   */
  record(contributor: Identity, amount: number): LedgerReceipt {
    assertWholeAmount(amount, 'record');

    const firstContribution = !this.balances.has(contributor);
    const oldTotal = this.balances.get(contributor) ?? 0;
    const newTotal = oldTotal + amount;
    if (!Number.isSafeInteger(newTotal)) {
      throw new ValidationError(
        `record would take the balance of ${contributor} past ${Number.MAX_SAFE_INTEGER}`
      );
    }

    if (firstContribution) {
      this.index.push(contributor);
    }
    this.balances.set(contributor, newTotal);

    return { contributor, oldTotal, newTotal, firstContribution };
  }

  /**
   * Undo the `record` call that produced `receipt`
   * Only valid while no other mutation for the contributor happened in between
   */
  revert(receipt: LedgerReceipt): void {
    const current = this.balances.get(receipt.contributor);
    if (current !== receipt.newTotal) {
      throw new ValidationError(
        `Cannot revert contribution for ${receipt.contributor}: balance changed since it was recorded`
      );
    }

    if (receipt.firstContribution) {
      this.balances.delete(receipt.contributor);
      const position = this.index.lastIndexOf(receipt.contributor);
      if (position !== -1) {
        this.index.splice(position, 1);
      }
      return;
    }

    this.balances.set(receipt.contributor, receipt.oldTotal);
  }

  /**
   * Return the contributor's balance and zero it
   * Repeat calls return 0
   */
  settle(contributor: Identity): number {
    const amount = this.balances.get(contributor) ?? 0;
    if (amount > 0) {
      this.balances.set(contributor, 0);
    }
    return amount;
  }

  /**
   * Put back a balance settled for a single transfer that then failed
   */
  restore(contributor: Identity, amount: number): void {
    assertWholeAmount(amount, 'restore');

    const current = this.balances.get(contributor);
    if (current === undefined) {
      throw new ValidationError(`Cannot restore balance for unknown contributor ${contributor}`);
    }
    if (current !== 0) {
      throw new ValidationError(`Cannot restore balance for ${contributor}: balance is not settled`);
    }
    this.balances.set(contributor, amount);
  }

  balanceOf(contributor: Identity): number {
    return this.balances.get(contributor) ?? 0;
  }

  contributors(): readonly Identity[] {
    return [...this.index];
  }

  /**
   * Sum of all balances. O(n); for consistency checks only
   */
  totalOutstanding(): number {
    let total = 0;
    for (const amount of this.balances.values()) {
      total += amount;
    }
    return total;
  }
}
