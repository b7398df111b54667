/**
 * Campaign State Machine
 *
 * active -> closed, one way. The deadline is evaluated lazily against the
 * clock whenever an operation asks; nothing polls.
 */

import { StateError } from './campaign-errors.js';
import type { CampaignStatus, Clock, ClosureReason } from './campaign-types.js';

export interface CampaignStateParams {
  goalAmount: number;
  deadline: number;
  clock: Clock;
}

export class CampaignStateMachine {
  readonly goalAmount: number;
  readonly deadline: number;
  private readonly clock: Clock;
  private status: CampaignStatus = 'active';
  private reason: ClosureReason | null = null;

  constructor(params: CampaignStateParams) {
    this.goalAmount = params.goalAmount;
    this.deadline = params.deadline;
    this.clock = params.clock;
  }

  get currentStatus(): CampaignStatus {
    return this.status;
  }

  get closureReason(): ClosureReason | null {
    return this.reason;
  }

  isActive(): boolean {
    return this.status === 'active' && this.clock.now() < this.deadline;
  }

  isClosed(): boolean {
    return this.status === 'closed' || this.clock.now() >= this.deadline;
  }

  isSuccessful(raised: number): boolean {
    return raised >= this.goalAmount;
  }

  isFailed(raised: number): boolean {
    return !this.isSuccessful(raised);
  }

  /**
   * Record a deadline that has passed since the last operation
   * Returns true when this call performed the transition
   */
  observeDeadline(): boolean {
    if (this.status === 'active' && this.clock.now() >= this.deadline) {
      this.transition('deadline_passed');
      return true;
    }
    return false;
  }

  /**
   * Close because a contribution brought `raised` up to the goal
   * Returns true when this call performed the transition
   */
  closeIfGoalReached(raised: number): boolean {
    if (this.status === 'active' && this.isSuccessful(raised)) {
      this.transition('goal_reached');
      return true;
    }
    return false;
  }

  closeByOwner(): void {
    if (!this.isActive()) {
      throw new StateError('Campaign must be active to be closed by its owner');
    }
    this.transition('owner_closed');
  }

  private transition(reason: ClosureReason): void {
    this.status = 'closed';
    this.reason = reason;
  }
}
