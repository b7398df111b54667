/**
 * Campaign event emitter for external observers (audit logs, indexers)
 * Handlers are fire-and-forget so a slow or failing observer never blocks settlement
 */

import { logger as defaultLogger, type Logger } from '@crowdfund/observability';
import type { ClosureReason, Identity, SettlementReport } from './campaign-types.js';

export type CampaignEventType =
  | 'campaign.created'
  | 'campaign.contributed'
  | 'campaign.closed'
  | 'campaign.refunded'
  | 'campaign.withdrawn';

interface BaseCampaignEvent {
  type: CampaignEventType;
  campaignId: string;
  timestamp: Date;
}

export interface CampaignCreatedEvent extends BaseCampaignEvent {
  type: 'campaign.created';
  owner: Identity;
  goalAmount: number;
  deadline: Date;
}

export interface ContributedEvent extends BaseCampaignEvent {
  type: 'campaign.contributed';
  contributor: Identity;
  amount: number;
  credentialIds: number[];
  goalReached: boolean;
}

export interface ClosedEvent extends BaseCampaignEvent {
  type: 'campaign.closed';
  owner: Identity;
  reason: ClosureReason;
  report: SettlementReport;
}

export interface RefundedEvent extends BaseCampaignEvent {
  type: 'campaign.refunded';
  contributor: Identity;
  amount: number;
}

export interface WithdrawnEvent extends BaseCampaignEvent {
  type: 'campaign.withdrawn';
  owner: Identity;
  amount: number;
}

export type CampaignEvent =
  | CampaignCreatedEvent
  | ContributedEvent
  | ClosedEvent
  | RefundedEvent
  | WithdrawnEvent;

type WithoutTimestamp<T> = T extends unknown ? Omit<T, 'timestamp'> : never;

export type CampaignEventInput = WithoutTimestamp<CampaignEvent>;

export type CampaignEventHandler = (event: CampaignEvent) => void | Promise<void>;

export class CampaignEventEmitter {
  private handlers: CampaignEventHandler[] = [];

  constructor(private logger: Logger = defaultLogger) {}

  on(handler: CampaignEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: CampaignEventInput) {
    const fullEvent: CampaignEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget - don't block the campaign operation
    void Promise.all(this.handlers.map(async (handler) => handler(fullEvent))).catch((err) => {
      this.logger.error(
        { err, event: fullEvent.type, campaignId: fullEvent.campaignId },
        'Campaign event handler error'
      );
    });
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}
