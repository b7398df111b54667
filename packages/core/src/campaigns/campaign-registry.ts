/**
 * Campaign Registry
 *
 * Creates campaigns from (owner, goalAmount) and keeps a creation log.
 * Holds no campaign state of its own once a campaign is created.
 */

import { CreateCampaignRequestSchema, type CampaignSettings } from '@crowdfund/types';
import { logger as defaultLogger, type Logger } from '@crowdfund/observability';
import { Campaign } from './campaign.js';
import { CampaignEventEmitter } from './campaign-events.js';
import { parseOrThrow } from './campaign-validation.js';
import {
  systemClock,
  type Clock,
  type CredentialIssuer,
  type Identity,
  type TransferCapability,
} from './campaign-types.js';

export interface CampaignRegistryOptions {
  settings: CampaignSettings;
  credentialIssuer: CredentialIssuer;
  transfer: TransferCapability;
  clock?: Clock;
  events?: CampaignEventEmitter;
  logger?: Logger;
}

export interface CampaignCreation {
  campaignId: string;
  owner: Identity;
  goalAmount: number;
  createdAt: Date;
}

export class CampaignRegistry {
  readonly events: CampaignEventEmitter;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private campaigns = new Map<string, Campaign>();
  private creations: CampaignCreation[] = [];

  constructor(private options: CampaignRegistryOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.events = options.events ?? new CampaignEventEmitter(this.logger);
  }

  createCampaign(owner: Identity, goalAmount: number): Campaign {
    const request = parseOrThrow(CreateCampaignRequestSchema, { owner, goalAmount });
    const campaignId = `campaign-${this.creations.length + 1}`;
    const createdAt = this.clock.now();

    const campaign = new Campaign({
      id: campaignId,
      owner: request.owner,
      goalAmount: request.goalAmount,
      createdAt,
      settings: this.options.settings,
      credentialIssuer: this.options.credentialIssuer,
      transfer: this.options.transfer,
      clock: this.clock,
      events: this.events,
      logger: this.logger,
    });

    this.campaigns.set(campaignId, campaign);
    this.creations.push({
      campaignId,
      owner: request.owner,
      goalAmount: request.goalAmount,
      createdAt: new Date(createdAt),
    });

    this.events.emit({
      type: 'campaign.created',
      campaignId,
      owner: request.owner,
      goalAmount: request.goalAmount,
      deadline: campaign.deadline,
    });

    return campaign;
  }

  get(campaignId: string): Campaign | null {
    return this.campaigns.get(campaignId) ?? null;
  }

  list(): Campaign[] {
    return [...this.campaigns.values()];
  }

  /** Creation log, oldest first */
  history(): readonly CampaignCreation[] {
    return [...this.creations];
  }
}
