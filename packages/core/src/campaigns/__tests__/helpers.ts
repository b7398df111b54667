import { createLogger } from '@crowdfund/observability';
import type { CampaignSettings } from '@crowdfund/types';
import { Campaign, type CampaignParams } from '../campaign.js';
import { InMemoryCredentialIssuer, InMemoryTransferGateway } from '../in-memory.js';
import type { Clock } from '../campaign-types.js';

export const START = 1_700_000_000_000;
export const DAY_MS = 24 * 60 * 60 * 1000;

export class FakeClock implements Clock {
  constructor(private nowMs: number = START) {}

  now(): number {
    return this.nowMs;
  }

  set(ms: number): void {
    this.nowMs = ms;
  }

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export const silentLogger = createLogger({ level: 'silent' });

export const testSettings: CampaignSettings = {
  durationSeconds: 7 * 24 * 60 * 60,
  minContribution: 1,
  credentialUnit: 1,
};

export function buildCampaign(overrides: Partial<CampaignParams> = {}) {
  const clock = new FakeClock();
  const issuer = new InMemoryCredentialIssuer();
  const gateway = new InMemoryTransferGateway();

  const campaign = new Campaign({
    id: 'campaign-test',
    owner: 'owner',
    goalAmount: 10,
    createdAt: START,
    settings: testSettings,
    credentialIssuer: issuer,
    transfer: gateway,
    clock,
    logger: silentLogger,
    ...overrides,
  });

  return { campaign, clock, issuer, gateway };
}
