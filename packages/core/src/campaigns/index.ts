/**
 * Campaigns Domain
 *
 * Public exports for the crowdfunding escrow
 */

// Composition root
export { Campaign } from './campaign.js';
export type { CampaignParams } from './campaign.js';
export { CampaignRegistry } from './campaign-registry.js';
export type { CampaignRegistryOptions, CampaignCreation } from './campaign-registry.js';

// Components
export { ContributionLedger } from './contribution-ledger.js';
export { CampaignStateMachine } from './campaign-state.js';
export type { CampaignStateParams } from './campaign-state.js';
export { SettlementEngine, emptySettlementReport } from './settlement-engine.js';
export { CampaignLock } from './campaign-lock.js';

// Events and audit logging
export { CampaignEventEmitter } from './campaign-events.js';
export type {
  CampaignEvent,
  CampaignEventInput,
  CampaignEventHandler,
  CampaignEventType,
  CampaignCreatedEvent,
  ContributedEvent,
  ClosedEvent,
  RefundedEvent,
  WithdrawnEvent,
} from './campaign-events.js';
export { initializeCampaignAuditLogging } from './campaign-audit.js';

// Configuration
export { loadCampaignSettings } from './campaign-config.js';

// In-memory collaborators
export { InMemoryCredentialIssuer, InMemoryTransferGateway } from './in-memory.js';
export type { IssuedCredential, RecordedTransfer } from './in-memory.js';

// Domain types
export { systemClock } from './campaign-types.js';
export type {
  CampaignSnapshot,
  CampaignStatus,
  ClosureReason,
  Clock,
  ContributeResult,
  CredentialIssuer,
  Identity,
  LedgerReceipt,
  Payout,
  PayoutFailure,
  SettlementReport,
  TransferCapability,
  TransferResult,
} from './campaign-types.js';

// Domain errors
export {
  CampaignError,
  PermissionError,
  StateError,
  ValidationError,
  TransferError,
  IssuanceError,
} from './campaign-errors.js';
export type { CampaignErrorCode } from './campaign-errors.js';
