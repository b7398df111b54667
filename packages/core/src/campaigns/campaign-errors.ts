/**
 * Campaign Domain Errors
 *
 * PermissionError, StateError and ValidationError are raised before any
 * mutation. TransferError is raised only by single-recipient operations;
 * batch failures are recorded in the settlement report instead.
 */

import type { Identity } from './campaign-types.js';

export type CampaignErrorCode =
  | 'PERMISSION_DENIED'
  | 'INVALID_STATE'
  | 'VALIDATION_FAILED'
  | 'TRANSFER_FAILED'
  | 'ISSUANCE_FAILED';

export class CampaignError extends Error {
  readonly code: CampaignErrorCode;

  constructor(code: CampaignErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

export class PermissionError extends CampaignError {
  constructor(caller: Identity, operation: string) {
    super('PERMISSION_DENIED', `Only the campaign owner may ${operation}; caller was ${caller}`);
  }
}

export class StateError extends CampaignError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export class ValidationError extends CampaignError {
  constructor(message: string) {
    super('VALIDATION_FAILED', message);
  }
}

export class TransferError extends CampaignError {
  readonly recipient: Identity;
  readonly amount: number;
  readonly reason: string;

  constructor(recipient: Identity, amount: number, reason: string) {
    super('TRANSFER_FAILED', `Transfer of ${amount} to ${recipient} failed: ${reason}`);
    this.recipient = recipient;
    this.amount = amount;
    this.reason = reason;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      recipient: this.recipient,
      amount: this.amount,
      reason: this.reason,
    };
  }
}

export class IssuanceError extends CampaignError {
  readonly contributor: Identity;

  constructor(contributor: Identity, message: string, options?: ErrorOptions) {
    super('ISSUANCE_FAILED', `Credential issuance for ${contributor} failed: ${message}`, options);
    this.contributor = contributor;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
