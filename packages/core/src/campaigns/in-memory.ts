/**
 * In-memory collaborators
 * Stand-ins for the credential issuer and the payment rail, for local runs and tests
 */

import type {
  CredentialIssuer,
  Identity,
  TransferCapability,
  TransferResult,
} from './campaign-types.js';

export interface IssuedCredential {
  id: number;
  owner: Identity;
}

/**
 * Issues sequential credential ids starting at 1, shared by every campaign using it
 */
export class InMemoryCredentialIssuer implements CredentialIssuer {
  private nextId = 1;
  private credentials: IssuedCredential[] = [];

  async issue(to: Identity): Promise<number> {
    const id = this.nextId;
    this.nextId += 1;
    this.credentials.push({ id, owner: to });
    return id;
  }

  ownedBy(owner: Identity): number[] {
    return this.credentials.filter((c) => c.owner === owner).map((c) => c.id);
  }

  get issued(): readonly IssuedCredential[] {
    return this.credentials;
  }
}

export interface RecordedTransfer {
  to: Identity;
  amount: number;
  reference: string;
}

/**
 * Records transfers and rejects the recipients it has been told to reject
 */
export class InMemoryTransferGateway implements TransferCapability {
  private completed: RecordedTransfer[] = [];
  private rejections = new Map<Identity, string>();
  private sequence = 0;

  async transfer(to: Identity, amount: number): Promise<TransferResult> {
    const reason = this.rejections.get(to);
    if (reason !== undefined) {
      return { ok: false, reason };
    }

    this.sequence += 1;
    const reference = `tx-${this.sequence}`;
    this.completed.push({ to, amount, reference });
    return { ok: true, reference };
  }

  reject(recipient: Identity, reason = 'recipient rejected transfer') {
    this.rejections.set(recipient, reason);
  }

  accept(recipient: Identity) {
    this.rejections.delete(recipient);
  }

  get transfers(): readonly RecordedTransfer[] {
    return this.completed;
  }

  totalSentTo(recipient: Identity): number {
    return this.completed
      .filter((t) => t.to === recipient)
      .reduce((sum, t) => sum + t.amount, 0);
  }
}
