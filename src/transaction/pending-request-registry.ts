// src/transaction/pending-request-registry.ts

import { ModbusTransactionCollisionError } from '../errors.js';
import { PendingRequest } from './pending-request.js';

/**
 * Map of transaction ID to the request awaiting its reply.
 *
 * An ID is present exactly while its request is on the wire and unanswered.
 * Entries leave only through `pop` or `failAll`, and whoever removes an entry
 * is the one that settles it.
 */
export class PendingRequestRegistry<TReply> {
  private readonly _entries = new Map<number, PendingRequest<TReply>>();

  get size(): number {
    return this._entries.size;
  }

  get isEmpty(): boolean {
    return this._entries.size === 0;
  }

  has(transactionId: number): boolean {
    return this._entries.has(transactionId);
  }

  /** Outstanding IDs in insertion order */
  transactionIds(): number[] {
    return [...this._entries.keys()];
  }

  /**
   * Tracks a new pending request.
   * @throws ModbusTransactionCollisionError if the ID is still outstanding
   */
  register(transactionId: number): PendingRequest<TReply> {
    if (this._entries.has(transactionId)) {
      throw new ModbusTransactionCollisionError(transactionId);
    }
    const pending = new PendingRequest<TReply>(transactionId);
    this._entries.set(transactionId, pending);
    return pending;
  }

  pop(transactionId: number): PendingRequest<TReply> | undefined {
    const pending = this._entries.get(transactionId);
    if (pending) this._entries.delete(transactionId);
    return pending;
  }

  /**
   * Removes every entry (FIFO) and fails it with the error built for its ID.
   * @returns Number of requests failed
   */
  failAll(makeError: (transactionId: number) => Error): number {
    const drained = [...this._entries.values()];
    this._entries.clear();
    for (const pending of drained) {
      pending.fail(makeError(pending.transactionId));
    }
    return drained.length;
  }
}
