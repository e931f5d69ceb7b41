// src/transaction/pending-request.ts

import { ModbusStateError } from '../errors.js';
import type { PendingState } from '../types/modbus-types.js';

/**
 * Single-shot completion slot for one in-flight request.
 *
 * Exactly one of `resolve` or `fail` may be called; a second settlement throws
 * `ModbusStateError`. Callers observe the outcome through `promise`.
 */
export class PendingRequest<TReply> {
  readonly transactionId: number;
  readonly promise: Promise<TReply>;

  private _state: PendingState = 'pending';
  private readonly _resolve: (reply: TReply) => void;
  private readonly _reject: (error: Error) => void;

  constructor(transactionId: number) {
    this.transactionId = transactionId;
    let resolveFn: (reply: TReply) => void = noop;
    let rejectFn: (error: Error) => void = noop;
    this.promise = new Promise<TReply>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this._resolve = resolveFn;
    this._reject = rejectFn;
  }

  get state(): PendingState {
    return this._state;
  }

  get isSettled(): boolean {
    return this._state !== 'pending';
  }

  resolve(reply: TReply): void {
    this._settle('resolved');
    this._resolve(reply);
  }

  fail(error: Error): void {
    this._settle('failed');
    this._reject(error);
  }

  private _settle(next: Exclude<PendingState, 'pending'>): void {
    if (this._state !== 'pending') {
      throw new ModbusStateError(
        `Transaction ${this.transactionId} already ${this._state}, cannot mark ${next}`
      );
    }
    this._state = next;
  }
}

function noop(): void {}
