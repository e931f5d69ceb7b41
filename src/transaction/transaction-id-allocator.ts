// src/transaction/transaction-id-allocator.ts

import { MAX_TRANSACTION_ID } from '../constants/constants.js';
import { ModbusConfigError } from '../errors.js';
import type { TransactionIdSource } from '../types/modbus-types.js';

/**
 * Issues transaction IDs in the range 0..maxId, wrapping to 0 after maxId.
 * The first call returns 1.
 */
export class TransactionIdAllocator implements TransactionIdSource {
  private _currentId: number = 0;
  private readonly _modulus: number;

  constructor(maxId: number = MAX_TRANSACTION_ID) {
    if (!Number.isInteger(maxId) || maxId < 1) {
      throw new ModbusConfigError(`Transaction ID limit must be a positive integer, got ${maxId}`);
    }
    this._modulus = maxId + 1;
  }

  next(): number {
    this._currentId = (this._currentId + 1) % this._modulus;
    return this._currentId;
  }

  /** Last issued ID (0 before the first call) */
  get current(): number {
    return this._currentId;
  }

  get maxId(): number {
    return this._modulus - 1;
  }
}
