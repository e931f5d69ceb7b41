// src/framers/modbus-framer.ts

import type { Transactional } from '../types/modbus-types.js';

export type FrameCallback<TReply> = (reply: TReply) => void;

/**
 * Boundary between sessions and the wire format.
 */
export interface ModbusFramer<TRequest extends Transactional, TReply extends Transactional> {
  /**
   * Serializes a request (its transaction ID already assigned) into one ADU
   */
  encode(request: TRequest): Uint8Array;

  /**
   * Appends received bytes and calls `onFrame` once for every complete frame
   * now buffered. Incomplete trailing bytes are kept for the next call.
   */
  feed(data: Uint8Array, onFrame: FrameCallback<TReply>): void;

  /**
   * Drops any partially buffered frame
   */
  reset(): void;

  /** Bytes currently held waiting for the rest of a frame */
  readonly bufferedLength: number;
}
