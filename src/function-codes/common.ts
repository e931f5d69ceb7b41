// src/function-codes/common.ts

import { ModbusResponseError } from '../errors.js';

/**
 * Checks that a reply PDU belongs to the expected function.
 */
export function expectFunctionCode(pdu: Uint8Array, functionCode: number): void {
  if (pdu.length === 0) {
    throw new ModbusResponseError('Empty PDU');
  }
  if (pdu[0] !== functionCode) {
    throw new ModbusResponseError(
      `Invalid function code: expected 0x${functionCode.toString(16).padStart(2, '0')}, got 0x${pdu[0].toString(16).padStart(2, '0')}`
    );
  }
}

export function expectLength(pdu: Uint8Array, expected: number): void {
  if (pdu.length !== expected) {
    throw new ModbusResponseError(`Invalid PDU length: expected ${expected}, got ${pdu.length}`);
  }
}

/**
 * Packs booleans LSB-first, eight per byte, as coils travel on the wire.
 */
export function packBits(values: boolean[]): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(values.length / 8));
  values.forEach((value, i) => {
    if (value) bytes[i >> 3] |= 1 << (i & 7);
  });
  return bytes;
}

export function unpackBits(bytes: Uint8Array, count: number): boolean[] {
  const result: boolean[] = new Array(count);
  for (let i = 0; i < count; i++) {
    result[i] = (bytes[i >> 3] & (1 << (i & 7))) !== 0;
  }
  return result;
}

/**
 * Request PDU shared by the four read functions: FC | address | quantity.
 */
export function buildReadRequest(
  functionCode: number,
  startAddress: number,
  quantity: number
): Uint8Array {
  const pdu = new Uint8Array(5);
  const view = new DataView(pdu.buffer);
  view.setUint8(0, functionCode);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, quantity, false);
  return pdu;
}

/**
 * Returns the data bytes of a `FC | byteCount | data` reply after checking the count.
 */
export function readByteCountPayload(
  pdu: Uint8Array,
  functionCode: number,
  expectedByteCount: number
): Uint8Array {
  expectFunctionCode(pdu, functionCode);
  if (pdu.length < 2) {
    throw new ModbusResponseError('PDU too short: missing byte count');
  }
  const byteCount = pdu[1];
  if (byteCount !== expectedByteCount) {
    throw new ModbusResponseError(
      `Invalid byte count: expected ${expectedByteCount}, got ${byteCount}`
    );
  }
  expectLength(pdu, 2 + byteCount);
  return pdu.subarray(2);
}
