// src/function-codes/read-coils.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadCoilsResponse } from '../types/modbus-types.js';
import { buildReadRequest, readByteCountPayload, unpackBits } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_COILS;
export const MAX_QUANTITY = 2000;

/**
 * Builds the PDU for Read Coils (FC 0x01)
 * @param quantity - number of coils (1-2000)
 */
export function buildReadCoilsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity);
}

/**
 * Parses a Read Coils reply. The reply only carries whole bytes, so the
 * requested quantity decides how many bits are meaningful.
 */
export function parseReadCoilsResponse(pdu: Uint8Array, quantity: number): ReadCoilsResponse {
  const data = readByteCountPayload(pdu, FUNCTION_CODE, Math.ceil(quantity / 8));
  return unpackBits(data, quantity);
}
