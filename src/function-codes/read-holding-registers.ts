// src/function-codes/read-holding-registers.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadHoldingRegistersResponse } from '../types/modbus-types.js';
import { bytesToUint16BE } from '../utils/utils.js';
import { buildReadRequest, readByteCountPayload } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_HOLDING_REGISTERS;
export const MAX_QUANTITY = 125;

/**
 * Builds the PDU for Read Holding Registers (FC 0x03)
 * @param quantity - number of registers (1-125)
 */
export function buildReadHoldingRegistersRequest(
  startAddress: number,
  quantity: number
): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadHoldingRegistersResponse(
  pdu: Uint8Array,
  quantity: number
): ReadHoldingRegistersResponse {
  const data = readByteCountPayload(pdu, FUNCTION_CODE, quantity * 2);
  const registers: number[] = new Array(quantity);
  for (let i = 0; i < quantity; i++) {
    registers[i] = bytesToUint16BE(data, i * 2);
  }
  return registers;
}
