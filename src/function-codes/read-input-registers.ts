// src/function-codes/read-input-registers.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadInputRegistersResponse } from '../types/modbus-types.js';
import { bytesToUint16BE } from '../utils/utils.js';
import { buildReadRequest, readByteCountPayload } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_INPUT_REGISTERS;
export const MAX_QUANTITY = 125;

export function buildReadInputRegistersRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadInputRegistersResponse(
  pdu: Uint8Array,
  quantity: number
): ReadInputRegistersResponse {
  const data = readByteCountPayload(pdu, FUNCTION_CODE, quantity * 2);
  return Array.from({ length: quantity }, (_, i) => bytesToUint16BE(data, i * 2));
}
