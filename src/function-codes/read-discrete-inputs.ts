// src/function-codes/read-discrete-inputs.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { ReadDiscreteInputsResponse } from '../types/modbus-types.js';
import { buildReadRequest, readByteCountPayload, unpackBits } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.READ_DISCRETE_INPUTS;
export const MAX_QUANTITY = 2000;

export function buildReadDiscreteInputsRequest(startAddress: number, quantity: number): Uint8Array {
  return buildReadRequest(FUNCTION_CODE, startAddress, quantity);
}

export function parseReadDiscreteInputsResponse(
  pdu: Uint8Array,
  quantity: number
): ReadDiscreteInputsResponse {
  const data = readByteCountPayload(pdu, FUNCTION_CODE, Math.ceil(quantity / 8));
  return unpackBits(data, quantity);
}
