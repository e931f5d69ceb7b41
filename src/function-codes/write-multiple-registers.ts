// src/function-codes/write-multiple-registers.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteMultipleRegistersResponse } from '../types/modbus-types.js';
import { expectFunctionCode, expectLength } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS;
export const MAX_QUANTITY = 123;
const REQUEST_HEADER_SIZE = 6;
const RESPONSE_SIZE = 5;
const UINT16_SIZE = 2;

/**
 * Builds the PDU for Write Multiple Registers (FC 0x10)
 */
export function buildWriteMultipleRegistersRequest(
  startAddress: number,
  values: number[]
): Uint8Array {
  const byteCount = values.length * UINT16_SIZE;
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + byteCount);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, values.length, false);
  view.setUint8(5, byteCount);

  values.forEach((value, i) => {
    view.setUint16(REQUEST_HEADER_SIZE + i * UINT16_SIZE, value, false);
  });

  return pdu;
}

export function parseWriteMultipleRegistersResponse(
  pdu: Uint8Array
): WriteMultipleRegistersResponse {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, RESPONSE_SIZE);

  const view = new DataView(pdu.buffer, pdu.byteOffset, RESPONSE_SIZE);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
