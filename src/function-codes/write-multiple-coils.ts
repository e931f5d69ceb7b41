// src/function-codes/write-multiple-coils.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteMultipleCoilsResponse } from '../types/modbus-types.js';
import { expectFunctionCode, expectLength, packBits } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_MULTIPLE_COILS;
export const MAX_QUANTITY = 1968;
const REQUEST_HEADER_SIZE = 6; // FC + address + quantity + byte count
const RESPONSE_SIZE = 5;

/**
 * Builds the PDU for Write Multiple Coils (FC 0x0F)
 */
export function buildWriteMultipleCoilsRequest(startAddress: number, values: boolean[]): Uint8Array {
  const packed = packBits(values);
  const pdu = new Uint8Array(REQUEST_HEADER_SIZE + packed.length);
  const view = new DataView(pdu.buffer);

  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, startAddress, false);
  view.setUint16(3, values.length, false);
  view.setUint8(5, packed.length);
  pdu.set(packed, REQUEST_HEADER_SIZE);

  return pdu;
}

export function parseWriteMultipleCoilsResponse(pdu: Uint8Array): WriteMultipleCoilsResponse {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, RESPONSE_SIZE);

  const view = new DataView(pdu.buffer, pdu.byteOffset, RESPONSE_SIZE);
  return {
    startAddress: view.getUint16(1, false),
    quantity: view.getUint16(3, false),
  };
}
