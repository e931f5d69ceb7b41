// src/function-codes/write-single-register.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import type { WriteSingleRegisterResponse } from '../types/modbus-types.js';
import { expectFunctionCode, expectLength } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_REGISTER;
const PDU_SIZE = 5;

export function buildWriteSingleRegisterRequest(address: number, value: number): Uint8Array {
  const pdu = new Uint8Array(PDU_SIZE);
  const view = new DataView(pdu.buffer);
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value, false);
  return pdu;
}

export function parseWriteSingleRegisterResponse(pdu: Uint8Array): WriteSingleRegisterResponse {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, PDU_SIZE);

  const view = new DataView(pdu.buffer, pdu.byteOffset, PDU_SIZE);
  return {
    address: view.getUint16(1, false),
    value: view.getUint16(3, false),
  };
}
