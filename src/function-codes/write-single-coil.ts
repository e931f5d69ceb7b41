// src/function-codes/write-single-coil.ts

import { ModbusFunctionCode } from '../constants/constants.js';
import { ModbusResponseError } from '../errors.js';
import type { WriteSingleCoilResponse } from '../types/modbus-types.js';
import { expectFunctionCode, expectLength } from './common.js';

const FUNCTION_CODE = ModbusFunctionCode.WRITE_SINGLE_COIL;
const COIL_ON = 0xff00;
const COIL_OFF = 0x0000;
const PDU_SIZE = 5;

/**
 * Builds the PDU for Write Single Coil (FC 0x05)
 */
export function buildWriteSingleCoilRequest(address: number, value: boolean): Uint8Array {
  const pdu = new Uint8Array(PDU_SIZE);
  const view = new DataView(pdu.buffer);
  view.setUint8(0, FUNCTION_CODE);
  view.setUint16(1, address, false);
  view.setUint16(3, value ? COIL_ON : COIL_OFF, false);
  return pdu;
}

/**
 * Parses the echoed Write Single Coil reply
 * @throws ModbusResponseError if the echoed value is neither ON nor OFF
 */
export function parseWriteSingleCoilResponse(pdu: Uint8Array): WriteSingleCoilResponse {
  expectFunctionCode(pdu, FUNCTION_CODE);
  expectLength(pdu, PDU_SIZE);

  const view = new DataView(pdu.buffer, pdu.byteOffset, PDU_SIZE);
  const address = view.getUint16(1, false);
  const valueRaw = view.getUint16(3, false);

  switch (valueRaw) {
    case COIL_ON:
      return { address, value: true };
    case COIL_OFF:
      return { address, value: false };
    default:
      throw new ModbusResponseError(
        `Invalid coil value: expected 0xff00 or 0x0000, got 0x${valueRaw.toString(16)}`
      );
  }
}
