// src/utils/tcp-utils.ts

import { MBAP_HEADER_LENGTH, MODBUS_PROTOCOL_ID } from '../constants/constants.js';

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  /** Byte count that follows the length field: unit ID + PDU */
  length: number;
  unitId: number;
}

/**
 * Builds the 7-byte MBAP header.
 * @param pduLength - Length of the PDU that follows the header
 */
export function buildMbapHeader(
  transactionId: number,
  unitId: number,
  pduLength: number
): Uint8Array {
  const header = new Uint8Array(MBAP_HEADER_LENGTH);
  const view = new DataView(header.buffer);

  view.setUint16(0, transactionId, false);
  view.setUint16(2, MODBUS_PROTOCOL_ID, false);
  view.setUint16(4, pduLength + 1, false); // unit ID counts towards length
  view.setUint8(6, unitId);

  return header;
}

/**
 * Parses an MBAP header from the start of `data`.
 * The caller guarantees at least MBAP_HEADER_LENGTH bytes.
 */
export function parseMbapHeader(data: Uint8Array): MbapHeader {
  const view = new DataView(data.buffer, data.byteOffset, MBAP_HEADER_LENGTH);
  return {
    transactionId: view.getUint16(0, false),
    protocolId: view.getUint16(2, false),
    length: view.getUint16(4, false),
    unitId: view.getUint8(6),
  };
}
