// src/framers/tcp-framer.ts

import type { ModbusFramer, FrameCallback } from './modbus-framer.js';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../utils/utils.js';
import { buildMbapHeader, parseMbapHeader } from '../utils/tcp-utils.js';
import {
  MBAP_HEADER_LENGTH,
  MODBUS_PROTOCOL_ID,
  MIN_PDU_LENGTH,
  MAX_PDU_LENGTH,
} from '../constants/constants.js';
import { ModbusInvalidFrameLengthError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type {
  LoggerInstance,
  ModbusReply,
  ModbusRequest,
  TcpFramerOptions,
} from '../types/modbus-types.js';

const defaultLogger = rootLogger.createLogger('TcpFramer');

// MBAP length field = unit ID + PDU
const MIN_LENGTH_FIELD = MIN_PDU_LENGTH + 1;
const MAX_LENGTH_FIELD = MAX_PDU_LENGTH + 1;

/**
 * MBAP socket framer for Modbus TCP/UDP.
 *
 * ADU layout: transaction ID (2) | protocol ID (2) | length (2) | unit ID (1) | PDU
 */
export class TcpFramer implements ModbusFramer<ModbusRequest, ModbusReply> {
  private _buffer: Uint8Array = allocUint8Array(0);
  private readonly _maxBufferSize: number;
  private readonly _logger: LoggerInstance;

  constructor(options: TcpFramerOptions = {}) {
    this._maxBufferSize = options.maxBufferSize ?? 4096;
    this._logger = options.logger ?? defaultLogger;
  }

  get bufferedLength(): number {
    return this._buffer.length;
  }

  public encode(request: ModbusRequest): Uint8Array {
    const { pdu } = request;
    if (pdu.length < MIN_PDU_LENGTH || pdu.length > MAX_PDU_LENGTH) {
      throw new ModbusInvalidFrameLengthError(pdu.length, MIN_PDU_LENGTH, MAX_PDU_LENGTH);
    }
    const header = buildMbapHeader(request.transactionId, request.unitId, pdu.length);
    return concatUint8Arrays([header, pdu]);
  }

  public feed(data: Uint8Array, onFrame: FrameCallback<ModbusReply>): void {
    this._buffer = concatUint8Arrays([this._buffer, data]);
    this._drain(onFrame);

    // only an incomplete frame is left at this point
    if (this._buffer.length > this._maxBufferSize) {
      this._logger.warn(
        `Receive buffer overflow (${this._buffer.length} > ${this._maxBufferSize}), dropping buffered data`
      );
      this.reset();
    }
  }

  private _drain(onFrame: FrameCallback<ModbusReply>): void {
    while (this._buffer.length >= MBAP_HEADER_LENGTH) {
      const header = parseMbapHeader(this._buffer);

      if (
        header.protocolId !== MODBUS_PROTOCOL_ID ||
        header.length < MIN_LENGTH_FIELD ||
        header.length > MAX_LENGTH_FIELD
      ) {
        this._logger.warn('Invalid MBAP header, resynchronizing', {
          transactionId: header.transactionId,
          protocolId: header.protocolId,
          length: header.length,
          data: toHex(this._buffer),
        });
        this.reset();
        return;
      }

      const frameLength = MBAP_HEADER_LENGTH - 1 + header.length;
      if (this._buffer.length < frameLength) return;

      // copy the PDU out so replies do not pin the receive buffer
      const pdu = sliceUint8Array(this._buffer, MBAP_HEADER_LENGTH, frameLength).slice();
      this._buffer = sliceUint8Array(this._buffer, frameLength);

      this._logger.trace('Frame decoded', {
        transactionId: header.transactionId,
        unitId: header.unitId,
        funcCode: pdu[0],
      });

      onFrame({
        transactionId: header.transactionId,
        unitId: header.unitId,
        functionCode: pdu[0],
        pdu,
      });
    }
  }

  public reset(): void {
    this._buffer = allocUint8Array(0);
  }
}
