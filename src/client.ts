// src/client.ts

// Bit operations
import {
  buildReadCoilsRequest,
  parseReadCoilsResponse,
  MAX_QUANTITY as MAX_READ_BITS,
} from './function-codes/read-coils.js';
import {
  buildReadDiscreteInputsRequest,
  parseReadDiscreteInputsResponse,
  MAX_QUANTITY as MAX_READ_INPUTS,
} from './function-codes/read-discrete-inputs.js';
import {
  buildWriteSingleCoilRequest,
  parseWriteSingleCoilResponse,
} from './function-codes/write-single-coil.js';
import {
  buildWriteMultipleCoilsRequest,
  parseWriteMultipleCoilsResponse,
  MAX_QUANTITY as MAX_WRITE_BITS,
} from './function-codes/write-multiple-coils.js';
// Registers
import {
  buildReadHoldingRegistersRequest,
  parseReadHoldingRegistersResponse,
  MAX_QUANTITY as MAX_READ_REGISTERS,
} from './function-codes/read-holding-registers.js';
import {
  buildReadInputRegistersRequest,
  parseReadInputRegistersResponse,
  MAX_QUANTITY as MAX_READ_INPUT_REGISTERS,
} from './function-codes/read-input-registers.js';
import {
  buildWriteSingleRegisterRequest,
  parseWriteSingleRegisterResponse,
} from './function-codes/write-single-register.js';
import {
  buildWriteMultipleRegistersRequest,
  parseWriteMultipleRegistersResponse,
  MAX_QUANTITY as MAX_WRITE_REGISTERS,
} from './function-codes/write-multiple-registers.js';
import {
  ModbusExceptionError,
  ModbusIllegalDataValueError,
  ModbusInvalidAddressError,
  ModbusInvalidQuantityError,
  ModbusInvalidUnitIdError,
  ModbusResponseError,
} from './errors.js';
import { EXCEPTION_FLAG } from './constants/constants.js';
import { rootLogger } from './logger.js';
import { isUint16 } from './utils/utils.js';
import type {
  ModbusClientOptions,
  ModbusReply,
  ModbusRequest,
  ReadCoilsResponse,
  ReadDiscreteInputsResponse,
  ReadHoldingRegistersResponse,
  ReadInputRegistersResponse,
  RequestExecutor,
  WriteMultipleCoilsResponse,
  WriteMultipleRegistersResponse,
  WriteSingleCoilResponse,
  WriteSingleRegisterResponse,
} from './types/modbus-types.js';

const logger = rootLogger.createLogger('ModbusClient');

/**
 * Typed Modbus function API on top of a session.
 *
 * Every call builds a PDU, lets the session correlate it with its reply, and
 * decodes the reply PDU. Requests are not serialized here: several calls may
 * be in flight on the same session at once.
 */
class ModbusClient {
  private readonly executor: RequestExecutor<ModbusRequest, ModbusReply>;
  private readonly defaultUnitId: number;

  constructor(
    executor: RequestExecutor<ModbusRequest, ModbusReply>,
    options: ModbusClientOptions = {}
  ) {
    const unitId = options.unitId ?? 1;
    validateUnitId(unitId);
    this.executor = executor;
    this.defaultUnitId = unitId;
  }

  get unitId(): number {
    return this.defaultUnitId;
  }

  /**
   * Executes a raw PDU and returns the reply PDU.
   * @throws ModbusExceptionError when the device answers with an exception
   */
  public async request(pdu: Uint8Array, unitId: number = this.defaultUnitId): Promise<Uint8Array> {
    validateUnitId(unitId);
    const reply = await this.executor.execute({ transactionId: 0, unitId, pdu });

    if ((reply.functionCode & EXCEPTION_FLAG) !== 0) {
      if (reply.pdu.length < 2) {
        throw new ModbusResponseError('Exception reply without exception code');
      }
      const exceptionCode = reply.pdu[1];
      logger.warn('Modbus exception received', {
        transactionId: reply.transactionId,
        unitId: reply.unitId,
        funcCode: reply.functionCode,
        exceptionCode,
      });
      throw new ModbusExceptionError(reply.functionCode & ~EXCEPTION_FLAG, exceptionCode);
    }

    logger.debug('Response received', {
      transactionId: reply.transactionId,
      unitId: reply.unitId,
      funcCode: reply.functionCode,
    });
    return reply.pdu;
  }

  public async readCoils(
    startAddress: number,
    quantity: number,
    unitId?: number
  ): Promise<ReadCoilsResponse> {
    validateRange(startAddress, quantity, MAX_READ_BITS);
    const pdu = await this.request(buildReadCoilsRequest(startAddress, quantity), unitId);
    return parseReadCoilsResponse(pdu, quantity);
  }

  public async readDiscreteInputs(
    startAddress: number,
    quantity: number,
    unitId?: number
  ): Promise<ReadDiscreteInputsResponse> {
    validateRange(startAddress, quantity, MAX_READ_INPUTS);
    const pdu = await this.request(buildReadDiscreteInputsRequest(startAddress, quantity), unitId);
    return parseReadDiscreteInputsResponse(pdu, quantity);
  }

  public async readHoldingRegisters(
    startAddress: number,
    quantity: number,
    unitId?: number
  ): Promise<ReadHoldingRegistersResponse> {
    validateRange(startAddress, quantity, MAX_READ_REGISTERS);
    const pdu = await this.request(
      buildReadHoldingRegistersRequest(startAddress, quantity),
      unitId
    );
    return parseReadHoldingRegistersResponse(pdu, quantity);
  }

  public async readInputRegisters(
    startAddress: number,
    quantity: number,
    unitId?: number
  ): Promise<ReadInputRegistersResponse> {
    validateRange(startAddress, quantity, MAX_READ_INPUT_REGISTERS);
    const pdu = await this.request(buildReadInputRegistersRequest(startAddress, quantity), unitId);
    return parseReadInputRegistersResponse(pdu, quantity);
  }

  public async writeSingleCoil(
    address: number,
    value: boolean,
    unitId?: number
  ): Promise<WriteSingleCoilResponse> {
    validateAddress(address);
    const pdu = await this.request(buildWriteSingleCoilRequest(address, value), unitId);
    return parseWriteSingleCoilResponse(pdu);
  }

  public async writeSingleRegister(
    address: number,
    value: number,
    unitId?: number
  ): Promise<WriteSingleRegisterResponse> {
    validateAddress(address);
    if (!isUint16(value)) {
      throw new ModbusIllegalDataValueError(value, 'integer between 0 and 65535');
    }
    const pdu = await this.request(buildWriteSingleRegisterRequest(address, value), unitId);
    return parseWriteSingleRegisterResponse(pdu);
  }

  public async writeMultipleCoils(
    startAddress: number,
    values: boolean[],
    unitId?: number
  ): Promise<WriteMultipleCoilsResponse> {
    validateRange(startAddress, values.length, MAX_WRITE_BITS);
    const pdu = await this.request(buildWriteMultipleCoilsRequest(startAddress, values), unitId);
    return parseWriteMultipleCoilsResponse(pdu);
  }

  public async writeMultipleRegisters(
    startAddress: number,
    values: number[],
    unitId?: number
  ): Promise<WriteMultipleRegistersResponse> {
    validateRange(startAddress, values.length, MAX_WRITE_REGISTERS);
    const invalidValue = values.find(v => !isUint16(v));
    if (invalidValue !== undefined) {
      throw new ModbusIllegalDataValueError(invalidValue, 'integer between 0 and 65535');
    }
    const pdu = await this.request(
      buildWriteMultipleRegistersRequest(startAddress, values),
      unitId
    );
    return parseWriteMultipleRegistersResponse(pdu);
  }
}

function validateUnitId(unitId: number): void {
  if (!Number.isInteger(unitId) || unitId < 0 || unitId > 255) {
    throw new ModbusInvalidUnitIdError(unitId);
  }
}

function validateAddress(address: number): void {
  if (!isUint16(address)) {
    throw new ModbusInvalidAddressError(address);
  }
}

/**
 * Validates the start address, the quantity, and that the block stays inside the address space.
 */
function validateRange(startAddress: number, quantity: number, maxQuantity: number): void {
  validateAddress(startAddress);
  if (!Number.isInteger(quantity) || quantity < 1 || quantity > maxQuantity) {
    throw new ModbusInvalidQuantityError(quantity, 1, maxQuantity);
  }
  if (startAddress + quantity - 1 > 0xffff) {
    throw new ModbusInvalidAddressError(startAddress + quantity - 1);
  }
}

export default ModbusClient;
