// src/constants/constants.ts

/**
 * Modbus Function Codes supported by the request API
 */
export enum ModbusFunctionCode {
  READ_COILS = 0x01,
  READ_DISCRETE_INPUTS = 0x02,
  READ_HOLDING_REGISTERS = 0x03,
  READ_INPUT_REGISTERS = 0x04,
  WRITE_SINGLE_COIL = 0x05,
  WRITE_SINGLE_REGISTER = 0x06,
  WRITE_MULTIPLE_COILS = 0x0f,
  WRITE_MULTIPLE_REGISTERS = 0x10,
}

/**
 * Modbus Exception Codes
 */
export enum ModbusExceptionCode {
  ILLEGAL_FUNCTION = 1,
  ILLEGAL_DATA_ADDRESS = 2,
  ILLEGAL_DATA_VALUE = 3,
  SLAVE_DEVICE_FAILURE = 4,
  ACKNOWLEDGE = 5,
  SLAVE_DEVICE_BUSY = 6,
  MEMORY_PARITY_ERROR = 8,
  GATEWAY_PATH_UNAVAILABLE = 10,
  GATEWAY_TARGET_DEVICE_FAILED = 11,
}

export const MODBUS_EXCEPTION_MESSAGES: Readonly<Partial<Record<number, string>>> = {
  [ModbusExceptionCode.ILLEGAL_FUNCTION]: 'Illegal Function',
  [ModbusExceptionCode.ILLEGAL_DATA_ADDRESS]: 'Illegal Data Address',
  [ModbusExceptionCode.ILLEGAL_DATA_VALUE]: 'Illegal Data Value',
  [ModbusExceptionCode.SLAVE_DEVICE_FAILURE]: 'Slave Device Failure',
  [ModbusExceptionCode.ACKNOWLEDGE]: 'Acknowledge',
  [ModbusExceptionCode.SLAVE_DEVICE_BUSY]: 'Slave Device Busy',
  [ModbusExceptionCode.MEMORY_PARITY_ERROR]: 'Memory Parity Error',
  [ModbusExceptionCode.GATEWAY_PATH_UNAVAILABLE]: 'Gateway Path Unavailable',
  [ModbusExceptionCode.GATEWAY_TARGET_DEVICE_FAILED]: 'Gateway Target Device Failed to Respond',
};

/** Bit set in the function code of an exception reply */
export const EXCEPTION_FLAG = 0x80;

// MBAP header: tid(2) + protocol(2) + length(2) + unit(1)
export const MBAP_HEADER_LENGTH = 7;
export const MODBUS_PROTOCOL_ID = 0;

/** Largest value of the 16-bit MBAP transaction field */
export const MAX_TRANSACTION_ID = 0xffff;

/** PDU limits from the Modbus application protocol (253 bytes max) */
export const MIN_PDU_LENGTH = 1;
export const MAX_PDU_LENGTH = 253;

export const DEFAULT_TCP_PORT = 502;
