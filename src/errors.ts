// src/errors.ts

import { MODBUS_EXCEPTION_MESSAGES } from './constants/constants.js';

/**
 * Base class for all Modbus errors
 */
export class ModbusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusError';
  }
}

/**
 * Error class for Modbus response errors
 */
export class ModbusResponseError extends ModbusError {
  constructor(message: string = 'Invalid Modbus response') {
    super(message);
    this.name = 'ModbusResponseError';
  }
}

/**
 * Error class for Modbus exception replies
 */
export class ModbusExceptionError extends ModbusError {
  functionCode: number;
  exceptionCode: number;

  constructor(functionCode: number, exceptionCode: number) {
    const exceptionMessage =
      MODBUS_EXCEPTION_MESSAGES[exceptionCode] ?? `Unknown exception code: ${exceptionCode}`;
    super(
      `Modbus exception: function 0x${functionCode.toString(16)}, code 0x${exceptionCode.toString(16)} (${exceptionMessage})`
    );
    this.name = 'ModbusExceptionError';
    this.functionCode = functionCode;
    this.exceptionCode = exceptionCode;
  }
}

// --- Errors for Data Validation ---

/**
 * Error class for invalid Modbus address
 */
export class ModbusInvalidAddressError extends ModbusError {
  constructor(address: number) {
    super(`Invalid Modbus address: ${address}. Address must be between 0-65535.`);
    this.name = 'ModbusInvalidAddressError';
  }
}

/**
 * Error class for invalid unit identifier
 */
export class ModbusInvalidUnitIdError extends ModbusError {
  constructor(unitId: number) {
    super(`Invalid unit ID: ${unitId}. Unit ID must be between 0-255.`);
    this.name = 'ModbusInvalidUnitIdError';
  }
}

/**
 * Error class for invalid quantity (register/coil count)
 */
export class ModbusInvalidQuantityError extends ModbusError {
  constructor(quantity: number, min: number, max: number) {
    super(`Invalid quantity: ${quantity}. Must be between ${min}-${max}.`);
    this.name = 'ModbusInvalidQuantityError';
  }
}

/**
 * Error class for illegal data value
 */
export class ModbusIllegalDataValueError extends ModbusError {
  constructor(value: number | string, expected: string) {
    super(`Illegal data value: ${value}, expected ${expected}`);
    this.name = 'ModbusIllegalDataValueError';
  }
}

// --- Errors for Message Format ---

/**
 * Error class for invalid frame length
 */
export class ModbusInvalidFrameLengthError extends ModbusResponseError {
  constructor(received: number, min: number, max: number) {
    super(`Invalid frame length: ${received}, expected ${min}-${max}`);
    this.name = 'ModbusInvalidFrameLengthError';
  }
}

// --- Errors for Connection and Transport ---

/**
 * Error class for not connected
 */
export class ModbusNotConnectedError extends ModbusError {
  constructor(message: string = 'Not connected to Modbus device') {
    super(message);
    this.name = 'ModbusNotConnectedError';
  }
}

/**
 * Delivered to every request still pending when the connection goes away
 */
export class ModbusConnectionLostError extends ModbusError {
  reason: string;
  transactionId: number | null;

  constructor(reason: string, transactionId: number | null = null) {
    super(
      transactionId === null
        ? `Connection lost: ${reason}`
        : `Connection lost during request ${transactionId}: ${reason}`
    );
    this.name = 'ModbusConnectionLostError';
    this.reason = reason;
    this.transactionId = transactionId;
  }
}

/**
 * Error class for a transport that refused the outgoing frame
 */
export class ModbusTransportWriteError extends ModbusError {
  transactionId: number;
  override cause: unknown;

  constructor(transactionId: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write request ${transactionId}: ${detail}`);
    this.name = 'ModbusTransportWriteError';
    this.transactionId = transactionId;
    this.cause = cause;
  }
}

/**
 * Error class for a transaction ID that is still outstanding on the session
 */
export class ModbusTransactionCollisionError extends ModbusError {
  transactionId: number;

  constructor(transactionId: number) {
    super(`Transaction ID ${transactionId} is already awaiting a reply`);
    this.name = 'ModbusTransactionCollisionError';
    this.transactionId = transactionId;
  }
}

/**
 * Error class for a broken internal state transition
 */
export class ModbusStateError extends ModbusError {
  constructor(message: string) {
    super(message);
    this.name = 'ModbusStateError';
  }
}

/**
 * Error class for Modbus configuration error
 */
export class ModbusConfigError extends ModbusError {
  constructor(message: string = 'Invalid Modbus configuration') {
    super(message);
    this.name = 'ModbusConfigError';
  }
}
