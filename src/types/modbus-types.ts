// src/types/modbus-types.ts

// !=============================================================================
// ! Request / reply objects
// !=============================================================================

/** Anything that carries a correlation identifier through the wire */
export interface Transactional {
  transactionId: number;
}

/** Outgoing application request: the transaction ID is assigned by the session */
export interface ModbusRequest extends Transactional {
  unitId: number;
  pdu: Uint8Array;
}

/** Reply decoded by the framer from one complete ADU */
export interface ModbusReply extends Transactional {
  unitId: number;
  functionCode: number;
  pdu: Uint8Array;
}

/** Anything that can turn a request into its eventual reply */
export interface RequestExecutor<TRequest extends Transactional, TReply extends Transactional> {
  execute(request: TRequest): Promise<TReply>;
}

/** Lifecycle of a single in-flight request */
export type PendingState = 'pending' | 'resolved' | 'failed';

/** Source of transaction identifiers for a session */
export interface TransactionIdSource {
  next(): number;
}

// !=============================================================================
// ! Types for Modbus read functions
// !=============================================================================

export type ReadCoilsResponse = boolean[];

export type ReadDiscreteInputsResponse = boolean[];

export type ReadHoldingRegistersResponse = number[];

export type ReadInputRegistersResponse = number[];

// !=============================================================================
// ! Types for Modbus write functions
// !=============================================================================

/** Echo of a Write Single Coil request */
export interface WriteSingleCoilResponse {
  address: number;
  value: boolean;
}

/** Echo of a Write Multiple Coils request */
export interface WriteMultipleCoilsResponse {
  startAddress: number;
  quantity: number;
}

/** Echo of a Write Single Register request */
export interface WriteSingleRegisterResponse {
  address: number;
  value: number;
}

/** Echo of a Write Multiple Registers request */
export interface WriteMultipleRegistersResponse {
  startAddress: number;
  quantity: number;
}

// !=============================================================================
// ! Transport interfaces
// !=============================================================================

export interface PeerAddress {
  address: string;
  port: number;
}

/** Hooks a connection-oriented transport drives on its session */
export interface StreamTransportHandler {
  onConnected(): void;
  onDisconnected(reason: string): void;
  onDataReceived(data: Uint8Array): void;
}

/** Hook a connectionless transport drives on its session */
export interface DatagramTransportHandler {
  onDatagramReceived(data: Uint8Array, peer: PeerAddress): void;
}

export interface FrameWriter {
  write(buffer: Uint8Array): Promise<void>;
}

/** Connection-oriented transport (TCP) */
export interface StreamTransport extends FrameWriter {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  setHandler(handler: StreamTransportHandler): void;
}

/** Connectionless transport (UDP) */
export interface DatagramTransport extends FrameWriter {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  setHandler(handler: DatagramTransportHandler): void;
}

export interface NodeTcpTransportOptions {
  connectTimeout?: number;
  reconnectInterval?: number;
  maxReconnectAttempts?: number;
  noDelay?: boolean;
  logger?: LoggerInstance;
}

export interface NodeUdpTransportOptions {
  type?: 'udp4' | 'udp6';
  localPort?: number;
  logger?: LoggerInstance;
}

// !=============================================================================
// ! Session, framer and client options
// !=============================================================================

export interface SessionOptions {
  /** Shared allocator; a private one is created when omitted */
  allocator?: TransactionIdSource;
  logger?: LoggerInstance;
}

export interface TcpFramerOptions {
  maxBufferSize?: number;
  logger?: LoggerInstance;
}

export interface ModbusClientOptions {
  unitId?: number;
}

// !=============================================================================
// ! Logger types
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Context attached to a log record */
export interface LogContext {
  transactionId?: number;
  unitId?: number;
  funcCode?: number;
  exceptionCode?: number;
  peer?: string;
  pending?: number;
  logger?: string;
  transport?: string;
  [key: string]: string | number | boolean | undefined;
}

/** A named logger category */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}
