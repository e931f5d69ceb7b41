// src/index.ts

export { TransactionIdAllocator } from './transaction/transaction-id-allocator.js';
export { PendingRequest } from './transaction/pending-request.js';
export { PendingRequestRegistry } from './transaction/pending-request-registry.js';
export { ResponseDispatcher } from './transaction/response-dispatcher.js';
export type { DispatchStats } from './transaction/response-dispatcher.js';

export { ModbusSession } from './session/base-session.js';
export { ModbusStreamSession, SessionState } from './session/stream-session.js';
export { ModbusDatagramSession } from './session/datagram-session.js';

export type { ModbusFramer, FrameCallback } from './framers/modbus-framer.js';
export { TcpFramer } from './framers/tcp-framer.js';

export { default as ModbusClient } from './client.js';
export { default as NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { default as NodeUdpTransport } from './transport/node-transports/node-udp-transport.js';
export { createSession, createClient } from './transport/factory.js';
export type { SessionFactoryOptions, ClientBundle, TransportType } from './transport/factory.js';

export { default as Logger, rootLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/modbus-types.js';
