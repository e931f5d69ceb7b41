// src/transport/factory.ts

import ModbusClient from '../client.js';
import { TcpFramer } from '../framers/tcp-framer.js';
import { ModbusStreamSession } from '../session/stream-session.js';
import { ModbusDatagramSession } from '../session/datagram-session.js';
import { DEFAULT_TCP_PORT } from '../constants/constants.js';
import { ModbusConfigError } from '../errors.js';
import { rootLogger } from '../logger.js';
import type {
  ModbusClientOptions,
  NodeTcpTransportOptions,
  NodeUdpTransportOptions,
  TransactionIdSource,
} from '../types/modbus-types.js';

const logger = rootLogger.createLogger('TransportFactory');

export type TransportType = 'tcp' | 'udp';

export interface SessionFactoryOptions {
  host: string;
  /** Defaults to 502 */
  port?: number;
  /** Receive buffer limit of the MBAP framer */
  maxBufferSize?: number;
  allocator?: TransactionIdSource;
  /** Used when the type is 'tcp' */
  tcp?: Omit<NodeTcpTransportOptions, 'logger'>;
  /** Used when the type is 'udp' */
  udp?: Omit<NodeUdpTransportOptions, 'logger'>;
}

export interface ClientBundle<TSession> {
  session: TSession;
  client: ModbusClient;
}

function validatePort(options: SessionFactoryOptions): number {
  if (!options.host) {
    throw new ModbusConfigError('Missing "host" option');
  }
  const port = options.port ?? DEFAULT_TCP_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ModbusConfigError(`Invalid port: ${port}. Port must be between 1-65535.`);
  }
  return port;
}

/**
 * Creates a session for the given transport type. The transport module is
 * loaded on demand; the session is not connected yet.
 *
 * @throws ModbusConfigError when the host is missing or the port is out of range
 */
export async function createSession(
  type: 'tcp',
  options: SessionFactoryOptions
): Promise<ModbusStreamSession>;
export async function createSession(
  type: 'udp',
  options: SessionFactoryOptions
): Promise<ModbusDatagramSession>;
export async function createSession(
  type: TransportType,
  options: SessionFactoryOptions
): Promise<ModbusStreamSession | ModbusDatagramSession>;
export async function createSession(
  type: TransportType,
  options: SessionFactoryOptions
): Promise<ModbusStreamSession | ModbusDatagramSession> {
  try {
    const port = validatePort(options);
    const framer = new TcpFramer({ maxBufferSize: options.maxBufferSize });

    switch (type) {
      case 'tcp': {
        const { default: NodeTcpTransport } = await import(
          './node-transports/node-tcp-transport.js'
        );
        const transport = new NodeTcpTransport(options.host, port, options.tcp);
        logger.debug(`Created TCP session for ${transport.peer}`);
        return new ModbusStreamSession(transport, framer, { allocator: options.allocator });
      }

      case 'udp': {
        const { default: NodeUdpTransport } = await import(
          './node-transports/node-udp-transport.js'
        );
        const transport = new NodeUdpTransport(options.host, port, options.udp);
        logger.debug(`Created UDP session for ${transport.peer}`);
        return new ModbusDatagramSession(transport, framer, { allocator: options.allocator });
      }

      default:
        throw new ModbusConfigError(`Unknown transport type: ${String(type)}`);
    }
  } catch (err: unknown) {
    logger.error(
      `Failed to create session of type "${String(type)}": ${err instanceof Error ? err.message : String(err)}`
    );
    throw err;
  }
}

/**
 * Same as `createSession`, plus a `ModbusClient` bound to the session.
 */
export async function createClient(
  type: 'tcp',
  options: SessionFactoryOptions & ModbusClientOptions
): Promise<ClientBundle<ModbusStreamSession>>;
export async function createClient(
  type: 'udp',
  options: SessionFactoryOptions & ModbusClientOptions
): Promise<ClientBundle<ModbusDatagramSession>>;
export async function createClient(
  type: TransportType,
  options: SessionFactoryOptions & ModbusClientOptions
): Promise<ClientBundle<ModbusStreamSession | ModbusDatagramSession>> {
  const session = await createSession(type, options);
  return { session, client: new ModbusClient(session, { unitId: options.unitId }) };
}
