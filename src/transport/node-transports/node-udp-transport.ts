// src/transport/node-transports/node-udp-transport.ts

import * as dgram from 'dgram';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../../logger.js';
import { ModbusNotConnectedError } from '../../errors.js';
import { formatPeer } from '../../utils/utils.js';
import type {
  DatagramTransport,
  DatagramTransportHandler,
  LoggerInstance,
  NodeUdpTransportOptions,
} from '../../types/modbus-types.js';

const defaultLogger = rootLogger.createLogger('NodeUdpTransport');

/**
 * Modbus UDP transport. Every request goes to one configured server; replies
 * are accepted from any sender.
 */
class NodeUdpTransport implements DatagramTransport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<Omit<NodeUdpTransportOptions, 'logger'>>;
  private logger: LoggerInstance;
  private socket: dgram.Socket | null = null;
  private handler: DatagramTransportHandler | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeUdpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      type: options.type ?? 'udp4',
      localPort: options.localPort ?? 0,
    };
    this.logger = options.logger ?? defaultLogger;
  }

  public setHandler(handler: DatagramTransportHandler): void {
    this.handler = handler;
  }

  get peer(): string {
    return formatPeer(this.host, this.port);
  }

  public async open(): Promise<void> {
    if (this.isOpen) return;

    const socket = dgram.createSocket(this.options.type);
    this.socket = socket;

    socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      this.handler?.onDatagramReceived(new Uint8Array(msg), {
        address: rinfo.address,
        port: rinfo.port,
      });
    });

    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
        this.isOpen = false;
      }
    });

    return new Promise<void>((resolve, reject) => {
      const onBindError = (err: Error): void => {
        this.logger.error(`Failed to bind UDP socket: ${err.message}`);
        this.socket = null;
        try {
          socket.close();
        } catch (closeErr: unknown) {
          this.logger.debug('Closing unbound UDP socket failed', closeErr);
        }
        reject(err);
      };
      socket.once('error', onBindError);
      socket.bind(this.options.localPort, () => {
        socket.off('error', onBindError);
        socket.on('error', (err: Error) => {
          this.logger.error(`Socket error: ${err.message}`, { peer: this.peer });
        });
        this.isOpen = true;
        this.logger.info(`UDP socket bound for ${this.peer}`);
        resolve();
      });
    });
  }

  public async write(buffer: Uint8Array): Promise<void> {
    await this._operationMutex.runExclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.socket;
          if (!this.isOpen || !socket) {
            reject(new ModbusNotConnectedError('Transport not open'));
            return;
          }
          this.logger.trace(`Sending ${buffer.length} bytes`, { peer: this.peer });
          socket.send(buffer, this.port, this.host, err => {
            if (err) reject(err);
            else resolve();
          });
        })
    );
  }

  public async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    this.isOpen = false;
    return new Promise<void>(resolve => {
      socket.close(() => {
        this.logger.info(`UDP socket closed for ${this.peer}`);
        resolve();
      });
    });
  }
}

export default NodeUdpTransport;
