// src/transport/node-transports/node-tcp-transport.ts

import * as net from 'net';
import { Mutex } from 'async-mutex';
import { rootLogger } from '../../logger.js';
import { ModbusNotConnectedError } from '../../errors.js';
import { formatPeer } from '../../utils/utils.js';
import type {
  LoggerInstance,
  NodeTcpTransportOptions,
  StreamTransport,
  StreamTransportHandler,
} from '../../types/modbus-types.js';

const defaultLogger = rootLogger.createLogger('NodeTcpTransport');

class NodeTcpTransport implements StreamTransport {
  public isOpen: boolean = false;
  private host: string;
  private port: number;
  private options: Required<Omit<NodeTcpTransportOptions, 'logger'>>;
  private logger: LoggerInstance;
  private socket: net.Socket | null = null;
  private handler: StreamTransportHandler | null = null;

  private _reconnectAttempts: number = 0;
  private _shouldReconnect: boolean = true;
  private _reconnectTimeout: NodeJS.Timeout | null = null;
  private _isConnecting: boolean = false;
  private _connecting: Promise<void> | null = null;
  private _lastError: Error | null = null;
  private _closeReason: string | null = null;
  private _operationMutex: Mutex = new Mutex();

  constructor(host: string, port: number, options: NodeTcpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      connectTimeout: options.connectTimeout ?? 2000,
      reconnectInterval: options.reconnectInterval ?? 3000,
      maxReconnectAttempts: options.maxReconnectAttempts ?? Infinity,
      noDelay: options.noDelay ?? true,
    };
    this.logger = options.logger ?? defaultLogger;
  }

  public setHandler(handler: StreamTransportHandler): void {
    this.handler = handler;
  }

  get peer(): string {
    return formatPeer(this.host, this.port);
  }

  get reconnectAttempts(): number {
    return this._reconnectAttempts;
  }

  /** Opens the socket; joins the attempt already in flight, if any. */
  public connect(): Promise<void> {
    if (this.isOpen) return Promise.resolve();
    if (this._connecting) return this._connecting;
    this._isConnecting = true;
    this._shouldReconnect = true;
    this._lastError = null;
    this._closeReason = null;

    const attempt = this._openSocket();
    this._connecting = attempt;
    const settle = (): void => {
      if (this._connecting === attempt) this._connecting = null;
    };
    attempt.then(settle, settle);
    return attempt;
  }

  private _openSocket(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.logger.info(`Connecting to ${this.peer}...`);

      const socket = net.connect({ host: this.host, port: this.port });
      this.socket = socket;

      const timer = setTimeout(() => {
        if (!this._isConnecting) return;
        this._isConnecting = false;
        const err = new ModbusNotConnectedError(
          `Connection to ${this.peer} timed out after ${this.options.connectTimeout} ms`
        );
        this._lastError = err;
        socket.destroy();
        reject(err);
      }, this.options.connectTimeout);

      socket.once('connect', () => {
        clearTimeout(timer);
        this.isOpen = true;
        this._isConnecting = false;
        this._reconnectAttempts = 0;
        socket.setNoDelay(this.options.noDelay);
        this.logger.info(`Connected to ${this.peer}`);
        this.handler?.onConnected();
        resolve();
      });

      socket.on('data', (data: Buffer) => {
        this.logger.trace(`Received ${data.length} bytes`, { peer: this.peer });
        this.handler?.onDataReceived(new Uint8Array(data));
      });

      socket.on('error', (err: Error) => {
        this._lastError = err;
        this.logger.error(`Socket error: ${err.message}`, { peer: this.peer });
        if (this._isConnecting) {
          clearTimeout(timer);
          this._isConnecting = false;
          reject(err);
        }
      });

      socket.on('close', () => {
        clearTimeout(timer);
        if (this._isConnecting && this.socket === socket) {
          this._isConnecting = false;
          reject(new ModbusNotConnectedError(`Connection to ${this.peer} closed before it opened`));
        }
        this._onClose(socket);
      });
    });
  }

  private _onClose(socket: net.Socket): void {
    if (this.socket !== socket) return;
    this.socket = null;
    this._isConnecting = false;
    this._connecting = null;

    const wasOpen = this.isOpen;
    this.isOpen = false;
    if (wasOpen) {
      const reason = this._closeReason ?? this._lastError?.message ?? 'Connection closed';
      this.logger.warn(`Connection closed for ${this.peer}: ${reason}`);
      this._notifyDisconnected(reason);
    }
    if (this._shouldReconnect) this._scheduleReconnect();
  }

  private _notifyDisconnected(reason: string): void {
    try {
      this.handler?.onDisconnected(reason);
    } catch (err: unknown) {
      this.logger.error('Disconnect handler failed', err);
    }
  }

  private _scheduleReconnect(): void {
    if (this._reconnectTimeout || this._reconnectAttempts >= this.options.maxReconnectAttempts)
      return;
    this._reconnectAttempts++;
    this.logger.info(
      `Reconnecting to ${this.peer} in ${this.options.reconnectInterval} ms (attempt ${this._reconnectAttempts}/${this.options.maxReconnectAttempts})`
    );
    this._reconnectTimeout = setTimeout(() => {
      this._reconnectTimeout = null;
      this.connect().catch((err: unknown) => {
        this.logger.warn(
          `Reconnect attempt ${this._reconnectAttempts} failed: ${err instanceof Error ? err.message : String(err)}`
        );
      });
    }, this.options.reconnectInterval);
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
          socket.write(Buffer.from(buffer), err => {
            if (err) reject(err);
            else resolve();
          });
        })
    );
  }

  public async disconnect(): Promise<void> {
    this._shouldReconnect = false;
    if (this._reconnectTimeout) {
      clearTimeout(this._reconnectTimeout);
      this._reconnectTimeout = null;
    }
    const socket = this.socket;
    if (!socket) return;

    this._closeReason = 'Connection closed by client';
    return new Promise<void>(resolve => {
      socket.once('close', () => resolve());
      socket.end();
    });
  }
}

export default NodeTcpTransport;
