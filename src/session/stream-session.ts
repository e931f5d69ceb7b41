// src/session/stream-session.ts

import { ModbusSession } from './base-session.js';
import type { ModbusFramer } from '../framers/modbus-framer.js';
import { rootLogger } from '../logger.js';
import {
  ModbusConnectionLostError,
  ModbusNotConnectedError,
  ModbusStateError,
} from '../errors.js';
import type {
  ModbusReply,
  ModbusRequest,
  SessionOptions,
  StreamTransport,
  StreamTransportHandler,
  Transactional,
} from '../types/modbus-types.js';

const defaultLogger = rootLogger.createLogger('ModbusStreamSession');

export enum SessionState {
  Disconnected = 'disconnected',
  Connected = 'connected',
}

/**
 * Session over a connection-oriented transport (Modbus TCP).
 *
 * Requests are only sent while connected. Losing the connection fails every
 * outstanding request with `ModbusConnectionLostError`, so a disconnected
 * session never holds pending entries. The session can connect again later.
 */
export class ModbusStreamSession<
    TRequest extends Transactional = ModbusRequest,
    TReply extends Transactional = ModbusReply,
  >
  extends ModbusSession<TRequest, TReply>
  implements StreamTransportHandler
{
  private _state: SessionState = SessionState.Disconnected;

  constructor(
    private readonly _transport: StreamTransport,
    framer: ModbusFramer<TRequest, TReply>,
    options: SessionOptions = {}
  ) {
    super(framer, _transport, options, defaultLogger);
    this._transport.setHandler(this);
  }

  get state(): SessionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === SessionState.Connected;
  }

  get transport(): StreamTransport {
    return this._transport;
  }

  /**
   * Opens the underlying transport; `onConnected` fires once it is up.
   */
  connect(): Promise<void> {
    return this._transport.connect();
  }

  close(): Promise<void> {
    return this._transport.disconnect();
  }

  execute(request: TRequest): Promise<TReply> {
    if (this._state !== SessionState.Connected) {
      this._logger.debug('Request rejected: client is not connected');
      return Promise.reject(new ModbusNotConnectedError('Client is not connected'));
    }
    return this._send(request);
  }

  onConnected(): void {
    if (this._state === SessionState.Connected) {
      this._logger.warn('Connected notification received while already connected');
      return;
    }
    this._state = SessionState.Connected;
    this._logger.debug('Client connected to modbus server');
  }

  onDisconnected(reason: string): void {
    this._state = SessionState.Disconnected;
    this._framer.reset();

    const failed = this._registry.failAll(
      transactionId => new ModbusConnectionLostError(reason, transactionId)
    );
    this._logger.debug(`Client disconnected from modbus server: ${reason}`, { pending: failed });

    if (!this._registry.isEmpty) {
      throw new ModbusStateError(
        `Disconnected session still tracks ${this._registry.size} pending requests`
      );
    }
  }

  onDataReceived(data: Uint8Array): void {
    this._framer.feed(data, reply => this._dispatcher.onReply(reply));
  }
}
