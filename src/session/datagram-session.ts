// src/session/datagram-session.ts

import { ModbusSession } from './base-session.js';
import type { ModbusFramer } from '../framers/modbus-framer.js';
import { rootLogger } from '../logger.js';
import { formatPeer } from '../utils/utils.js';
import type {
  DatagramTransport,
  DatagramTransportHandler,
  ModbusReply,
  ModbusRequest,
  PeerAddress,
  SessionOptions,
  Transactional,
} from '../types/modbus-types.js';

const defaultLogger = rootLogger.createLogger('ModbusDatagramSession');

/**
 * Session over a connectionless transport (Modbus UDP).
 *
 * There is no connection to gate on or to lose: `execute` always sends, and
 * requests stay pending until a datagram carrying their transaction ID arrives.
 * The sender address is only used for logging.
 */
export class ModbusDatagramSession<
    TRequest extends Transactional = ModbusRequest,
    TReply extends Transactional = ModbusReply,
  >
  extends ModbusSession<TRequest, TReply>
  implements DatagramTransportHandler
{
  constructor(
    private readonly _transport: DatagramTransport,
    framer: ModbusFramer<TRequest, TReply>,
    options: SessionOptions = {}
  ) {
    super(framer, _transport, options, defaultLogger);
    this._transport.setHandler(this);
  }

  get transport(): DatagramTransport {
    return this._transport;
  }

  open(): Promise<void> {
    return this._transport.open();
  }

  /**
   * Closes the socket. Outstanding requests are left pending.
   */
  close(): Promise<void> {
    if (!this._registry.isEmpty) {
      this._logger.warn(`Closing with ${this._registry.size} requests still pending`);
    }
    return this._transport.close();
  }

  execute(request: TRequest): Promise<TReply> {
    return this._send(request);
  }

  onDatagramReceived(data: Uint8Array, peer: PeerAddress): void {
    const from = formatPeer(peer.address, peer.port);
    this._logger.debug(`Datagram from: ${from}`, { peer: from, bytes: data.length });

    this._framer.feed(data, reply => this._dispatcher.onReply(reply, peer));

    // each datagram carries whole frames; leftovers never complete
    if (this._framer.bufferedLength > 0) {
      this._logger.debug(`Discarding ${this._framer.bufferedLength} trailing bytes`, { peer: from });
      this._framer.reset();
    }
  }
}
