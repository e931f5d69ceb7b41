// src/session/base-session.ts

import type { ModbusFramer } from '../framers/modbus-framer.js';
import type { PendingRequest } from '../transaction/pending-request.js';
import { PendingRequestRegistry } from '../transaction/pending-request-registry.js';
import { ResponseDispatcher, type DispatchStats } from '../transaction/response-dispatcher.js';
import { TransactionIdAllocator } from '../transaction/transaction-id-allocator.js';
import { ModbusTransportWriteError } from '../errors.js';
import type {
  FrameWriter,
  LoggerInstance,
  RequestExecutor,
  SessionOptions,
  TransactionIdSource,
  Transactional,
} from '../types/modbus-types.js';

/**
 * Request/response correlation shared by the stream and datagram sessions.
 *
 * Owns the pending-request registry and the dispatcher that drains it. The
 * transport only ever sees encoded bytes; replies come back through the
 * framer's decode callback.
 */
export abstract class ModbusSession<TRequest extends Transactional, TReply extends Transactional>
  implements RequestExecutor<TRequest, TReply>
{
  protected readonly _registry = new PendingRequestRegistry<TReply>();
  protected readonly _dispatcher: ResponseDispatcher<TReply>;
  protected readonly _allocator: TransactionIdSource;
  protected readonly _logger: LoggerInstance;

  protected constructor(
    protected readonly _framer: ModbusFramer<TRequest, TReply>,
    private readonly _writer: FrameWriter,
    options: SessionOptions,
    defaultLogger: LoggerInstance
  ) {
    this._allocator = options.allocator ?? new TransactionIdAllocator();
    this._logger = options.logger ?? defaultLogger;
    this._dispatcher = new ResponseDispatcher<TReply>(this._registry, this._logger);
  }

  abstract execute(request: TRequest): Promise<TReply>;

  get pendingCount(): number {
    return this._registry.size;
  }

  pendingTransactionIds(): number[] {
    return this._registry.transactionIds();
  }

  get stats(): Readonly<DispatchStats> {
    return this._dispatcher.stats;
  }

  /**
   * Assigns a transaction ID, registers the pending request and hands the
   * encoded frame to the transport.
   *
   * The entry is registered before the write so that a reply racing the write
   * completion still finds it. The returned promise settles exactly once: with
   * the matching reply, or with whatever error removed the entry.
   */
  protected _send(request: TRequest): Promise<TReply> {
    const transactionId = this._allocator.next();
    request.transactionId = transactionId;

    let packet: Uint8Array;
    let pending: PendingRequest<TReply>;
    try {
      packet = this._framer.encode(request);
      pending = this._registry.register(transactionId);
    } catch (err: unknown) {
      this._logger.warn(`Request not sent: ${err instanceof Error ? err.message : String(err)}`, {
        transactionId,
      });
      return Promise.reject(err);
    }

    this._logger.debug('Sending request', {
      transactionId,
      bytes: packet.length,
      pending: this._registry.size,
    });

    let writing: Promise<void>;
    try {
      writing = this._writer.write(packet);
    } catch (err: unknown) {
      writing = Promise.reject(err);
    }

    const written = writing.catch((err: unknown) => {
      const orphan = this._registry.pop(transactionId);
      if (!orphan) {
        this._logger.debug('Write failed after request was already settled', { transactionId });
        return;
      }
      const error = new ModbusTransportWriteError(transactionId, err);
      this._logger.warn(error.message, { transactionId });
      orphan.fail(error);
    });

    return Promise.all([pending.promise, written]).then(([reply]) => reply);
  }
}
