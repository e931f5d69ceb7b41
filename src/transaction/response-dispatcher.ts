// src/transaction/response-dispatcher.ts

import { rootLogger } from '../logger.js';
import { formatPeer } from '../utils/utils.js';
import type { LoggerInstance, ModbusReply, PeerAddress, Transactional } from '../types/modbus-types.js';
import type { PendingRequestRegistry } from './pending-request-registry.js';

const defaultLogger = rootLogger.createLogger('ResponseDispatcher');

export interface DispatchStats {
  matched: number;
  unsolicited: number;
}

/**
 * Routes decoded replies to the pending request with the same transaction ID.
 * Replies nobody is waiting for are logged and dropped; this never throws.
 */
export class ResponseDispatcher<TReply extends Transactional = ModbusReply> {
  private readonly _stats: DispatchStats = { matched: 0, unsolicited: 0 };

  constructor(
    private readonly _registry: PendingRequestRegistry<TReply>,
    private readonly _logger: LoggerInstance = defaultLogger
  ) {}

  get stats(): Readonly<DispatchStats> {
    return { ...this._stats };
  }

  onReply(reply: TReply | null | undefined, peer?: PeerAddress): void {
    if (!reply || this._registry.isEmpty) return;

    const transactionId = reply.transactionId;
    const pending = this._registry.pop(transactionId);
    if (pending) {
      this._stats.matched++;
      pending.resolve(reply);
      return;
    }

    this._stats.unsolicited++;
    this._logger.debug('Unsolicited reply discarded', {
      transactionId,
      unitId: readUnitId(reply),
      peer: peer ? formatPeer(peer.address, peer.port) : undefined,
      pending: this._registry.size,
    });
  }
}

function readUnitId(reply: Transactional): number | undefined {
  return 'unitId' in reply && typeof reply.unitId === 'number' ? reply.unitId : undefined;
}
