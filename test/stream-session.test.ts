import { describe, expect, it, vi } from 'vitest';
import { ModbusStreamSession, SessionState } from '../src/session/stream-session.js';
import { TcpFramer } from '../src/framers/tcp-framer.js';
import { TransactionIdAllocator } from '../src/transaction/transaction-id-allocator.js';
import {
  ModbusConnectionLostError,
  ModbusInvalidFrameLengthError,
  ModbusNotConnectedError,
  ModbusTransactionCollisionError,
  ModbusTransportWriteError,
} from '../src/errors.js';
import type { TransactionIdSource } from '../src/types/modbus-types.js';
import {
  FakeStreamTransport,
  createFakeLogger,
  frameTransactionId,
  makeRequest,
  mbapFrame,
} from './helpers.js';

function setup(allocator?: TransactionIdSource) {
  const transport = new FakeStreamTransport();
  const logger = createFakeLogger();
  const session = new ModbusStreamSession(transport, new TcpFramer({ logger }), {
    allocator,
    logger,
  });
  return { transport, logger, session };
}

describe('ModbusStreamSession', () => {
  it('registers itself as the transport handler', () => {
    const { transport, session } = setup();
    expect(transport.handler).toBe(session);
    expect(session.state).toBe(SessionState.Disconnected);
  });

  it('rejects requests while disconnected without touching the transport', async () => {
    const { transport, session } = setup();

    await expect(session.execute(makeRequest())).rejects.toThrow(ModbusNotConnectedError);
    await expect(session.execute(makeRequest())).rejects.toThrow('Client is not connected');

    expect(transport.write).not.toHaveBeenCalled();
    expect(session.pendingCount).toBe(0);
  });

  it('matches replies by transaction ID and fails the rest on disconnect', async () => {
    const { transport, session } = setup();
    await session.connect();
    expect(session.isConnected).toBe(true);

    const a = session.execute(makeRequest());
    const b = session.execute(makeRequest());
    const aOutcome = a.catch((err: unknown) => err);

    expect(transport.written.map(frameTransactionId)).toEqual([1, 2]);
    expect(session.pendingTransactionIds()).toEqual([1, 2]);

    transport.receive(mbapFrame(2, 1, [0x03, 0x02, 0x00, 0x07]));

    await expect(b).resolves.toEqual({
      transactionId: 2,
      unitId: 1,
      functionCode: 0x03,
      pdu: Uint8Array.from([0x03, 0x02, 0x00, 0x07]),
    });
    expect(session.pendingTransactionIds()).toEqual([1]);

    transport.drop('Connection reset by peer');

    const error = await aOutcome;
    expect(error).toBeInstanceOf(ModbusConnectionLostError);
    expect(error).toMatchObject({
      reason: 'Connection reset by peer',
      transactionId: 1,
      message: 'Connection lost during request 1: Connection reset by peer',
    });
    expect(session.state).toBe(SessionState.Disconnected);
    expect(session.pendingCount).toBe(0);
  });

  it('fails every outstanding request when the connection drops', async () => {
    const { transport, session } = setup();
    await session.connect();

    const outcomes = Promise.allSettled(
      Array.from({ length: 5 }, () => session.execute(makeRequest()))
    );
    expect(session.pendingCount).toBe(5);

    transport.drop('Connection closed');

    const settled = await outcomes;
    const ids = settled.map(s =>
      s.status === 'rejected' && s.reason instanceof ModbusConnectionLostError
        ? s.reason.transactionId
        : null
    );
    expect(ids).toEqual([1, 2, 3, 4, 5]);
    expect(session.pendingCount).toBe(0);
  });

  it('resolves each request at most once', async () => {
    const { transport, session } = setup();
    await session.connect();

    const first = session.execute(makeRequest());
    const second = session.execute(makeRequest());

    transport.receive(mbapFrame(1, 1, [0x03, 0x02, 0x00, 0x01]));
    transport.receive(mbapFrame(1, 1, [0x03, 0x02, 0x00, 0x09]));

    const reply = await first;
    expect(Array.from(reply.pdu)).toEqual([0x03, 0x02, 0x00, 0x01]);
    expect(session.stats).toEqual({ matched: 1, unsolicited: 1 });
    expect(session.pendingTransactionIds()).toEqual([2]);

    transport.receive(mbapFrame(2, 1, [0x03, 0x02, 0x00, 0x02]));
    await expect(second).resolves.toMatchObject({ transactionId: 2 });
  });

  it('tolerates replies that arrive with nothing pending', async () => {
    const { transport, session } = setup();
    await session.connect();

    expect(() => transport.receive(mbapFrame(42, 1, [0x03, 0x02, 0x00, 0x01]))).not.toThrow();
    expect(session.stats).toEqual({ matched: 0, unsolicited: 0 });
  });

  it('reassembles a reply split across reads', async () => {
    const { transport, session } = setup();
    await session.connect();

    const pending = session.execute(makeRequest());
    const frame = mbapFrame(1, 1, [0x03, 0x02, 0x12, 0x34]);
    transport.receive(frame.subarray(0, 3));
    transport.receive(frame.subarray(3));

    await expect(pending).resolves.toMatchObject({ transactionId: 1, functionCode: 0x03 });
  });

  it('fails the request and forgets it when the write fails', async () => {
    const { transport, session } = setup();
    await session.connect();
    const cause = new Error('EPIPE');
    transport.write.mockRejectedValueOnce(cause);

    const error = await session.execute(makeRequest()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModbusTransportWriteError);
    expect(error).toMatchObject({
      message: 'Failed to write request 1: EPIPE',
      transactionId: 1,
      cause,
    });
    expect(session.pendingCount).toBe(0);
  });

  it('settles once when the connection drops while a write is still in flight', async () => {
    const { transport, session, logger } = setup();
    await session.connect();
    let failWrite: (err: Error) => void = () => undefined;
    transport.write.mockImplementationOnce(
      () =>
        new Promise<void>((_, reject) => {
          failWrite = reject;
        })
    );

    const settled = vi.fn();
    const outcome = session.execute(makeRequest()).then(
      reply => {
        settled();
        return reply;
      },
      (err: unknown) => {
        settled();
        return err;
      }
    );

    transport.drop('Connection reset by peer');
    failWrite(new Error('EPIPE'));
    const error = await outcome;
    await new Promise(resolve => setImmediate(resolve));

    expect(settled).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(ModbusConnectionLostError);
    expect(error).toMatchObject({ reason: 'Connection reset by peer', transactionId: 1 });
    expect(session.pendingCount).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith('Write failed after request was already settled', {
      transactionId: 1,
    });
  });

  it('matches a burst of replies delivered in one read', async () => {
    const { transport, session } = setup();
    await session.connect();
    const registers = [0x03, 250, ...new Array<number>(250).fill(0x22)];

    const requests = Array.from({ length: 16 }, () =>
      session.execute(makeRequest([0x03, 0x00, 0x00, 0x00, 0x7d]))
    );
    transport.receive(
      Uint8Array.from(Array.from({ length: 16 }, (_, i) => [...mbapFrame(i + 1, 1, registers)]).flat())
    );

    const replies = await Promise.all(requests);
    expect(replies.map(r => r.transactionId)).toEqual(Array.from({ length: 16 }, (_, i) => i + 1));
    expect(session.pendingCount).toBe(0);
  });

  it('reports a synchronous transport throw through the returned promise', async () => {
    const { transport, session } = setup();
    await session.connect();
    transport.write.mockImplementationOnce(() => {
      throw new Error('socket destroyed');
    });

    await expect(session.execute(makeRequest())).rejects.toThrow(
      'Failed to write request 1: socket destroyed'
    );
    expect(session.pendingCount).toBe(0);
  });

  it('does not send a request whose ID is still outstanding', async () => {
    const fixed: TransactionIdSource = { next: () => 7 };
    const { transport, session } = setup(fixed);
    await session.connect();

    const first = session.execute(makeRequest());
    await expect(session.execute(makeRequest())).rejects.toThrow(ModbusTransactionCollisionError);

    expect(transport.write).toHaveBeenCalledTimes(1);
    expect(session.pendingTransactionIds()).toEqual([7]);

    transport.receive(mbapFrame(7, 1, [0x03, 0x02, 0x00, 0x01]));
    await expect(first).resolves.toMatchObject({ transactionId: 7 });
  });

  it('does not register a request that cannot be encoded', async () => {
    const { transport, session, logger } = setup();
    await session.connect();

    await expect(session.execute(makeRequest([]))).rejects.toThrow(ModbusInvalidFrameLengthError);

    expect(transport.write).not.toHaveBeenCalled();
    expect(session.pendingCount).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      'Request not sent: Invalid frame length: 0, expected 1-253',
      { transactionId: 1 }
    );
  });

  it('can connect again after a disconnect', async () => {
    const { transport, session } = setup();
    await session.connect();
    const lost = session.execute(makeRequest()).catch((err: unknown) => err);

    // half a reply is on the wire when the connection drops
    transport.receive(mbapFrame(1, 1, [0x03, 0x02, 0x00, 0x01]).subarray(0, 6));
    transport.drop('Connection timed out');
    expect(await lost).toBeInstanceOf(ModbusConnectionLostError);

    await session.connect();
    const next = session.execute(makeRequest());
    expect(frameTransactionId(transport.written[1])).toBe(2);

    transport.receive(mbapFrame(2, 1, [0x03, 0x02, 0x00, 0x05]));
    await expect(next).resolves.toMatchObject({ transactionId: 2 });
  });

  it('fails pending requests when closed by the caller', async () => {
    const { session } = setup();
    await session.connect();
    const pending = session.execute(makeRequest()).catch((err: unknown) => err);

    await session.close();

    expect(await pending).toMatchObject({ reason: 'Connection closed by client' });
    expect(session.isConnected).toBe(false);
  });

  it('shares an injected allocator between sessions', async () => {
    const allocator = new TransactionIdAllocator();
    const one = setup(allocator);
    const two = setup(allocator);
    await one.session.connect();
    await two.session.connect();

    void one.session.execute(makeRequest()).catch(() => undefined);
    void two.session.execute(makeRequest()).catch(() => undefined);

    expect(frameTransactionId(one.transport.written[0])).toBe(1);
    expect(frameTransactionId(two.transport.written[0])).toBe(2);
  });

  it('warns about a duplicate connected notification', async () => {
    const { session, logger } = setup();
    await session.connect();

    session.onConnected();

    expect(logger.warn).toHaveBeenCalledWith(
      'Connected notification received while already connected'
    );
    expect(session.isConnected).toBe(true);
  });
});
