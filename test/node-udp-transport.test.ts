import { EventEmitter } from 'events';
import { beforeEach, describe, expect, it, vi } from 'vitest';

interface SentDatagram {
  msg: Buffer;
  port: number;
  address: string;
}

class MockDgramSocket extends EventEmitter {
  public sent: SentDatagram[] = [];
  public boundPort: number | null = null;
  public closed = false;

  public bind(port: number, cb?: () => void): this {
    if (mocks.bindError) {
      this.emit('error', mocks.bindError);
      return this;
    }
    this.boundPort = port;
    cb?.();
    return this;
  }

  public send(
    msg: Uint8Array,
    port: number,
    address: string,
    cb?: (err: Error | null, bytes: number) => void
  ): void {
    this.sent.push({ msg: Buffer.from(msg), port, address });
    cb?.(null, msg.length);
  }

  public close(cb?: () => void): this {
    this.closed = true;
    this.emit('close');
    cb?.();
    return this;
  }
}

const mocks = vi.hoisted(() => {
  const sockets: unknown[] = [];
  const state: { sockets: unknown[]; bindError: Error | null } = { sockets, bindError: null };
  return state;
});

vi.mock('dgram', () => ({
  createSocket: vi.fn(() => {
    const socket = new MockDgramSocket();
    mocks.sockets.push(socket);
    return socket;
  }),
}));

import * as dgram from 'dgram';
import NodeUdpTransport from '../src/transport/node-transports/node-udp-transport.js';
import { ModbusNotConnectedError } from '../src/errors.js';
import type { NodeUdpTransportOptions } from '../src/types/modbus-types.js';
import { createFakeLogger } from './helpers.js';

function socketAt(index: number): MockDgramSocket {
  const socket = mocks.sockets[index];
  if (!(socket instanceof MockDgramSocket)) throw new Error(`No socket #${index}`);
  return socket;
}

function setup(options: NodeUdpTransportOptions = {}) {
  const logger = createFakeLogger();
  const transport = new NodeUdpTransport('192.0.2.10', 502, { logger, ...options });
  const handler = { onDatagramReceived: vi.fn() };
  transport.setHandler(handler);
  return { transport, handler, logger };
}

describe('NodeUdpTransport', () => {
  beforeEach(() => {
    mocks.sockets.length = 0;
    mocks.bindError = null;
    vi.mocked(dgram.createSocket).mockClear();
  });

  it('binds an IPv4 socket on an ephemeral port by default', async () => {
    const { transport } = setup();

    await transport.open();

    expect(dgram.createSocket).toHaveBeenCalledWith('udp4');
    expect(socketAt(0).boundPort).toBe(0);
    expect(transport.isOpen).toBe(true);
  });

  it('honours the socket type and local port', async () => {
    const { transport } = setup({ type: 'udp6', localPort: 1502 });

    await transport.open();

    expect(dgram.createSocket).toHaveBeenCalledWith('udp6');
    expect(socketAt(0).boundPort).toBe(1502);
  });

  it('opens only once', async () => {
    const { transport } = setup();

    await transport.open();
    await transport.open();

    expect(dgram.createSocket).toHaveBeenCalledTimes(1);
  });

  it('forwards datagrams with their sender', async () => {
    const { transport, handler } = setup();
    await transport.open();

    socketAt(0).emit('message', Buffer.from([0x00, 0x01, 0x00]), {
      address: '192.0.2.20',
      family: 'IPv4',
      port: 5020,
      size: 3,
    });

    expect(handler.onDatagramReceived).toHaveBeenCalledWith(Uint8Array.from([0x00, 0x01, 0x00]), {
      address: '192.0.2.20',
      port: 5020,
    });
  });

  it('sends every frame to the configured server', async () => {
    const { transport } = setup();
    await transport.open();

    await transport.write(Uint8Array.from([0x00, 0x01]));

    expect(socketAt(0).sent).toEqual([
      { msg: Buffer.from([0x00, 0x01]), port: 502, address: '192.0.2.10' },
    ]);
  });

  it('refuses to write before open', async () => {
    const { transport } = setup();

    await expect(transport.write(Uint8Array.from([0x01]))).rejects.toThrow(
      ModbusNotConnectedError
    );
  });

  it('rejects open when binding fails', async () => {
    mocks.bindError = new Error('bind EADDRINUSE 0.0.0.0:1502');
    const { transport, logger } = setup({ localPort: 1502 });

    await expect(transport.open()).rejects.toThrow('bind EADDRINUSE 0.0.0.0:1502');
    expect(transport.isOpen).toBe(false);
    expect(socketAt(0).closed).toBe(true);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to bind UDP socket: bind EADDRINUSE 0.0.0.0:1502'
    );
  });

  it('closes the socket', async () => {
    const { transport } = setup();
    await transport.open();

    await transport.close();

    expect(socketAt(0).closed).toBe(true);
    expect(transport.isOpen).toBe(false);
    await expect(transport.write(Uint8Array.from([0x01]))).rejects.toThrow(
      ModbusNotConnectedError
    );
  });
});
