import { vi } from 'vitest';
import type {
  DatagramTransport,
  DatagramTransportHandler,
  LoggerInstance,
  ModbusRequest,
  PeerAddress,
  StreamTransport,
  StreamTransportHandler,
} from '../src/types/modbus-types.js';

export function createFakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
    pause: vi.fn(),
    resume: vi.fn(),
  } satisfies LoggerInstance;
}

/** Read Holding Registers request for unit 1; the session fills in the ID */
export function makeRequest(pdu: number[] = [0x03, 0x00, 0x00, 0x00, 0x01], unitId = 1): ModbusRequest {
  return { transactionId: 0, unitId, pdu: Uint8Array.from(pdu) };
}

/** MBAP frame as a server would send it */
export function mbapFrame(transactionId: number, unitId: number, pdu: number[]): Uint8Array {
  const length = pdu.length + 1;
  return Uint8Array.from([
    transactionId >> 8,
    transactionId & 0xff,
    0x00,
    0x00,
    length >> 8,
    length & 0xff,
    unitId,
    ...pdu,
  ]);
}

/** Transaction ID carried by an encoded frame */
export function frameTransactionId(frame: Uint8Array): number {
  return (frame[0] << 8) | frame[1];
}

export class FakeStreamTransport implements StreamTransport {
  public isOpen = false;
  public handler: StreamTransportHandler | null = null;
  public readonly written: Uint8Array[] = [];

  public write = vi.fn(async (buffer: Uint8Array): Promise<void> => {
    this.written.push(buffer);
  });

  setHandler(handler: StreamTransportHandler): void {
    this.handler = handler;
  }

  async connect(): Promise<void> {
    this.isOpen = true;
    this.handler?.onConnected();
  }

  async disconnect(): Promise<void> {
    this.drop('Connection closed by client');
  }

  /** Simulates the connection going away */
  drop(reason: string): void {
    if (!this.isOpen) return;
    this.isOpen = false;
    this.handler?.onDisconnected(reason);
  }

  receive(data: Uint8Array): void {
    this.handler?.onDataReceived(data);
  }
}

export class FakeDatagramTransport implements DatagramTransport {
  public isOpen = false;
  public handler: DatagramTransportHandler | null = null;
  public readonly written: Uint8Array[] = [];

  public write = vi.fn(async (buffer: Uint8Array): Promise<void> => {
    this.written.push(buffer);
  });

  setHandler(handler: DatagramTransportHandler): void {
    this.handler = handler;
  }

  async open(): Promise<void> {
    this.isOpen = true;
  }

  async close(): Promise<void> {
    this.isOpen = false;
  }

  deliver(data: Uint8Array, peer: PeerAddress): void {
    this.handler?.onDatagramReceived(data, peer);
  }
}
