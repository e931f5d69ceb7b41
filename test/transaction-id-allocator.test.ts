import { describe, expect, it } from 'vitest';
import { TransactionIdAllocator } from '../src/transaction/transaction-id-allocator.js';
import { ModbusConfigError } from '../src/errors.js';

describe('TransactionIdAllocator', () => {
  it('starts at 1 and increments by one', () => {
    const allocator = new TransactionIdAllocator();
    expect(allocator.current).toBe(0);
    expect([allocator.next(), allocator.next(), allocator.next()]).toEqual([1, 2, 3]);
    expect(allocator.current).toBe(3);
  });

  it('wraps from 65535 to 0', () => {
    const allocator = new TransactionIdAllocator();
    let last = 0;
    for (let i = 0; i < 65535; i++) last = allocator.next();
    expect(last).toBe(65535);
    expect(allocator.next()).toBe(0);
    expect(allocator.next()).toBe(1);
  });

  it('never repeats an ID within one full cycle', () => {
    const allocator = new TransactionIdAllocator();
    const seen = new Set<number>();
    for (let i = 0; i < 65536; i++) seen.add(allocator.next());
    expect(seen.size).toBe(65536);
  });

  it('honours a smaller limit', () => {
    const allocator = new TransactionIdAllocator(3);
    expect(allocator.maxId).toBe(3);
    const ids = Array.from({ length: 6 }, () => allocator.next());
    expect(ids).toEqual([1, 2, 3, 0, 1, 2]);
  });

  it('rejects a limit that is not a positive integer', () => {
    expect(() => new TransactionIdAllocator(0)).toThrow(ModbusConfigError);
    expect(() => new TransactionIdAllocator(2.5)).toThrow(
      'Transaction ID limit must be a positive integer, got 2.5'
    );
  });
});
