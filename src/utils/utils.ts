// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Reads a big-endian 16-bit unsigned integer.
 * @param offset - Index of the high byte
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return (buf[offset] << 8) | buf[offset + 1];
}

/**
 * Returns a view on part of the input array (no copy).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Converts a Uint8Array to a lowercase hex string (lookup table, no separators).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i];
    hex += HEX_TABLE[(b >> 4) & 0xf] + HEX_TABLE[b & 0xf];
  }
  return hex;
}

/**
 * Formats a peer as host:port, bracketing IPv6 addresses.
 */
export function formatPeer(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

export function isUint16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff;
}
