import { randomBytes } from '@noble/ciphers/webcrypto';

/**
 * Mask for the low 64 bits of a bigint
 */
export const U64_MASK = (1n << 64n) - 1n;

/**
 * Generate cryptographically secure random bytes
 */
export function secureRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert hex string to Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string length');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const byte = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
    if (Number.isNaN(byte)) {
      throw new Error(`Invalid hex character at offset ${i * 2}`);
    }
    bytes[i] = byte;
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Render bytes as space separated hex pairs ("68 69"), the transcript format
 */
export function formatHexBytes(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(' ');
}

/**
 * Encode an unsigned 64-bit value as 8 big-endian bytes
 */
export function u64ToBytes(value: bigint): Uint8Array {
  if (value < 0n || value > U64_MASK) {
    throw new RangeError(`Value out of u64 range: ${value}`);
  }
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, value, false);
  return bytes;
}

/**
 * Decode 8 big-endian bytes to an unsigned 64-bit value
 */
export function bytesToU64(bytes: Uint8Array): bigint {
  if (bytes.length !== 8) {
    throw new Error(`Invalid u64 length: ${bytes.length} != 8`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, 8).getBigUint64(0, false);
}

/**
 * Format a u64 the way the transcript shows secrets and public values
 */
export function formatU64(value: bigint): string {
  return value.toString(16).toUpperCase();
}
