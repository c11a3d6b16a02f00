/**
 * Size of the big-endian length prefix on every envelope
 */
export const ENVELOPE_HEADER_SIZE = 4;

/**
 * Largest ciphertext an envelope can carry (u32 length field)
 */
export const MAX_ENVELOPE_LENGTH = 0xffffffff;

/**
 * Size of a handshake public value on the wire
 */
export const PUBLIC_VALUE_SIZE = 8;

/**
 * One framed chat message
 */
export interface Envelope {
  length: number;          // Ciphertext length in bytes (u32, big-endian on the wire)
  ciphertext: Uint8Array;  // XOR-stream encoded payload
}
