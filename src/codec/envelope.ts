import {
  ENVELOPE_HEADER_SIZE,
  MAX_ENVELOPE_LENGTH,
  PUBLIC_VALUE_SIZE,
  type Envelope,
} from './types.js';
import { bytesToU64, u64ToBytes } from '../crypto/utils.js';
import { ChannelError } from '../errors.js';

/**
 * Encode the 4-byte length prefix
 */
export function encodeEnvelopeHeader(length: number): Uint8Array {
  if (!Number.isInteger(length) || length < 0) {
    throw ChannelError.invalidEnvelope(`length must be a non-negative integer, got ${length}`);
  }
  if (length > MAX_ENVELOPE_LENGTH) {
    throw ChannelError.messageTooLarge(length, MAX_ENVELOPE_LENGTH);
  }

  const header = new Uint8Array(ENVELOPE_HEADER_SIZE);
  new DataView(header.buffer).setUint32(0, length, false);
  return header;
}

/**
 * Decode the 4-byte length prefix
 */
export function decodeEnvelopeHeader(data: Uint8Array): number {
  if (data.length !== ENVELOPE_HEADER_SIZE) {
    throw ChannelError.invalidEnvelope(`header must be ${ENVELOPE_HEADER_SIZE} bytes, got ${data.length}`);
  }
  return new DataView(data.buffer, data.byteOffset, ENVELOPE_HEADER_SIZE).getUint32(0, false);
}

/**
 * Encode ciphertext as a length-prefixed envelope
 *
 * Binary layout (4 + length bytes):
 * [0-3]   length      (u32, big-endian)
 * [4+]    ciphertext  (length bytes)
 */
export function encodeEnvelope(ciphertext: Uint8Array): Uint8Array {
  const header = encodeEnvelopeHeader(ciphertext.length);
  const buffer = new Uint8Array(ENVELOPE_HEADER_SIZE + ciphertext.length);
  buffer.set(header, 0);
  buffer.set(ciphertext, ENVELOPE_HEADER_SIZE);
  return buffer;
}

/**
 * Decode a complete envelope from a buffer.
 * Trailing bytes beyond the declared length are rejected.
 */
export function decodeEnvelope(data: Uint8Array): Envelope {
  if (data.length < ENVELOPE_HEADER_SIZE) {
    throw ChannelError.invalidEnvelope(`data too short: ${data.length} < ${ENVELOPE_HEADER_SIZE}`);
  }

  const length = decodeEnvelopeHeader(data.subarray(0, ENVELOPE_HEADER_SIZE));
  const available = data.length - ENVELOPE_HEADER_SIZE;
  if (available !== length) {
    throw ChannelError.invalidEnvelope(`declared ${length} bytes, found ${available}`);
  }

  return {
    length,
    ciphertext: data.slice(ENVELOPE_HEADER_SIZE),
  };
}

/**
 * Encode a handshake public value (8 bytes, big-endian)
 */
export function encodePublicValue(value: bigint): Uint8Array {
  return u64ToBytes(value);
}

/**
 * Decode a handshake public value
 */
export function decodePublicValue(data: Uint8Array): bigint {
  if (data.length !== PUBLIC_VALUE_SIZE) {
    throw ChannelError.invalidEnvelope(`public value must be ${PUBLIC_VALUE_SIZE} bytes, got ${data.length}`);
  }
  return bytesToU64(data);
}
