import { describe, it, expect } from 'vitest';
import {
  ENVELOPE_HEADER_SIZE,
  MAX_ENVELOPE_LENGTH,
  PUBLIC_VALUE_SIZE,
  encodeEnvelope,
  decodeEnvelope,
  encodeEnvelopeHeader,
  decodeEnvelopeHeader,
  encodePublicValue,
  decodePublicValue,
} from '../src/codec/index.js';
import { bytesToHex, hexToBytes } from '../src/crypto/index.js';
import { ChannelErrorCode, isChannelError } from '../src/errors.js';

function codeOf(fn: () => unknown): ChannelErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return isChannelError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('Envelope Codec', () => {
  describe('encodeEnvelope', () => {
    it('should prefix the ciphertext with a big-endian u32 length', () => {
      const encoded = encodeEnvelope(hexToBytes('8068'));
      expect(bytesToHex(encoded)).toBe('000000028068');
      expect(encoded.length).toBe(ENVELOPE_HEADER_SIZE + 2);
    });

    it('should encode an empty payload as a bare zero header', () => {
      expect(bytesToHex(encodeEnvelope(new Uint8Array(0)))).toBe('00000000');
    });

    it('should encode lengths above 255 across several bytes', () => {
      const encoded = encodeEnvelope(new Uint8Array(0x1234));
      expect(bytesToHex(encoded.subarray(0, 4))).toBe('00001234');
    });
  });

  describe('envelope header', () => {
    it('should encode the maximum u32 length', () => {
      expect(bytesToHex(encodeEnvelopeHeader(MAX_ENVELOPE_LENGTH))).toBe('ffffffff');
    });

    it('should reject lengths beyond u32', () => {
      expect(codeOf(() => encodeEnvelopeHeader(MAX_ENVELOPE_LENGTH + 1)))
        .toBe(ChannelErrorCode.MESSAGE_TOO_LARGE);
    });

    it('should reject negative and fractional lengths', () => {
      expect(codeOf(() => encodeEnvelopeHeader(-1))).toBe(ChannelErrorCode.INVALID_ENVELOPE);
      expect(codeOf(() => encodeEnvelopeHeader(1.5))).toBe(ChannelErrorCode.INVALID_ENVELOPE);
    });

    it('should decode without sign errors at the top bit', () => {
      expect(decodeEnvelopeHeader(hexToBytes('80000001'))).toBe(0x80000001);
    });

    it('should decode from a subarray', () => {
      const backing = hexToBytes('aa00000005');
      expect(decodeEnvelopeHeader(backing.subarray(1))).toBe(5);
    });

    it('should reject a header of the wrong size', () => {
      expect(() => decodeEnvelopeHeader(new Uint8Array(3))).toThrow('header must be 4 bytes');
    });
  });

  describe('decodeEnvelope', () => {
    it('should decode a complete envelope', () => {
      const envelope = decodeEnvelope(hexToBytes('000000028068'));
      expect(envelope.length).toBe(2);
      expect(bytesToHex(envelope.ciphertext)).toBe('8068');
    });

    it('should decode a zero-length envelope to an empty payload', () => {
      const envelope = decodeEnvelope(hexToBytes('00000000'));
      expect(envelope.length).toBe(0);
      expect(envelope.ciphertext.length).toBe(0);
    });

    it('should throw on data shorter than the header', () => {
      expect(() => decodeEnvelope(new Uint8Array(3))).toThrow('data too short');
    });

    it('should throw when the declared length is not satisfied', () => {
      expect(() => decodeEnvelope(hexToBytes('0000000580'))).toThrow('declared 5 bytes, found 1');
    });

    it('should throw on trailing bytes', () => {
      expect(codeOf(() => decodeEnvelope(hexToBytes('000000018068'))))
        .toBe(ChannelErrorCode.INVALID_ENVELOPE);
    });
  });

  describe('public values', () => {
    it('should encode as 8 big-endian bytes', () => {
      const encoded = encodePublicValue(0x32569a33a4a39fb7n);
      expect(encoded.length).toBe(PUBLIC_VALUE_SIZE);
      expect(bytesToHex(encoded)).toBe('32569a33a4a39fb7');
    });

    it('should zero-pad small values', () => {
      expect(bytesToHex(encodePublicValue(32n))).toBe('0000000000000020');
    });

    it('should decode', () => {
      expect(decodePublicValue(hexToBytes('1205521aee074b4d'))).toBe(0x1205521aee074b4dn);
    });

    it('should reject a wrong-sized value', () => {
      expect(() => decodePublicValue(new Uint8Array(4))).toThrow('public value must be 8 bytes');
    });
  });
});
