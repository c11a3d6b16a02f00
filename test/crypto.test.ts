import { describe, it, expect } from 'vitest';
import {
  DOMAIN_PARAMETERS,
  modPow,
  generatePrivateKey,
  generateKeyPair,
  keyPairFromPrivate,
  computeSharedSecret,
  isPublicValueInRange,
  secretFingerprint,
  KeystreamGenerator,
  previewKeystream,
  transform,
  encryptText,
  decryptText,
  keystreamOf,
  hexToBytes,
  bytesToHex,
  formatHexBytes,
  u64ToBytes,
  bytesToU64,
  formatU64,
  secureRandomBytes,
  U64_MASK,
} from '../src/crypto/index.js';

/** Random source that replays fixed 8-byte draws */
function scriptedRandom(...draws: string[]): (length: number) => Uint8Array {
  let next = 0;
  return (length: number) => {
    const bytes = hexToBytes(draws[next++]);
    expect(bytes.length).toBe(length);
    return bytes;
  };
}

/** Reference modular exponentiation by repeated multiplication */
function slowModPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n % modulus;
  for (let i = 0n; i < exponent; i++) {
    result = (result * base) % modulus;
  }
  return result;
}

describe('Crypto Utils', () => {
  describe('hexToBytes / bytesToHex', () => {
    it('should convert hex to bytes and back', () => {
      const hex = 'deadbeef0102030405060708090a0b0c0d0e0f';
      expect(bytesToHex(hexToBytes(hex))).toBe(hex);
    });

    it('should handle 0x prefix', () => {
      expect(bytesToHex(hexToBytes('0xdeadbeef'))).toBe('deadbeef');
    });

    it('should throw on invalid hex length', () => {
      expect(() => hexToBytes('abc')).toThrow('Invalid hex string length');
    });

    it('should throw on non-hex characters', () => {
      expect(() => hexToBytes('zz')).toThrow('Invalid hex character');
    });
  });

  describe('u64 encoding', () => {
    it('should encode big-endian', () => {
      expect(bytesToHex(u64ToBytes(0x0102030405060708n))).toBe('0102030405060708');
      expect(bytesToHex(u64ToBytes(0n))).toBe('0000000000000000');
      expect(bytesToHex(u64ToBytes(U64_MASK))).toBe('ffffffffffffffff');
    });

    it('should decode big-endian', () => {
      expect(bytesToU64(hexToBytes('d87fa3e291b4c7f3'))).toBe(DOMAIN_PARAMETERS.prime);
    });

    it('should decode from an offset view', () => {
      const backing = hexToBytes('ff0000000000000002');
      expect(bytesToU64(backing.subarray(1))).toBe(2n);
    });

    it('should reject values outside u64', () => {
      expect(() => u64ToBytes(-1n)).toThrow(RangeError);
      expect(() => u64ToBytes(U64_MASK + 1n)).toThrow(RangeError);
    });

    it('should reject wrong lengths', () => {
      expect(() => bytesToU64(new Uint8Array(7))).toThrow('Invalid u64 length');
    });
  });

  describe('formatting', () => {
    it('should format hex bytes with spaces', () => {
      expect(formatHexBytes(new Uint8Array([0x68, 0x69, 0x0a]))).toBe('68 69 0a');
      expect(formatHexBytes(new Uint8Array(0))).toBe('');
    });

    it('should format u64 as uppercase hex', () => {
      expect(formatU64(DOMAIN_PARAMETERS.prime)).toBe('D87FA3E291B4C7F3');
    });
  });

  describe('secureRandomBytes', () => {
    it('should generate bytes of the requested length', () => {
      expect(secureRandomBytes(8).length).toBe(8);
    });
  });
});

describe('modPow', () => {
  it('should compute small known values', () => {
    expect(modPow(4n, 13n, 497n)).toBe(445n);
    expect(modPow(2n, 10n, 1000n)).toBe(24n);
    expect(modPow(123456789012345n, 65537n, 1000000007n)).toBe(171203979n);
  });

  it('should return 1 mod m for a zero exponent', () => {
    expect(modPow(3n, 0n, 7n)).toBe(1n);
    expect(modPow(0n, 0n, 5n)).toBe(1n);
  });

  it('should return 0 when the modulus is 1', () => {
    expect(modPow(5n, 0n, 1n)).toBe(0n);
    expect(modPow(12345n, 678n, 1n)).toBe(0n);
  });

  it('should not overflow with full-width 64-bit operands', () => {
    expect(modPow(U64_MASK, U64_MASK, DOMAIN_PARAMETERS.prime)).toBe(2823308764207266673n);
    expect(modPow(U64_MASK, 3n, DOMAIN_PARAMETERS.prime)).toBe(12591870956211413281n);
  });

  it('should reduce a base larger than the modulus', () => {
    expect(modPow(DOMAIN_PARAMETERS.prime + 2n, 5n, DOMAIN_PARAMETERS.prime)).toBe(32n);
  });

  it('should match repeated multiplication', () => {
    const cases: [bigint, bigint, bigint][] = [
      [7n, 23n, 101n],
      [2n, 64n, 0xfffffffbn],
      [0xdeadbeefn, 31n, 0xffffffffffffffc5n],
      [10n, 1n, 3n],
      [0n, 9n, 11n],
    ];
    for (const [base, exponent, modulus] of cases) {
      expect(modPow(base, exponent, modulus)).toBe(slowModPow(base, exponent, modulus));
    }
  });

  it('should reject a non-positive modulus', () => {
    expect(() => modPow(2n, 3n, 0n)).toThrow(RangeError);
  });
});

describe('Key Agreement', () => {
  const { prime, generator } = DOMAIN_PARAMETERS;

  it('should use the fixed domain parameters', () => {
    expect(prime).toBe(0xd87fa3e291b4c7f3n);
    expect(generator).toBe(2n);
    expect(Object.isFrozen(DOMAIN_PARAMETERS)).toBe(true);
  });

  describe('generatePrivateKey', () => {
    it('should map the lowest draw to 2', () => {
      expect(generatePrivateKey(DOMAIN_PARAMETERS, scriptedRandom('0000000000000000'))).toBe(2n);
    });

    it('should map the highest accepted draw to prime - 2', () => {
      // span = prime - 3, highest accepted draw = span - 1
      const key = generatePrivateKey(DOMAIN_PARAMETERS, scriptedRandom('d87fa3e291b4c7ef'));
      expect(key).toBe(prime - 2n);
    });

    it('should reject draws outside the unbiased range and retry', () => {
      const key = generatePrivateKey(
        DOMAIN_PARAMETERS,
        scriptedRandom('ffffffffffffffff', 'd87fa3e291b4c7f0', '0000000000000005')
      );
      expect(key).toBe(7n);
    });

    it('should stay within [2, prime - 2] for random draws', () => {
      for (let i = 0; i < 50; i++) {
        const key = generatePrivateKey();
        expect(key >= 2n && key <= prime - 2n).toBe(true);
      }
    });

    it('should not be constant across calls', () => {
      expect(generatePrivateKey()).not.toBe(generatePrivateKey());
    });
  });

  describe('keyPairFromPrivate / generateKeyPair', () => {
    it('should compute public = g^private mod p', () => {
      expect(keyPairFromPrivate(5n).publicKey).toBe(32n);
      expect(keyPairFromPrivate(123456789n).publicKey).toBe(0x32569a33a4a39fb7n);
    });

    it('should generate consistent pairs', () => {
      const pair = generateKeyPair();
      expect(pair.publicKey).toBe(modPow(generator, pair.privateKey, prime));
    });
  });

  describe('computeSharedSecret', () => {
    it('should agree for a known pair of private keys', () => {
      const alice = keyPairFromPrivate(123456789n);
      const bob = keyPairFromPrivate(987654321n);
      expect(bob.publicKey).toBe(0x1205521aee074b4dn);

      const aliceSecret = computeSharedSecret(alice.privateKey, bob.publicKey);
      const bobSecret = computeSharedSecret(bob.privateKey, alice.publicKey);
      expect(aliceSecret).toBe(0xb9167f5a82ddb60bn);
      expect(bobSecret).toBe(aliceSecret);
    });

    it('should agree for random key pairs', () => {
      for (let i = 0; i < 20; i++) {
        const a = generateKeyPair();
        const b = generateKeyPair();
        expect(computeSharedSecret(a.privateKey, b.publicKey))
          .toBe(computeSharedSecret(b.privateKey, a.publicKey));
      }
    });

    it('should accept out-of-range peer values', () => {
      expect(computeSharedSecret(5n, 0n)).toBe(0n);
      expect(computeSharedSecret(5n, prime + 2n)).toBe(32n);
    });
  });

  describe('isPublicValueInRange', () => {
    it('should check [1, prime - 1]', () => {
      expect(isPublicValueInRange(0n)).toBe(false);
      expect(isPublicValueInRange(1n)).toBe(true);
      expect(isPublicValueInRange(prime - 1n)).toBe(true);
      expect(isPublicValueInRange(prime)).toBe(false);
    });
  });

  describe('secretFingerprint', () => {
    it('should render the first four bytes of SHA-256 of the secret', () => {
      expect(secretFingerprint(0n)).toBe('af55-70f5');
      expect(secretFingerprint(1n)).toBe('cd26-6215');
      expect(secretFingerprint(0xb9167f5a82ddb60bn)).toBe('6f59-53d1');
    });
  });
});

describe('KeystreamGenerator', () => {
  it('should follow the LCG from seed 0', () => {
    const generator = new KeystreamGenerator(0n);
    expect(bytesToHex(generator.take(6))).toBe('397edf2cf58a');
    expect(generator.position).toBe(6);
  });

  it('should emit the low byte of each new state', () => {
    const generator = new KeystreamGenerator(0n);
    expect(generator.next()).toBe(0x39);
    expect(generator.state).toBe(12345n);
  });

  it('should only depend on the low 32 bits of the seed', () => {
    const wide = new KeystreamGenerator((1n << 40n) + 7n).take(4);
    const narrow = new KeystreamGenerator(7n).take(4);
    expect(Array.from(wide)).toEqual([52, 93, 210, 163]);
    expect(Array.from(narrow)).toEqual([52, 93, 210, 163]);
  });

  it('should be independent of how calls are split', () => {
    const whole = new KeystreamGenerator(0xb9167f5a82ddb60bn).take(10);

    const split = new KeystreamGenerator(0xb9167f5a82ddb60bn);
    const parts = [split.take(3), split.take(0), split.take(4), split.take(3)];
    expect(bytesToHex(Uint8Array.from(parts.flatMap((p) => Array.from(p)))))
      .toBe(bytesToHex(whole));
  });

  it('should reject a negative seed', () => {
    expect(() => new KeystreamGenerator(-1n)).toThrow(RangeError);
  });

  it('should preview without sharing state', () => {
    const secret = 0xb9167f5a82ddb60bn;
    expect(bytesToHex(previewKeystream(secret, 4))).toBe('e801a6e7');
    expect(bytesToHex(previewKeystream(secret, 4))).toBe('e801a6e7');
  });
});

describe('Stream Encoder', () => {
  const secret = 0xb9167f5a82ddb60bn;

  it('should XOR with the keystream', () => {
    const ciphertext = encryptText('hi', new KeystreamGenerator(secret));
    expect(bytesToHex(ciphertext)).toBe('8068');
  });

  it('should consume exactly one generator step per byte', () => {
    const generator = new KeystreamGenerator(secret);
    transform(new Uint8Array(5), generator);
    expect(generator.position).toBe(5);
    transform(new Uint8Array(0), generator);
    expect(generator.position).toBe(5);
  });

  it('should round-trip with identically seeded generators', () => {
    const sender = new KeystreamGenerator(secret);
    const receiver = new KeystreamGenerator(secret);
    for (const text of ['hello', '', 'second line', 'héllo wörld']) {
      expect(decryptText(encryptText(text, sender), receiver)).toBe(text);
    }
    expect(sender.position).toBe(receiver.position);
  });

  it('should produce garbage when the receiver is offset', () => {
    const sender = new KeystreamGenerator(secret);
    const receiver = new KeystreamGenerator(secret);
    encryptText('skipped', sender);
    const second = encryptText('hello', sender);
    expect(decryptText(second, receiver)).not.toBe('hello');
  });

  it('should recover the applied keystream', () => {
    const plaintext = new Uint8Array([0x68, 0x69]);
    const ciphertext = transform(plaintext, new KeystreamGenerator(secret));
    expect(bytesToHex(keystreamOf(plaintext, ciphertext))).toBe('e801');
  });

  it('should reject mismatched lengths in keystreamOf', () => {
    expect(() => keystreamOf(new Uint8Array(1), new Uint8Array(2))).toThrow('Length mismatch');
  });
});
