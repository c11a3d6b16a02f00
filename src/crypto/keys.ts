import { sha256 } from '@noble/hashes/sha256';
import { modPow } from './modpow.js';
import { secureRandomBytes, bytesToHex, bytesToU64, u64ToBytes } from './utils.js';

/**
 * Public Diffie-Hellman parameters shared by both peers
 */
export interface DomainParameters {
  prime: bigint;
  generator: bigint;
}

/**
 * Fixed domain parameters. Compiled in, never negotiated.
 */
export const DOMAIN_PARAMETERS: Readonly<DomainParameters> = Object.freeze({
  prime: 0xd87fa3e291b4c7f3n,
  generator: 2n,
});

/**
 * Ephemeral key pair for one handshake
 */
export interface KeyPair {
  privateKey: bigint;  // secret scalar in [2, prime - 2]
  publicKey: bigint;   // generator^privateKey mod prime
}

/**
 * Source of random bytes, injectable for tests
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * Draw a private scalar uniformly from [2, prime - 2].
 * Uses rejection sampling over 64-bit draws to avoid modulo bias.
 */
export function generatePrivateKey(
  params: DomainParameters = DOMAIN_PARAMETERS,
  random: RandomSource = secureRandomBytes
): bigint {
  const span = params.prime - 3n;
  if (span <= 0n) {
    throw new RangeError(`Prime too small for key generation: ${params.prime}`);
  }

  const limit = ((1n << 64n) / span) * span;
  for (;;) {
    const draw = bytesToU64(random(8));
    if (draw < limit) {
      return 2n + (draw % span);
    }
  }
}

/**
 * Build a key pair from a known private scalar
 */
export function keyPairFromPrivate(
  privateKey: bigint,
  params: DomainParameters = DOMAIN_PARAMETERS
): KeyPair {
  return {
    privateKey,
    publicKey: modPow(params.generator, privateKey, params.prime),
  };
}

/**
 * Generate a fresh ephemeral key pair
 */
export function generateKeyPair(
  params: DomainParameters = DOMAIN_PARAMETERS,
  random: RandomSource = secureRandomBytes
): KeyPair {
  return keyPairFromPrivate(generatePrivateKey(params, random), params);
}

/**
 * Compute the shared secret from our private scalar and the peer's public value.
 * The peer value is used as received, even when it lies outside [1, prime - 1].
 */
export function computeSharedSecret(
  ourPrivateKey: bigint,
  theirPublicKey: bigint,
  params: DomainParameters = DOMAIN_PARAMETERS
): bigint {
  return modPow(theirPublicKey, ourPrivateKey, params.prime);
}

/**
 * Whether a received public value lies in [1, prime - 1]
 */
export function isPublicValueInRange(
  value: bigint,
  params: DomainParameters = DOMAIN_PARAMETERS
): boolean {
  return value >= 1n && value <= params.prime - 1n;
}

/**
 * Short digest of the shared secret that operators can compare out of band.
 * Format: first four bytes of SHA-256(secret as 8 bytes BE), as "xxxx-xxxx".
 */
export function secretFingerprint(secret: bigint): string {
  const hex = bytesToHex(sha256(u64ToBytes(secret)).slice(0, 4));
  return `${hex.slice(0, 4)}-${hex.slice(4)}`;
}
