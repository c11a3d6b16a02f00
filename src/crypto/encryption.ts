import type { KeystreamGenerator } from './keystream.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * XOR each input byte with the next keystream byte.
 * Consumes exactly `input.length` generator outputs.
 */
export function transform(input: Uint8Array, generator: KeystreamGenerator): Uint8Array {
  const output = new Uint8Array(input.length);
  for (let i = 0; i < input.length; i++) {
    output[i] = input[i] ^ generator.next();
  }
  return output;
}

/**
 * Encrypt bytes with the outbound keystream
 */
export const encrypt = transform;

/**
 * Decrypt bytes with the inbound keystream (same operation as encrypt)
 */
export const decrypt = transform;

/**
 * Encrypt a UTF-8 string
 */
export function encryptText(text: string, generator: KeystreamGenerator): Uint8Array {
  return transform(encoder.encode(text), generator);
}

/**
 * Decrypt to a string. Invalid UTF-8 is replaced with U+FFFD.
 */
export function decryptText(ciphertext: Uint8Array, generator: KeystreamGenerator): string {
  return decoder.decode(transform(ciphertext, generator));
}

/**
 * Recover the keystream bytes that were applied, given both sides of a transform
 */
export function keystreamOf(plaintext: Uint8Array, ciphertext: Uint8Array): Uint8Array {
  if (plaintext.length !== ciphertext.length) {
    throw new Error(`Length mismatch: ${plaintext.length} != ${ciphertext.length}`);
  }
  return plaintext.map((b, i) => b ^ ciphertext[i]);
}
