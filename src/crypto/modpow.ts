/**
 * Compute `base^exponent mod modulus` by square-and-multiply.
 *
 * Operands are unsigned 64-bit values carried as bigint, so intermediate
 * products never overflow.
 */
export function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus <= 0n) {
    throw new RangeError(`Modulus must be positive, got ${modulus}`);
  }
  if (base < 0n || exponent < 0n) {
    throw new RangeError('Base and exponent must be non-negative');
  }
  if (modulus === 1n) {
    return 0n;
  }

  let result = 1n;
  let b = base % modulus;
  let e = exponent;

  while (e > 0n) {
    if (e & 1n) {
      result = (result * b) % modulus;
    }
    e >>= 1n;
    if (e > 0n) {
      b = (b * b) % modulus;
    }
  }

  return result;
}
