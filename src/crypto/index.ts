export {
  U64_MASK,
  secureRandomBytes,
  concatBytes,
  hexToBytes,
  bytesToHex,
  formatHexBytes,
  u64ToBytes,
  bytesToU64,
  formatU64,
} from './utils.js';

export { modPow } from './modpow.js';

export {
  type DomainParameters,
  type KeyPair,
  type RandomSource,
  DOMAIN_PARAMETERS,
  generatePrivateKey,
  generateKeyPair,
  keyPairFromPrivate,
  computeSharedSecret,
  isPublicValueInRange,
  secretFingerprint,
} from './keys.js';

export {
  LCG_MULTIPLIER,
  LCG_INCREMENT,
  KeystreamGenerator,
  previewKeystream,
} from './keystream.js';

export {
  transform,
  encrypt,
  decrypt,
  encryptText,
  decryptText,
  keystreamOf,
} from './encryption.js';
