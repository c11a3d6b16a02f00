import {
  DOMAIN_PARAMETERS,
  generateKeyPair,
  computeSharedSecret,
  isPublicValueInRange,
  secretFingerprint,
  formatU64,
  type DomainParameters,
  type KeyPair,
} from '../crypto/index.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Connection } from '../transport/connection.js';
import type { PeerRole } from './roles.js';

/**
 * Options for a key exchange
 */
export interface KeyExchangeOptions {
  /** Fixed key pair (tests). Defaults to a fresh random pair. */
  keyPair?: KeyPair;
  /** Domain parameters. Defaults to the compiled-in constants. */
  params?: DomainParameters;
  /** Transcript sink. Defaults to silent. */
  logger?: Logger;
}

/**
 * Outcome of a completed key exchange. The private scalar is not included.
 */
export interface HandshakeResult {
  sharedSecret: bigint;
  ourPublic: bigint;
  peerPublic: bigint;
  fingerprint: string;
}

/**
 * Run one round of Diffie-Hellman over the connection.
 *
 * Public values travel as 8-byte big-endian integers in the order fixed by
 * `role`. Any transport failure aborts with a HANDSHAKE_FAILED ChannelError;
 * there is no retry.
 */
export async function performKeyExchange(
  connection: Connection,
  role: PeerRole,
  options: KeyExchangeOptions = {}
): Promise<HandshakeResult> {
  const params = options.params ?? DOMAIN_PARAMETERS;
  const logger = options.logger ?? silentLogger;

  logger.info('[DH] Starting key exchange...');
  logger.info(`p = ${formatU64(params.prime)} (64-bit prime - public)`);
  logger.info(`g = ${params.generator} (generator - public)`);

  const keyPair = options.keyPair ?? generateKeyPair(params);
  logger.debug(`private_key = ${formatU64(keyPair.privateKey)}`);
  logger.info(`public_key = g^private mod p = ${formatU64(keyPair.publicKey)}`);

  logger.info(`[DH] Exchanging keys as ${role.name}...`);
  const peerPublic = await role.exchangePublicValues(connection, keyPair.publicKey, logger);

  if (!isPublicValueInRange(peerPublic, params)) {
    logger.warn(`[DH] Peer public value ${formatU64(peerPublic)} is outside [1, p-1]; using it anyway`);
  }

  const sharedSecret = computeSharedSecret(keyPair.privateKey, peerPublic, params);
  const fingerprint = secretFingerprint(sharedSecret);
  logger.info('[DH] Computing shared secret: secret = (their_public)^(our_private) mod p');
  logger.debug(`secret = ${formatU64(sharedSecret)}`);
  logger.info(`[VERIFY] Secret fingerprint: ${fingerprint} (compare with your peer)`);

  return {
    sharedSecret,
    ourPublic: keyPair.publicKey,
    peerPublic,
    fingerprint,
  };
}
