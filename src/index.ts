// Session
export { ChatSession } from './protocol/session.js';
export { performKeyExchange } from './protocol/handshake.js';
export type { KeyExchangeOptions, HandshakeResult } from './protocol/handshake.js';
export {
  INITIATOR,
  RESPONDER,
  roleFor,
  type PeerRole,
  type PeerRoleName,
  type TurnKind,
} from './protocol/roles.js';

// Types
export { SessionState } from './types.js';
export type {
  ChatSessionConfig,
  CloseReason,
  ReceivedMessage,
  MessageHandler,
  SessionSummary,
} from './types.js';

// Crypto
export {
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
  LCG_MULTIPLIER,
  LCG_INCREMENT,
  transform,
  encrypt,
  decrypt,
  encryptText,
  decryptText,
  hexToBytes,
  bytesToHex,
  type DomainParameters,
  type KeyPair,
  type RandomSource,
} from './crypto/index.js';

// Codec
export {
  ENVELOPE_HEADER_SIZE,
  MAX_ENVELOPE_LENGTH,
  PUBLIC_VALUE_SIZE,
  encodeEnvelope,
  decodeEnvelope,
  encodeEnvelopeHeader,
  decodeEnvelopeHeader,
  encodePublicValue,
  decodePublicValue,
  type Envelope,
} from './codec/index.js';

// Transport and driver
export { Connection, type ConnectionEndReason } from './transport/connection.js';
export {
  parseArgs,
  parseAddress,
  parsePort,
  listenForPeer,
  connectToPeer,
  runPeer,
  USAGE,
  type ParsedCommand,
  type PeerOptions,
  type PeerDependencies,
  type ListenOptions,
  type AcceptedPeer,
} from './peer.js';

// Console and logging
export { ConsoleLineSource, ArrayLineSource, type LineSource } from './io/console.js';
export { createConsoleLogger, silentLogger, type Logger } from './logger.js';

// Errors
export { ChannelError, ChannelErrorCode, isChannelError } from './errors.js';

// Storage
export type {
  HistoryStore,
  HistoryEntry,
  GetEntriesOptions,
  MessageDirection,
} from './storage/index.js';
export { SQLiteHistoryStore } from './storage/index.js';
