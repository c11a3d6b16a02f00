import type { KeyPair } from './crypto/keys.js';
import type { LineSource } from './io/console.js';
import type { Logger } from './logger.js';
import type { PeerRole } from './protocol/roles.js';
import type { HistoryStore } from './storage/adapter.js';

/**
 * Session lifecycle states
 */
export enum SessionState {
  HANDSHAKING = 'handshaking',
  ESTABLISHED = 'established',
  SENDING = 'sending',
  RECEIVING = 'receiving',
  CLOSED = 'closed',
}

/**
 * Why a session reached the closed state
 */
export type CloseReason =
  | 'peer-closed'      // connection ended at an envelope boundary
  | 'truncated-frame'  // connection ended inside an envelope body
  | 'input-ended';     // local input source is exhausted

/**
 * Decoded message delivered to the local output sink
 */
export interface ReceivedMessage {
  /** Decoded text (invalid UTF-8 replaced) */
  text: string;
  /** Raw decoded bytes */
  plaintext: Uint8Array;
  /** Bytes as they arrived on the wire, without the length prefix */
  ciphertext: Uint8Array;
  /** Inbound keystream position before this message was decoded */
  streamOffset: number;
  /** Arrival time (ms) */
  receivedAt: number;
}

/**
 * Callback for incoming messages
 */
export type MessageHandler = (message: ReceivedMessage) => void;

/**
 * Configuration for ChatSession
 */
export interface ChatSessionConfig {
  /** Role strategy; fixes handshake order and who speaks first */
  role: PeerRole;
  /** Where outgoing lines come from */
  input: LineSource;
  /** Where decoded lines go */
  onMessage: MessageHandler;
  /** Transcript sink (defaults to silent) */
  logger?: Logger;
  /** Optional message history */
  history?: HistoryStore;
  /** Fixed ephemeral key pair (defaults to a fresh random pair) */
  keyPair?: KeyPair;
  /** Keystream bytes shown in the establishment transcript (default 12) */
  previewBytes?: number;
  /** Notified on every state transition */
  onStateChange?: (state: SessionState) => void;
}

/**
 * Totals reported when a session ends
 */
export interface SessionSummary {
  sessionId: string;
  role: PeerRole['name'];
  sharedSecret: bigint;
  fingerprint: string;
  sent: number;
  received: number;
  bytesSent: number;
  bytesReceived: number;
  closeReason: CloseReason;
}
