import {
  KeystreamGenerator,
  previewKeystream,
  encrypt,
  decrypt,
  keystreamOf,
  secureRandomBytes,
  bytesToHex,
  formatHexBytes,
  formatU64,
  LCG_MULTIPLIER,
  LCG_INCREMENT,
} from '../crypto/index.js';
import {
  ENVELOPE_HEADER_SIZE,
  encodeEnvelope,
  decodeEnvelopeHeader,
} from '../codec/index.js';
import { ChannelError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { LineSource } from '../io/console.js';
import type { HistoryStore, MessageDirection } from '../storage/adapter.js';
import type { Connection } from '../transport/connection.js';
import {
  SessionState,
  type ChatSessionConfig,
  type CloseReason,
  type MessageHandler,
  type ReceivedMessage,
  type SessionSummary,
} from '../types.js';
import { performKeyExchange } from './handshake.js';
import type { PeerRole, TurnKind } from './roles.js';

const DEFAULT_PREVIEW_BYTES = 12;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Per-direction keystreams, created once at Established and never replaced
 */
interface Keystreams {
  outbound: KeystreamGenerator;
  inbound: KeystreamGenerator;
}

/**
 * One encrypted chat over one connection.
 *
 * Handshakes, then alternates send and receive turns (which comes first is
 * up to the role) until the peer closes or local input runs out. Each
 * direction has its own keystream generator seeded from the shared secret.
 */
export class ChatSession {
  private readonly role: PeerRole;
  private readonly input: LineSource;
  private readonly onMessage: MessageHandler;
  private readonly logger: Logger;
  private readonly history?: HistoryStore;
  private readonly config: ChatSessionConfig;
  private readonly sessionId = bytesToHex(secureRandomBytes(8));

  private current = SessionState.HANDSHAKING;
  private started = false;
  private sent = 0;
  private received = 0;
  private bytesSent = 0;
  private bytesReceived = 0;

  constructor(private readonly connection: Connection, config: ChatSessionConfig) {
    this.config = config;
    this.role = config.role;
    this.input = config.input;
    this.onMessage = config.onMessage;
    this.logger = config.logger ?? silentLogger;
    this.history = config.history;
  }

  /** Current lifecycle state */
  get state(): SessionState {
    return this.current;
  }

  /** Random identifier used to group history entries */
  get id(): string {
    return this.sessionId;
  }

  /**
   * Run the session to completion.
   * Handshake failures, and write failures while the peer is still connected,
   * close the session and are rethrown.
   */
  async run(): Promise<SessionSummary> {
    if (this.started) {
      throw new Error('Session has already been started');
    }
    this.started = true;

    try {
      const handshake = await performKeyExchange(this.connection, this.role, {
        keyPair: this.config.keyPair,
        logger: this.logger,
      });

      const streams: Keystreams = {
        outbound: new KeystreamGenerator(handshake.sharedSecret),
        inbound: new KeystreamGenerator(handshake.sharedSecret),
      };
      this.transition(SessionState.ESTABLISHED);
      this.logEstablished(handshake.sharedSecret);

      const closeReason = await this.turnLoop(streams);

      return {
        sessionId: this.sessionId,
        role: this.role.name,
        sharedSecret: handshake.sharedSecret,
        fingerprint: handshake.fingerprint,
        sent: this.sent,
        received: this.received,
        bytesSent: this.bytesSent,
        bytesReceived: this.bytesReceived,
        closeReason,
      };
    } finally {
      this.close();
    }
  }

  private async turnLoop(streams: Keystreams): Promise<CloseReason> {
    let turn: TurnKind = this.role.firstTurn;

    for (;;) {
      const outcome = turn === 'send'
        ? await this.sendTurn(streams.outbound)
        : await this.receiveTurn(streams.inbound);

      if (outcome !== null) {
        this.logger.info(`[SESSION] Closed (${outcome})`);
        return outcome;
      }
      turn = turn === 'send' ? 'receive' : 'send';
    }
  }

  private async sendTurn(outbound: KeystreamGenerator): Promise<CloseReason | null> {
    this.transition(SessionState.SENDING);

    this.logger.info('[CHAT] Type message:');
    const line = await this.input.readLine();
    if (line === null) {
      return 'input-ended';
    }

    const text = line.trim();
    const plaintext = encoder.encode(text);
    const offset = outbound.position;
    const ciphertext = encrypt(plaintext, outbound);

    this.logger.info('[ENCRYPT]');
    this.logger.info(`Plain: ${formatHexBytes(plaintext)} (${JSON.stringify(text)})`);
    this.logger.info(`Key: ${formatHexBytes(keystreamOf(plaintext, ciphertext))}`);
    this.logger.info(`Cipher: ${formatHexBytes(ciphertext)}`);

    try {
      await this.connection.write(encodeEnvelope(ciphertext));
    } catch (error) {
      // A peer that hung up while we waited for input ends the session normally
      if (this.connection.endReason === null && !this.connection.closed) {
        throw error;
      }
      this.logClosedRead();
      this.logger.debug(`[NETWORK] Unsent: ${ChannelError.toError(error).message}`);
      return 'peer-closed';
    }

    this.sent++;
    this.bytesSent += ciphertext.length;
    this.logger.info(`[NETWORK] Sent ${ciphertext.length} bytes`);
    this.logger.debug(`[STREAM] outbound position ${outbound.position}`);

    await this.record('sent', text, ciphertext, offset);
    return null;
  }

  private async receiveTurn(inbound: KeystreamGenerator): Promise<CloseReason | null> {
    this.transition(SessionState.RECEIVING);

    const header = await this.connection.readExact(ENVELOPE_HEADER_SIZE);
    if (!header) {
      this.logClosedRead();
      return 'peer-closed';
    }

    const length = decodeEnvelopeHeader(header);
    const ciphertext = await this.connection.readExact(length);
    if (!ciphertext) {
      this.logger.warn(`[NETWORK] Connection ended inside a ${length}-byte envelope`);
      return 'truncated-frame';
    }

    const offset = inbound.position;
    const plaintext = decrypt(ciphertext, inbound);
    const text = decoder.decode(plaintext);

    this.received++;
    this.bytesReceived += ciphertext.length;
    this.logger.info(`[NETWORK] Received encrypted message (${length} bytes)`);
    this.logger.info('[DECRYPT]');
    this.logger.info(`Cipher: ${formatHexBytes(ciphertext)}`);
    this.logger.info(`Key: ${formatHexBytes(keystreamOf(plaintext, ciphertext))}`);
    this.logger.info(`Plain: ${formatHexBytes(plaintext)} -> ${JSON.stringify(text)}`);
    this.logger.debug(`[STREAM] inbound position ${inbound.position}`);

    const message: ReceivedMessage = {
      text,
      plaintext,
      ciphertext,
      streamOffset: offset,
      receivedAt: Date.now(),
    };

    try {
      this.onMessage(message);
    } catch (error) {
      this.logger.error('Error in message handler:', error);
    }

    await this.record('received', text, ciphertext, offset);
    return null;
  }

  private async record(
    direction: MessageDirection,
    plaintext: string,
    ciphertext: Uint8Array,
    streamOffset: number
  ): Promise<void> {
    if (!this.history) {
      return;
    }
    try {
      await this.history.record({
        sessionId: this.sessionId,
        direction,
        plaintext,
        ciphertext,
        streamOffset,
      });
    } catch (error) {
      this.logger.error('Failed to record message history:', error);
    }
  }

  private logEstablished(secret: bigint): void {
    const previewBytes = this.config.previewBytes ?? DEFAULT_PREVIEW_BYTES;

    this.logger.info('[STREAM] Generating keystream from secret...');
    this.logger.info(`Algorithm: LCG (a=${LCG_MULTIPLIER}, c=${LCG_INCREMENT}, m=2^32)`);
    this.logger.debug(`Seed: secret = ${formatU64(secret)}`);
    if (previewBytes > 0) {
      this.logger.info(`Keystream: ${formatHexBytes(previewKeystream(secret, previewBytes)).toUpperCase()} ...`);
    }
    this.logger.info('Secure channel established!');
  }

  private logClosedRead(): void {
    const error = this.connection.error;
    if (error) {
      this.logger.warn(`[NETWORK] Connection lost: ${error.message}`);
    } else {
      this.logger.info('[NETWORK] Peer closed the connection');
    }
  }

  private transition(next: SessionState): void {
    if (this.current === SessionState.CLOSED) {
      throw ChannelError.sessionClosed();
    }
    if (this.current === next) {
      return;
    }
    this.current = next;
    this.config.onStateChange?.(next);
  }

  private close(): void {
    if (this.current !== SessionState.CLOSED) {
      this.current = SessionState.CLOSED;
      this.config.onStateChange?.(SessionState.CLOSED);
    }
    this.connection.close();
  }
}
