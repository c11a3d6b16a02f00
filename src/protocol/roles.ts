import { encodePublicValue, decodePublicValue, PUBLIC_VALUE_SIZE } from '../codec/index.js';
import { formatU64 } from '../crypto/index.js';
import { ChannelError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Connection } from '../transport/connection.js';

/**
 * Connection role names as given on the command line
 */
export type PeerRoleName = 'initiator' | 'responder';

/**
 * Which operation a peer performs on its first turn after the handshake
 */
export type TurnKind = 'send' | 'receive';

/**
 * Role strategy selected once per session.
 *
 * The same object fixes both the handshake ordering and the first chat turn,
 * so the two orderings cannot disagree.
 */
export interface PeerRole {
  readonly name: PeerRoleName;
  readonly firstTurn: TurnKind;
  /** Swap public values in this role's order, logging each one as it crosses the wire */
  exchangePublicValues(connection: Connection, ourPublic: bigint, logger?: Logger): Promise<bigint>;
}

async function sendPublicValue(connection: Connection, value: bigint, logger: Logger): Promise<void> {
  try {
    await connection.write(encodePublicValue(value));
  } catch (error) {
    throw ChannelError.handshakeFailed('could not send public value', ChannelError.toError(error));
  }
  logger.info(`-> Sent our public: ${formatU64(value)}`);
}

async function receivePublicValue(connection: Connection, logger: Logger): Promise<bigint> {
  const bytes = await connection.readExact(PUBLIC_VALUE_SIZE);
  if (!bytes) {
    throw ChannelError.handshakeFailed(
      'connection closed before the peer public value arrived',
      connection.error ?? undefined
    );
  }
  const value = decodePublicValue(bytes);
  logger.info(`<- Received their public: ${formatU64(value)}`);
  return value;
}

/**
 * Connecting side: writes its public value first, sends the first chat line
 */
export const INITIATOR: PeerRole = {
  name: 'initiator',
  firstTurn: 'send',
  async exchangePublicValues(
    connection: Connection,
    ourPublic: bigint,
    logger: Logger = silentLogger
  ): Promise<bigint> {
    await sendPublicValue(connection, ourPublic, logger);
    return receivePublicValue(connection, logger);
  },
};

/**
 * Listening side: reads the peer's public value first, receives the first chat line
 */
export const RESPONDER: PeerRole = {
  name: 'responder',
  firstTurn: 'receive',
  async exchangePublicValues(
    connection: Connection,
    ourPublic: bigint,
    logger: Logger = silentLogger
  ): Promise<bigint> {
    const theirs = await receivePublicValue(connection, logger);
    await sendPublicValue(connection, ourPublic, logger);
    return theirs;
  },
};

/**
 * Look up the strategy for a role name
 */
export function roleFor(name: PeerRoleName): PeerRole {
  return name === 'initiator' ? INITIATOR : RESPONDER;
}
