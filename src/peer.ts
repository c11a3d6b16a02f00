import * as net from 'net';
import { ChannelError } from './errors.js';
import type { LineSource } from './io/console.js';
import { silentLogger, type Logger } from './logger.js';
import { roleFor, type PeerRoleName } from './protocol/roles.js';
import { ChatSession } from './protocol/session.js';
import type { HistoryStore } from './storage/adapter.js';
import { Connection } from './transport/connection.js';
import type { MessageHandler, SessionSummary } from './types.js';

export const USAGE = `Usage: streamchat <command> [options]

Commands:
  server <port>       Listen on 0.0.0.0:<port> and accept one peer (responder)
  client <address>    Connect to <host>:<port> (initiator)

Options:
  --history <path>    Record sent and received messages in a SQLite file
  -v, --verbose       Include private values and keystream positions in the transcript
  -h, --help          Print help`;

/**
 * Options shared by both roles
 */
export interface PeerOptions {
  historyPath?: string;
  verbose: boolean;
}

/**
 * Parsed command line
 */
export type ParsedCommand =
  | { kind: 'help' }
  | { kind: 'responder'; port: number; options: PeerOptions }
  | { kind: 'initiator'; host: string; port: number; options: PeerOptions };

const ROLE_ALIASES = new Map<string, PeerRoleName>([
  ['server', 'responder'],
  ['responder', 'responder'],
  ['client', 'initiator'],
  ['initiator', 'initiator'],
]);

/**
 * Parse a decimal port number
 */
export function parsePort(value: string, allowZero: boolean): number {
  if (!/^\d+$/.test(value)) {
    throw ChannelError.invalidArguments(`Invalid port: ${value}`);
  }
  const port = Number(value);
  if (port > 65535 || (!allowZero && port === 0)) {
    throw ChannelError.invalidArguments(`Port out of range: ${value}`);
  }
  return port;
}

/**
 * Split "host:port" or "[v6-host]:port"
 */
export function parseAddress(address: string): { host: string; port: number } {
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(address);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(bracketed[2], false) };
  }

  const separator = address.lastIndexOf(':');
  if (separator <= 0 || separator === address.length - 1) {
    throw ChannelError.invalidArguments(`Invalid address (expected host:port): ${address}`);
  }
  const host = address.slice(0, separator);
  if (host.includes(':')) {
    throw ChannelError.invalidArguments(`IPv6 addresses must be bracketed: ${address}`);
  }
  return { host, port: parsePort(address.slice(separator + 1), false) };
}

/**
 * Parse the command line (without the node and script entries).
 * Malformed input throws INVALID_ARGUMENTS before any connection is attempted.
 */
export function parseArgs(argv: readonly string[]): ParsedCommand {
  const positionals: string[] = [];
  const options: PeerOptions = { verbose: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    } else if (arg === '-v' || arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--history') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw ChannelError.invalidArguments('--history requires a path');
      }
      options.historyPath = value;
      i++;
    } else if (arg.startsWith('--history=')) {
      const value = arg.slice('--history='.length);
      if (value === '') {
        throw ChannelError.invalidArguments('--history requires a path');
      }
      options.historyPath = value;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw ChannelError.invalidArguments(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length === 0) {
    throw ChannelError.invalidArguments('Missing command');
  }

  const [command, target, ...extra] = positionals;
  const role = ROLE_ALIASES.get(command);
  if (role === undefined) {
    throw ChannelError.invalidArguments(`Unknown command: ${command}`);
  }
  if (target === undefined) {
    throw ChannelError.invalidArguments(
      role === 'responder' ? 'Missing port' : 'Missing address'
    );
  }
  if (extra.length > 0) {
    throw ChannelError.invalidArguments(`Unexpected argument: ${extra[0]}`);
  }

  if (role === 'responder') {
    return { kind: 'responder', port: parsePort(target, true), options };
  }
  const { host, port } = parseAddress(target);
  return { kind: 'initiator', host, port, options };
}

/**
 * Options for listenForPeer
 */
export interface ListenOptions {
  port: number;
  /** Bind address (default 0.0.0.0) */
  host?: string;
  /** Called with the bound port once listening */
  onListening?: (port: number) => void;
}

/**
 * A connection accepted by the responder
 */
export interface AcceptedPeer {
  connection: Connection;
  remoteAddress: string;
}

/**
 * Bind, accept exactly one connection, then stop listening
 */
export function listenForPeer(options: ListenOptions): Promise<AcceptedPeer> {
  const host = options.host ?? '0.0.0.0';

  return new Promise((resolve, reject) => {
    const server = net.createServer();

    server.once('error', (error: Error) => {
      reject(ChannelError.connectionFailed('bind', error, { host, port: options.port }));
    });

    server.once('connection', (socket: net.Socket) => {
      server.close();
      resolve({
        connection: Connection.fromSocket(socket),
        remoteAddress: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      });
    });

    server.listen(options.port, host, () => {
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : options.port;
      options.onListening?.(port);
    });
  });
}

/**
 * Connect to a listening responder
 */
export function connectToPeer(host: string, port: number): Promise<Connection> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });

    const onError = (error: Error): void => {
      reject(ChannelError.connectionFailed('connect', error, { host, port }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(Connection.fromSocket(socket));
    });
  });
}

/**
 * Collaborators for runPeer
 */
export interface PeerDependencies {
  input: LineSource;
  logger?: Logger;
  onMessage?: MessageHandler;
  history?: HistoryStore;
  /** Bind address override for the responder (default 0.0.0.0) */
  listenHost?: string;
  onListening?: (port: number) => void;
}

/**
 * Establish the connection for the parsed role and run one chat session over it
 */
export async function runPeer(
  command: Exclude<ParsedCommand, { kind: 'help' }>,
  deps: PeerDependencies
): Promise<SessionSummary> {
  const logger = deps.logger ?? silentLogger;
  let connection: Connection;

  if (command.kind === 'responder') {
    const host = deps.listenHost ?? '0.0.0.0';
    const accepted = await listenForPeer({
      port: command.port,
      host,
      onListening: (port) => {
        logger.info(`[SERVER] Listening on ${host}:${port}`);
        logger.info('[SERVER] Waiting for client...');
        deps.onListening?.(port);
      },
    });
    logger.info(`[CLIENT] Connected from ${accepted.remoteAddress}`);
    connection = accepted.connection;
  } else {
    logger.info(`[CLIENT] Connecting to ${command.host}:${command.port}...`);
    connection = await connectToPeer(command.host, command.port);
    logger.info('[CLIENT] Connected!');
  }

  const session = new ChatSession(connection, {
    role: roleFor(command.kind),
    input: deps.input,
    onMessage: deps.onMessage ?? ((message) => logger.info(`[PEER] ${message.text}`)),
    logger,
    history: deps.history,
  });

  return session.run();
}
