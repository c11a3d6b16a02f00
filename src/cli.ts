#!/usr/bin/env node
import { pathToFileURL } from 'url';
import { ChannelErrorCode, isChannelError } from './errors.js';
import { ConsoleLineSource, type LineSource } from './io/console.js';
import { createConsoleLogger } from './logger.js';
import { parseArgs, runPeer, USAGE, type ParsedCommand } from './peer.js';
import { SQLiteHistoryStore } from './storage/index.js';

/**
 * Entry point. Returns the process exit code:
 * 0 on a normal end, 1 on connection or handshake failure, 2 on bad arguments.
 */
export async function main(
  argv: readonly string[],
  createInput: () => LineSource = () => new ConsoleLineSource()
): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    if (isChannelError(error, ChannelErrorCode.INVALID_ARGUMENTS)) {
      console.error(`error: ${error.message}`);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const logger = createConsoleLogger({ verbose: command.options.verbose });
  const input = createInput();
  const history = command.options.historyPath
    ? new SQLiteHistoryStore(command.options.historyPath)
    : undefined;

  try {
    const summary = await runPeer(command, { input, logger, history });
    logger.info(
      `[SESSION] ${summary.sent} sent (${summary.bytesSent} bytes), ` +
      `${summary.received} received (${summary.bytesReceived} bytes)`
    );
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`error: ${message}`);
    return 1;
  } finally {
    input.close?.();
    await history?.close();
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
