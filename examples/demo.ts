#!/usr/bin/env npx tsx
/**
 * Stream chat demo
 *
 * Runs an initiator and a responder in one process over a pair of
 * in-memory pipes, with a few scripted lines each, and prints both
 * transcripts plus the recorded history.
 *
 * Run with: npm run demo
 */

import { PassThrough } from 'stream';
import {
  ChatSession,
  Connection,
  ArrayLineSource,
  SQLiteHistoryStore,
  INITIATOR,
  RESPONDER,
  createConsoleLogger,
  bytesToHex,
  type Logger,
} from '../src/index.js';

function prefixed(label: string, logger: Logger): Logger {
  return {
    debug: (message) => logger.debug(`${label} ${message}`),
    info: (message) => logger.info(`${label} ${message}`),
    warn: (message) => logger.warn(`${label} ${message}`),
    error: (message, error) => logger.error(`${label} ${message}`, error),
  };
}

async function main() {
  console.log('\n=== Stream chat demo (in-memory pipes) ===\n');

  const verbose = process.argv.includes('--verbose');
  const console_ = createConsoleLogger({ verbose });
  const history = new SQLiteHistoryStore(':memory:');

  const aliceToBob = new PassThrough();
  const bobToAlice = new PassThrough();

  const alice = new ChatSession(new Connection(bobToAlice, aliceToBob), {
    role: INITIATOR,
    input: new ArrayLineSource(['hi bob', 'the weather is fine', 'bye']),
    onMessage: (message) => console.log(`[ALICE] <- ${message.text}`),
    logger: prefixed('[alice]', console_),
    history,
  });

  const bob = new ChatSession(new Connection(aliceToBob, bobToAlice), {
    role: RESPONDER,
    input: new ArrayLineSource(['hello alice', 'good to hear']),
    onMessage: (message) => console.log(`[BOB] <- ${message.text}`),
    logger: prefixed('[bob]', console_),
    history,
  });

  try {
    const [aliceSummary, bobSummary] = await Promise.all([alice.run(), bob.run()]);

    console.log('\n=== Summary ===');
    for (const summary of [aliceSummary, bobSummary]) {
      console.log(
        `${summary.role}: sent ${summary.sent}, received ${summary.received}, ` +
          `fingerprint ${summary.fingerprint}, closed (${summary.closeReason})`
      );
    }

    console.log('\n=== History ===');
    for (const entry of await history.getEntries()) {
      console.log(
        `#${entry.id} ${entry.sessionId.slice(0, 6)} ${entry.direction.padEnd(8)} ` +
          `@${entry.streamOffset} ${bytesToHex(entry.ciphertext)} "${entry.plaintext}"`
      );
    }
  } finally {
    await history.close();
  }
}

main().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exitCode = 1;
});
