#!/usr/bin/env node

import { createInterface } from 'node:readline';
import { loadChatConfig, resolveChatConfig } from './config.js';
import { createConsoleLogger } from './logger.js';
import { formatMessage, parseCliArgs, runInputLine, USAGE } from './interactive.js';
import { ChatNode } from './node.js';

/**
 * Start a node and chat over stdin/stdout until /quit, EOF or a signal.
 */
async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = resolveChatConfig(loadChatConfig(args.config), args.overrides);
  const logger = createConsoleLogger(config.logLevel);

  const node = new ChatNode({
    username: config.username,
    channel: config.channel,
    host: config.host,
    port: config.port,
    peers: config.peers,
    discovery: config.discovery,
    logger,
    onMessage: (channel, sender, body) => {
      console.log(formatMessage(channel, sender, body));
    },
    onDirect: (sender, _recipient, body) => {
      console.log(`(dm from ${sender}) ${body}`);
    },
    onControl: (sender, ctrl, data) => {
      logger.debug(`Control '${ctrl}' from ${sender}: ${JSON.stringify(data)}`);
    },
  });

  const bound = await node.start();
  console.log(`[lanchat] ${config.username} in '${config.channel}' on ${bound.host}:${bound.port}`);
  console.log('[lanchat] Type messages and press Enter to send. /quit to leave.');

  const input = createInterface({ input: process.stdin, terminal: false });
  let stopping = false;

  const shutdown = async (): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    input.close();
    await node.stop();
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      console.error('Error during shutdown:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  input.on('line', (line) => {
    if (stopping) {
      return;
    }
    const result = runInputLine(node, line);
    for (const out of result.output) {
      console.log(out);
    }
    if (result.action === 'quit') {
      onSignal();
    }
  });

  input.on('close', onSignal);
}

main().catch((e) => {
  console.error('Error:', e instanceof Error ? e.message : String(e));
  console.error(USAGE);
  process.exit(1);
});
