#!/usr/bin/env node
/**
 * Slot monitor console
 *
 * Reads commands from stdin as LOCAL_USER_ID and prints replies to stdout.
 * With TELEGRAM_BOT_TOKEN set, Telegram chats are served as well.
 * Logs go to stderr.
 *
 * Usage:
 *   TARGET_USERNAME=... TARGET_PASSWORD=... slot-monitor
 *   > /start
 *   > /settings centers london
 *   > /monitor
 */

import * as readline from 'node:readline';
import { createApp, VERSION } from './app.js';
import { loadAppConfig } from './utils/env-parser.js';
import { ConfigValidationError } from './utils/config-schemas.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadAppConfig();
  const app = await createApp(config);
  const userId = config.console.localUserId;
  const username = process.env.USER ?? userId;

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  process.stdout.write(`slot-monitor ${VERSION}. Type /help for commands, /quit to exit.\n`);
  if (app.bot) {
    process.stdout.write('Telegram commands are enabled.\n');
  }

  let exiting = false;
  const exit = async (reason: string): Promise<void> => {
    if (exiting) return;
    exiting = true;
    rl.close();
    await app.shutdown(reason);
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void exit('SIGINT');
  });
  process.on('SIGTERM', () => {
    void exit('SIGTERM');
  });

  // Lines are handled one at a time so replies keep their order
  let queue: Promise<void> = Promise.resolve();
  rl.on('line', (line) => {
    const input = line.trim();
    if (!input) return;
    queue = queue.then(async () => {
      if (input === '/quit' || input === '/exit') {
        await exit('console');
        return;
      }
      const reply = await app.commands.handle(userId, username, input);
      process.stdout.write(`${reply}\n`);
    });
  });
  rl.on('close', () => {
    void queue.then(() => exit('stdin closed'));
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    process.stderr.write(`${error.message}\n`);
  } else {
    logger.app.error('Fatal error', { error });
  }
  process.exit(1);
});
