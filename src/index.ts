#!/usr/bin/env node
import { App } from './tui/components/App';
import { BlessedInput } from './tui/BlessedInput';
import { ControlLoop } from './core/loop';
import { createInitialState } from './core/seed';
import { getConfig } from './utils/config';
import { closeLogger, configureLogger, log } from './utils/logger';

async function bootstrap() {
  const config = getConfig();
  configureLogger(config.logging);
  log('Initialising board...');

  const { board, logQueue } = createInitialState();
  log(`[Seed] ${board.items.length} items, ${logQueue.size} log entries`);

  const app = new App(config.ui.title);
  const input = new BlessedInput(app.screen);
  try {
    await new ControlLoop(board, logQueue, app, input).run();
  } finally {
    input.close();
    app.destroy();
  }
  log('Board closed');
}

bootstrap()
  .then(async () => {
    await closeLogger();
    process.exit(0);
  })
  .catch(async err => {
    console.error('Fatal error:', err);
    await closeLogger();
    process.exit(1);
  });
