#!/usr/bin/env node
/**
 * App Supervisor - Entry Point
 *
 * Resolves configuration from the environment, loads the application and
 * serves it until a termination signal arrives.
 */

import { loadConfig } from './config.js';
import { loadApplication } from './app/loader.js';
import { createStatusApp } from './app/status-app.js';
import { Supervisor } from './server.js';
import { installSignalHandlers } from './signals.js';
import { createLogger, describeError } from './utils/logger.js';

const log = createLogger('main');

async function main(): Promise<void> {
  const config = loadConfig();
  const application = config.appModule ? await loadApplication(config.appModule) : createStatusApp();
  log.info(`Serving ${config.appModule ?? 'built-in status application'}`, { pid: process.pid });

  const supervisor = new Supervisor({ config, application });
  installSignalHandlers(supervisor);
  await supervisor.start();
}

main().catch((error: unknown) => {
  log.error('Fatal startup error', describeError(error));
  process.exit(1);
});
