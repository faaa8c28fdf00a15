#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { hostingDe } from './providers/hosting-de.js';
import { createApp } from './server.js';

const program = new Command();

program
  .name('dyndns-bridge')
  .description('DynDNS server providing an interface for updates via generic URL')
  .version('0.1.0')
  .option(
    '-c, --config <path>',
    "config file for the DynDNS server; defaults to 'config.toml' in the working directory",
    'config.toml'
  )
  .action(async (options: { config: string }) => {
    const bootLogger = createLogger();
    let config: AppConfig;
    try {
      config = await loadConfig(options.config);
    } catch (err) {
      bootLogger.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
      return;
    }

    const logger = createLogger({ level: config.logLevel });
    const client = hostingDe(config.provider);
    const app = createApp({ client, allowList: config.allowList, logger });

    const { listen } = config;
    const server =
      listen.kind === 'socket'
        ? app.listen(listen.path, () => {
            logger.info(`Listening on unix socket ${listen.path}`);
          })
        : app.listen(listen.port, listen.host, () => {
            logger.info(`Listening on http://${listen.host}:${listen.port}`);
          });

    server.on('error', (err) => {
      logger.error(`Server error: ${err.message}`);
      process.exitCode = 1;
    });

    if (config.allowList.kind === 'unrestricted') {
      logger.warn('No allowed_domains configured, updates for any domain in the zone are accepted.');
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
