#!/usr/bin/env node
import 'dotenv/config';

import { parseArgs, printUsage, CliUsageError, type CliArgs } from './cli/args.js';
import { parseEnv, configure } from './config/index.js';
import { getLogger } from './utils/logger.js';
import { isSocket, safeUnlink } from './utils/fs.js';

function readArgs(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`Error: ${error.message}\n`);
      printUsage((text) => process.stderr.write(text));
      process.exit(2);
    }
    throw error;
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = readArgs();

  if (args.help) {
    printUsage();
    return;
  }

  // Validate environment first, then apply the command line on top
  parseEnv();
  const config = configure(args.overrides);
  const logger = getLogger();

  // Loaded after configure() so module loggers pick up the final log level
  const { createRuntime } = await import('./operations/setup.js');
  const runtime = createRuntime(config);

  if (args.exportCard) {
    await runtime.services.card.exportTo(args.exportCard);
    return;
  }

  const { buildApp } = await import('./app.js');
  const app = await buildApp(runtime);

  logger.info(
    { env: config.service.env, version: config.service.version, accelerators: config.backends.accelerators },
    'Starting media preprocessing service'
  );

  try {
    if (config.transport.port !== undefined) {
      await app.listen({ port: config.transport.port, host: config.transport.host });
      logger.info({ port: config.transport.port, host: config.transport.host }, 'Listening on TCP');
    } else {
      const { socketPath } = config.transport;
      // A socket left behind by a previous run would make listen() fail
      if (await isSocket(socketPath)) {
        await safeUnlink(socketPath);
      }
      await app.listen({ path: socketPath });
      logger.info({ socketPath }, 'Listening on Unix socket');
    }
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to bind transport');
    process.exit(1);
  }

  const selection = await runtime.services.selector.select();
  logger.info({ backend: selection.backend, info: selection.info }, 'Active backend');

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      if (config.transport.port === undefined) {
        await safeUnlink(config.transport.socketPath);
      }
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exit(1);
});
