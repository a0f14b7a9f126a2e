#!/usr/bin/env node

/**
 * Chunk dispatch service - Entry Point
 */

import { getConfig, printConfigErrors, printConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { McpServer } from './presentation/McpServer.js';
import { setDebug } from './utils/logger.js';

async function main() {
  let server: McpServer | null = null;

  try {
    const config = getConfig();
    setDebug(config.server.debug);
    printConfigInfo(config);

    server = new McpServer(config);
    await server.start();
    server.printStats();

    if (!config.mcp.enabled) {
      console.error('\n🚀 Service is running. Press Ctrl+C to stop.\n');
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printConfigErrors(error);
    } else {
      console.error('💥 Fatal error in main():', error);
    }
    if (server) {
      await server.shutdown();
    }
    process.exit(1);
  }

  if (!server) return;
  const running = server;
  const shutdown = async (signal: string) => {
    console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
    try {
      await running.shutdown();
      console.error('👋 Goodbye!\n');
      process.exit(0);
    } catch (error) {
      console.error('💥 Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (error) => {
    console.error('💥 Uncaught Exception:', error);
    void shutdown('UNCAUGHT_EXCEPTION');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
    void shutdown('UNHANDLED_REJECTION');
  });
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
