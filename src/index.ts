#!/usr/bin/env node

/**
 * Deep Research MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors/ResearchErrors.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    mcpServer = new McpServer(config);
    await mcpServer.start();
    mcpServer.printStats();

    const server = mcpServer;
    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\n📛 Received ${signal}, shutting down gracefully...`);
      try {
        await server.shutdown();
        console.error('👋 Goodbye!');
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
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`💥 ${error.message}:`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
    } else {
      console.error('💥 Fatal error in main():', error);
    }

    if (mcpServer) {
      await mcpServer.shutdown().catch((shutdownError: unknown) => {
        console.error('💥 Error during shutdown:', shutdownError);
      });
    }
    process.exit(1);
  }
}

void main();
