#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AppConfig, loadConfig } from './config';
import { createExpenseDatabase, initializeSchema } from './database';
import { sqliteConnectionFactory } from './driver';
import { createExpenseOperations } from './expenses';
import { createHttpApp } from './http';
import { logger } from './logger';
import { createExpenseServer } from './server';

async function start(config: AppConfig): Promise<() => Promise<void>> {
  const connect = sqliteConnectionFactory(config.dbPath);

  // Nothing is served unless the database file is writable
  initializeSchema(connect);
  logger.info('Database initialized successfully with write access');

  const operations = createExpenseOperations(createExpenseDatabase(connect));
  const createServer = () => createExpenseServer({ operations, categoriesPath: config.categoriesPath });

  if (config.transport === 'stdio') {
    const server = createServer();
    await server.connect(new StdioServerTransport());
    logger.info('Expense Tracker MCP server running on stdio');
    return () => server.close();
  }

  const { app, closeSessions } = createHttpApp(createServer);
  const listener = app.listen(config.port, config.host, () => {
    logger.info(`Expense Tracker MCP server running on http://${config.host}:${config.port}`);
    logger.info('Available endpoints:');
    logger.info('  POST/GET/DELETE /mcp    - MCP Streamable HTTP endpoint');
    logger.info('  GET             /health - Health check');
  });

  return async () => {
    await closeSessions();
    await new Promise<void>(resolve => listener.close(() => resolve()));
  };
}

function handleSignals(stop: () => Promise<void>): void {
  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    try {
      await stop();
    } catch (error) {
      logger.error('Error during shutdown:', error);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    logger.info(`Database path: ${config.dbPath}`);
    handleSignals(await start(config));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void main();
