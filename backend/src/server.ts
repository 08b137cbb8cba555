/**
 * Backend Server - REST API for proposal generation
 */

import { createServer } from 'http';
import { createDefaultOrchestrator } from './clients.js';
import { createApp } from './app.js';
import { config, requireValidConfig, printConfig } from './config/index.js';
import { ConfigurationError } from './errors.js';
import { Log, createLogger } from './logging/log.js';

const log = createLogger('server');

Log.configure({ level: config.logging.level, filePath: config.logging.filePath || null });

// Load and validate configuration
log.info('Loading configuration...');
try {
  requireValidConfig();
} catch (error) {
  if (!(error instanceof ConfigurationError)) {
    throw error;
  }
  log.error('Configuration validation failed:');
  error.problems.forEach(problem => log.error(`  [ERROR] ${problem}`));
  log.error('Please fix the configuration errors before starting the server.');
  process.exit(1);
}

// Print configuration in development
if (config.server.env === 'development') {
  printConfig();
}

const app = createApp({
  orchestrator: createDefaultOrchestrator(),
  allowedOrigins: [config.frontend.url, 'http://localhost', 'http://127.0.0.1'],
});
const server = createServer(app);
const PORT = config.server.port;

server.listen(PORT, config.server.host, () => {
  console.log(`
============================================================
 Use-Case Studio - Backend Server
 Port: ${PORT.toString().padEnd(48)}
 Host: ${config.server.host.padEnd(48)}
 Environment: ${config.server.env.padEnd(40)}
 Frontend URL: ${config.frontend.url.padEnd(36)}
 Model: ${config.llm.model.padEnd(47)}
 Ready to accept connections...
============================================================
  `);
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  log.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    log.info('Closed');
    process.exit(0);
  });
};

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

export { app, server };
