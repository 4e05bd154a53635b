/**
 * Liquid Ballot Web Server
 */

import {
  createLiquidBallot,
  createTestBallot,
  loadConfig,
  parsePositiveInt,
  type LiquidBallot,
} from '../ballot/index.js';
import { createApp, SERVICE_NAME } from './app.js';

// USE_MEMORY_STORE=true keeps the ballot in memory (lost on restart)
const useMemoryStore = process.env.USE_MEMORY_STORE === 'true';
const config = loadConfig(process.env);

let ballot: LiquidBallot;
if (useMemoryStore) {
  ballot = createTestBallot(config);
  console.log('Running with in-memory store');
} else {
  ballot = createLiquidBallot(config);
  console.log(`Data directory: ${config.dataDir}`);
}
console.log(`Max proposals: ${config.maxProposals}, label overflow: ${config.labelOverflow}`);

const app = createApp(ballot, {
  rateLimitRequests: parsePositiveInt(process.env.RATE_LIMIT_REQUESTS, 'RATE_LIMIT_REQUESTS', 30),
  enableHSTS: process.env.NODE_ENV === 'production',
  disableLogging: process.env.DISABLE_LOGGING === 'true',
});

const PORT = parsePositiveInt(process.env.PORT, 'PORT', 3000);

const server = app.listen(PORT, () => {
  console.log(`${SERVICE_NAME} server running on port ${PORT}`);
});

server.on('error', (error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down...`);
  server.close(() => {
    ballot.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
