#!/usr/bin/env node

import 'dotenv/config';
import { paths } from '../utils/paths.js';
import { ConfigError, loadConfig } from '../utils/config.js';
import { isServerRunning, getServerVersion } from './server-manager.js';

const HELP = `
task-service - Task management HTTP API

Usage:
  task-service              Start the HTTP server (same as serve)
  task-service serve        Start the HTTP server
  task-service version      Show version
  task-service status       Check if a server is running on the configured port
  task-service --help       Show this help

Environment variables:
  TASKS_PORT                    HTTP port (default: 8080)
  TASKS_HOST                    Listen address (default: 0.0.0.0)
  TASKS_STORAGE                 memory | file | mongo (default: mongo)
  TASKS_MONGO_URI               MongoDB URI (default: mongodb://127.0.0.1:27017)
  TASKS_MONGO_DB                MongoDB database (default: tasks)
  TASKS_DATA_DIR                File storage and log directory (default: ./data)
  TASKS_REPOSITORY_TIMEOUT_MS   Per-call storage timeout (default: 5000)
  LOG_LEVEL                     debug | info | warn | error (default: info)
`;

async function main(command: string | undefined): Promise<number> {
  switch (command) {
    case undefined:
    case 'serve': {
      const { startHttpServer } = await import('../server/fastify-server.js');
      await startHttpServer(loadConfig());
      return 0;
    }
    case 'version':
      console.log(paths.getVersion());
      return 0;
    case 'status': {
      const { port } = loadConfig();
      if (!(await isServerRunning(port))) {
        console.log('Server is not running');
        return 1;
      }
      const version = await getServerVersion(port);
      console.log(`Server is running on port ${port}`);
      console.log(`Version: ${version || 'unknown'}`);
      return 0;
    }
    case '--help':
    case '-h':
      console.log(HELP);
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      return 1;
  }
}

const command = process.argv[2];
try {
  const code = await main(command);
  // serve keeps running until a signal arrives
  if (command !== undefined && command !== 'serve') process.exit(code);
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to start server:', error);
  }
  process.exit(1);
}
