/**
 * Helper subprocess entry point.
 *
 * stdin carries command frames from the host and stdout carries replies and
 * broadcasts, so all logging goes to stderr. Exits 0 when the host closes
 * stdin and 1 on a protocol violation.
 */

import { ChokidarBackend } from './chokidar-backend.js';
import { CommandServer } from './command-server.js';
import { log } from '../utils/logger.js';

const logger = log.child({ service: 'helper', pid: process.pid });

// Treat termination signals as the host closing the stream
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info('Received termination signal', { signal });
    process.stdin.destroy();
  });
}

process.stdout.on('error', (error: Error) => {
  logger.error('stdout closed under the helper', error);
  process.exit(1);
});

const server = new CommandServer(process.stdin, process.stdout, new ChokidarBackend());

logger.info('Helper ready');
const outcome = await server.run();

if (outcome.reason === 'fatal') {
  logger.error('Helper exiting after fatal error', outcome.error);
  process.exit(1);
}

logger.info('Helper exiting');
process.exit(0);
