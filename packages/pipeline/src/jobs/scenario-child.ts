/**
 * Worker process of the local pool. Receives one run request at a time over
 * IPC and answers with the scenario outcome.
 *
 * Forked by LocalProcessPool; not meant to be started by hand.
 */
import 'dotenv/config';
import { validateToolchainConfig } from '../lib/config/toolchain.js';
import { createLogger } from '../lib/logger.js';
import { toolchainFromConfig } from '../services/scenario-runner.service.js';
import type { ChildMessage } from './messages.js';
import { executeRunRequest } from './processors/scenario-run.processor.js';

const logger = createLogger({ name: `cosim-worker-${process.pid}` });
const config = validateToolchainConfig();
const tools = toolchainFromConfig(config, logger);

function send(message: ChildMessage): void {
  process.send?.(message);
}

let queue: Promise<void> = Promise.resolve();

process.on('message', (payload: unknown) => {
  queue = queue
    .then(async () => {
      const outcome = await executeRunRequest(payload, { tools, logger });
      send({ type: 'outcome', outcome });
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Run request could not be answered');
    });
});

// The pool disconnects when it closes; finish the current scenario first
process.on('disconnect', () => {
  void queue.then(() => process.exit(0));
});

send({ type: 'ready' });
