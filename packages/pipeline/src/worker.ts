/**
 * Standalone worker process for queued scenarios
 *
 * Run with: npm run worker
 */
import 'dotenv/config';
import { serveScenarioQueue } from './jobs/index.js';
import { validateToolchainConfig } from './lib/config/toolchain.js';
import { reportError } from './lib/error-handler.js';
import { createLogger } from './lib/logger.js';
import { toolchainFromConfig } from './services/scenario-runner.service.js';

const logger = createLogger({ name: 'cosim-worker' });

try {
  const config = validateToolchainConfig();
  serveScenarioQueue({
    concurrency: config.poolSize,
    tools: toolchainFromConfig(config, logger),
    logger,
  });
} catch (error) {
  const report = reportError(logger, error);
  process.exit(report.exitCode);
}
