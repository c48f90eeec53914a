import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { ScenarioOutcome } from '../types/index.js';
import { QUEUE_NAMES, closeQueues, getRedisConnection } from './queue.js';
import type { ScenarioRunJobData } from './queue.js';
import { createScenarioRunProcessor } from './processors/scenario-run.processor.js';
import type { ScenarioRunDeps } from './processors/scenario-run.processor.js';

let scenarioRunWorker: Worker<ScenarioRunJobData, ScenarioOutcome> | null = null;

export interface ScenarioWorkerOptions extends ScenarioRunDeps {
  /** Scenarios run at the same time by this process */
  concurrency: number;
}

/**
 * Start the scenario run worker
 */
export function startScenarioWorker(options: ScenarioWorkerOptions): Worker<ScenarioRunJobData, ScenarioOutcome> {
  if (scenarioRunWorker) {
    return scenarioRunWorker;
  }
  const { logger } = options;

  const worker = new Worker<ScenarioRunJobData, ScenarioOutcome>(
    QUEUE_NAMES.SCENARIO_RUN,
    createScenarioRunProcessor(options),
    {
      connection: getRedisConnection(),
      concurrency: options.concurrency,
    }
  );

  worker.on('completed', (job: Job<ScenarioRunJobData, ScenarioOutcome>, outcome: ScenarioOutcome) => {
    logger.info({ jobId: job.id, scenarioId: outcome.scenarioId, ok: outcome.ok }, '[scenario-run] Job completed');
  });

  worker.on('failed', (job: Job<ScenarioRunJobData, ScenarioOutcome> | undefined, err: Error) => {
    logger.error({ jobId: job?.id, err }, '[scenario-run] Job failed');
  });

  worker.on('error', (err: Error) => {
    logger.error({ err }, '[scenario-run] Worker error');
  });

  scenarioRunWorker = worker;
  logger.info({ concurrency: options.concurrency }, 'Scenario worker started');
  return worker;
}

/**
 * Stop the worker, letting running scenarios finish
 */
export async function stopScenarioWorker(): Promise<void> {
  if (scenarioRunWorker) {
    await scenarioRunWorker.close();
    scenarioRunWorker = null;
  }
}

/**
 * Run the worker until SIGINT/SIGTERM, then drain and close connections.
 */
export function serveScenarioQueue(options: ScenarioWorkerOptions): void {
  const { logger } = options;
  startScenarioWorker(options);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');
    try {
      await stopScenarioWorker();
      await closeQueues();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  logger.info('Worker is running. Press Ctrl+C to stop.');
}
