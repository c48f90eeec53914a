import { Queue, QueueEvents } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { validateToolchainConfig } from '../lib/config/toolchain.js';
import type { ScenarioRunRequest } from './messages.js';

// Queue names
export const QUEUE_NAMES = {
  SCENARIO_RUN: 'scenario-run',
} as const;

export type ScenarioRunJobData = ScenarioRunRequest;

/**
 * Redis connection options for BullMQ, from the validated environment
 */
export function getRedisConnection(): ConnectionOptions {
  const { redis } = validateToolchainConfig();
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
  };
}

// Queue instances (lazy initialization)
let scenarioRunQueue: Queue<ScenarioRunJobData> | null = null;
let scenarioRunEvents: QueueEvents | null = null;

/**
 * Get or create the scenario run queue
 */
export function getScenarioRunQueue(): Queue<ScenarioRunJobData> {
  if (!scenarioRunQueue) {
    scenarioRunQueue = new Queue<ScenarioRunJobData>(QUEUE_NAMES.SCENARIO_RUN, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 1, // A scenario is never retried automatically
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600,
        },
      },
    });
  }
  return scenarioRunQueue;
}

export function getScenarioRunEvents(): QueueEvents {
  if (!scenarioRunEvents) {
    scenarioRunEvents = new QueueEvents(QUEUE_NAMES.SCENARIO_RUN, {
      connection: getRedisConnection(),
    });
  }
  return scenarioRunEvents;
}

/**
 * Enqueue one scenario. `jobId` keeps a scenario from being queued twice
 * within a batch.
 */
export async function enqueueScenarioRun(data: ScenarioRunJobData, jobId: string) {
  const queue = getScenarioRunQueue();
  return queue.add('run', data, { jobId });
}

/**
 * Close all queue connections
 */
export async function closeQueues(): Promise<void> {
  const closing: Promise<void>[] = [];
  if (scenarioRunQueue) closing.push(scenarioRunQueue.close());
  if (scenarioRunEvents) closing.push(scenarioRunEvents.close());
  await Promise.all(closing);
  scenarioRunQueue = null;
  scenarioRunEvents = null;
}
