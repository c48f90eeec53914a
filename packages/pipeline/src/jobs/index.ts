// Queue exports
export {
  QUEUE_NAMES,
  getRedisConnection,
  getScenarioRunQueue,
  getScenarioRunEvents,
  enqueueScenarioRun,
  closeQueues,
} from './queue.js';

export type { ScenarioRunJobData } from './queue.js';

// Worker exports
export { startScenarioWorker, stopScenarioWorker, serveScenarioQueue } from './worker.js';

// Dispatchers
export { LocalProcessPool, defaultChildModule } from './local-pool.js';
export { QueueDispatcher, scenarioJobId } from './queue-dispatcher.js';

// Processor exports (for testing)
export { createScenarioRunProcessor, executeRunRequest } from './processors/scenario-run.processor.js';
