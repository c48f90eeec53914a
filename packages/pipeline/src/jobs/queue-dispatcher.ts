import { randomUUID } from 'node:crypto';
import type { Logger } from '../lib/logger.js';
import { toBatchRow } from '../schemas/scenario.schema.js';
import type { ScenarioDispatcher } from '../services/scenario-set.service.js';
import type { PipelineOptions, ScenarioOutcome, ScenarioSpec } from '../types/index.js';
import { ScenarioOutcomeSchema } from './messages.js';
import { closeQueues, enqueueScenarioRun, getScenarioRunEvents } from './queue.js';

export interface QueueDispatcherOptions {
  simulationRoot: string;
  resultsDir: string;
  logger: Logger;
}

/**
 * Job id of a scenario within a batch. BullMQ rejects custom ids containing
 * `:`; scenario ids are limited to letters, digits, `_`, `-` and `.`.
 */
export function scenarioJobId(batchId: string, scenarioId: string): string {
  return `${batchId}-${scenarioId}`;
}

/**
 * Hands scenarios to standalone workers through the `scenario-run` queue
 * and waits for each job to finish.
 */
export class QueueDispatcher implements ScenarioDispatcher {
  private readonly batchId = randomUUID();
  private rowNumber = 1;

  constructor(private readonly options: QueueDispatcherOptions) {}

  async dispatch(spec: ScenarioSpec, pipelineOptions: PipelineOptions): Promise<ScenarioOutcome> {
    this.rowNumber += 1;
    const job = await enqueueScenarioRun(
      {
        row: toBatchRow(spec),
        rowNumber: this.rowNumber,
        settings: {
          simulationRoot: this.options.simulationRoot,
          resultsDir: this.options.resultsDir,
          options: pipelineOptions,
        },
      },
      scenarioJobId(this.batchId, spec.id)
    );
    this.options.logger.debug({ scenarioId: spec.id, jobId: job.id }, 'Scenario queued');

    const result: unknown = await job.waitUntilFinished(getScenarioRunEvents());
    return ScenarioOutcomeSchema.parse(result);
  }

  async close(): Promise<void> {
    await closeQueues();
  }
}
