import type { Job } from 'bullmq';
import { describeError } from '../../lib/error-handler.js';
import type { Logger } from '../../lib/logger.js';
import { toScenarioSpec } from '../../schemas/scenario.schema.js';
import type { Toolchain } from '../../services/external-tool.service.js';
import { runScenario } from '../../services/scenario-runner.service.js';
import type { ScenarioOutcome } from '../../types/index.js';
import { ScenarioRunRequestSchema } from '../messages.js';
import type { ScenarioRunRequest } from '../messages.js';

export interface ScenarioRunDeps {
  tools: Toolchain;
  logger: Logger;
}

/**
 * Validate a run request and execute it. Every failure, including a request
 * that does not parse, ends up in the returned outcome.
 */
export async function executeRunRequest(payload: unknown, deps: ScenarioRunDeps): Promise<ScenarioOutcome> {
  let request: ScenarioRunRequest;
  try {
    request = ScenarioRunRequestSchema.parse(payload);
  } catch (error) {
    const report = describeError(error);
    return {
      scenarioId: 'unknown',
      ok: false,
      durationMs: 0,
      error: { name: report.error, message: report.message },
    };
  }

  const started = Date.now();
  try {
    const spec = toScenarioSpec(request.row, request.rowNumber);
    return await runScenario(spec, request.settings, deps);
  } catch (error) {
    const report = describeError(error);
    return {
      scenarioId: request.row.scenario_id,
      ok: false,
      durationMs: Date.now() - started,
      error: { name: report.error, message: report.message },
    };
  }
}

/**
 * Process scenario-run jobs
 */
export function createScenarioRunProcessor(deps: ScenarioRunDeps) {
  return async function processScenarioRun(job: Job<ScenarioRunRequest>): Promise<ScenarioOutcome> {
    await job.log(`Running scenario ${job.data.row.scenario_id}`);
    const outcome = await executeRunRequest(job.data, deps);
    await job.log(outcome.ok ? 'Scenario succeeded' : `Scenario failed: ${outcome.error?.message ?? ''}`);
    return outcome;
  };
}
