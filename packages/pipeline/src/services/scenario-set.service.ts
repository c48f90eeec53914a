import { describeError } from '../lib/error-handler.js';
import type { Logger } from '../lib/logger.js';
import type { PipelineOptions, ScenarioOutcome, ScenarioSpec } from '../types/index.js';

/**
 * Runs a scenario somewhere (a pooled child process, a queue worker) and
 * reports how it went. Failures of the scenario itself resolve with
 * `ok: false`; a rejection means the dispatch itself broke.
 */
export interface ScenarioDispatcher {
  dispatch(spec: ScenarioSpec, options: PipelineOptions): Promise<ScenarioOutcome>;
  close(): Promise<void>;
}

export interface BatchFailure {
  scenarioId: string;
  message: string;
}

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: BatchFailure[];
  /** In completion order */
  outcomes: ScenarioOutcome[];
  durationMs: number;
}

export class ScenarioSetOrchestrator {
  constructor(
    private readonly dispatcher: ScenarioDispatcher,
    private readonly logger: Logger
  ) {}

  /**
   * Dispatch every scenario at once; the dispatcher bounds how many run
   * concurrently. One failing scenario never stops the others.
   */
  async runBatch(scenarios: readonly ScenarioSpec[], options: PipelineOptions): Promise<BatchReport> {
    const started = Date.now();
    const outcomes: ScenarioOutcome[] = [];
    this.logger.info({ scenarios: scenarios.length }, 'Batch started');

    await Promise.all(
      scenarios.map(async (spec) => {
        const outcome = await this.dispatchOne(spec, options);
        outcomes.push(outcome);
        if (outcome.ok) {
          this.logger.info({ scenarioId: spec.id, durationMs: outcome.durationMs }, 'Scenario succeeded');
        } else {
          this.logger.warn({ scenarioId: spec.id, error: outcome.error }, 'Scenario failed');
        }
      })
    );

    const failed = outcomes
      .filter((outcome) => !outcome.ok)
      .map((outcome) => ({ scenarioId: outcome.scenarioId, message: outcome.error?.message ?? 'unknown error' }));

    const report: BatchReport = {
      total: scenarios.length,
      succeeded: outcomes.length - failed.length,
      failed,
      outcomes,
      durationMs: Date.now() - started,
    };
    this.logger.info(
      { total: report.total, succeeded: report.succeeded, failed: failed.length, durationMs: report.durationMs },
      'Batch finished'
    );
    return report;
  }

  private async dispatchOne(spec: ScenarioSpec, options: PipelineOptions): Promise<ScenarioOutcome> {
    const started = Date.now();
    try {
      return await this.dispatcher.dispatch(spec, options);
    } catch (error) {
      const report = describeError(error);
      return {
        scenarioId: spec.id,
        ok: false,
        durationMs: Date.now() - started,
        error: { name: report.error, message: report.message },
      };
    }
  }
}

/** Exit code of a finished batch: 0 when every scenario succeeded. */
export function batchExitCode(report: Pick<BatchReport, 'failed'>): number {
  return report.failed.length === 0 ? 0 : 1;
}
