import { describeError } from '../lib/error-handler.js';
import type { ToolchainConfig } from '../lib/config/toolchain.js';
import type { Logger } from '../lib/logger.js';
import type { PipelineOptions, ScenarioOutcome, ScenarioSpec } from '../types/index.js';
import { createToolchain } from './external-tool.service.js';
import type { Toolchain } from './external-tool.service.js';
import { ScenarioPipeline } from './scenario-pipeline.service.js';
import type { ScenarioPipelineDeps } from './scenario-pipeline.service.js';

export interface RunScenarioSettings {
  simulationRoot: string;
  resultsDir: string;
  options: PipelineOptions;
}

/**
 * Run one pipeline and fold the result into a ScenarioOutcome. The error has
 * already been logged by the pipeline.
 */
export async function runScenario(
  spec: ScenarioSpec,
  settings: RunScenarioSettings,
  deps: ScenarioPipelineDeps
): Promise<ScenarioOutcome> {
  const started = Date.now();
  const pipeline = new ScenarioPipeline(spec, settings, deps);
  try {
    await pipeline.run();
    return { scenarioId: spec.id, ok: true, durationMs: Date.now() - started };
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

export function toolchainFromConfig(config: ToolchainConfig, logger: Logger): Toolchain {
  return createToolchain(config.binaries, { timeoutMs: config.toolTimeoutMs, logger });
}
