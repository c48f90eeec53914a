// Domain types
export type {
  ScenarioSpec,
  DepartLanePolicy,
  VehicleClass,
  TimeSegment,
  TimeWindow,
  DemandMatrixArtifact,
  DemandRow,
  RouteArtifact,
  RouteArtifactSet,
  InfrastructureNode,
  PlacedInfrastructureNode,
  LaunchMode,
  PipelineOptions,
  ScenarioOutcome,
} from './types/index.js';

// Errors and reporting
export * from './lib/errors.js';
export { describeError, reportError } from './lib/error-handler.js';
export type { ErrorReport } from './lib/error-handler.js';
export { createLogger, scenarioLogger, silentLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export { validateToolchainConfig, resetToolchainConfigCache } from './lib/config/toolchain.js';
export type { ToolchainConfig } from './lib/config/toolchain.js';

// Schemas
export { BATCH_COLUMNS, BatchRowSchema, toScenarioSpec, toBatchRow } from './schemas/scenario.schema.js';
export { DEMAND_COLUMNS, INFRASTRUCTURE_COLUMNS } from './schemas/tables.schema.js';

// Engine
export * from './engine/projection/index.js';
export * from './engine/demand/index.js';
export * from './engine/routes/index.js';
export * from './engine/emit/index.js';

// Services
export { ProcessTool, createToolchain } from './services/external-tool.service.js';
export type { ExternalTool, ExitStatus, Toolchain } from './services/external-tool.service.js';
export { ScenarioPipeline, scratchPaths } from './services/scenario-pipeline.service.js';
export type { PipelineState, PipelineRunSummary, ScenarioPipelineConfig } from './services/scenario-pipeline.service.js';
export { ScenarioSetOrchestrator, batchExitCode } from './services/scenario-set.service.js';
export type { BatchReport, ScenarioDispatcher } from './services/scenario-set.service.js';
export { loadBatch, toScenarioSpecs } from './services/batch-loader.service.js';
export { runScenario } from './services/scenario-runner.service.js';

// Jobs
export * from './jobs/index.js';
