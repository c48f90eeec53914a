import { WorkflowError } from '../lib/errors.js';
import { assertExists, ensureDir, removePath } from '../lib/files.js';
import type { Logger } from '../lib/logger.js';
import { scenarioLogger } from '../lib/logger.js';
import { reportError } from '../lib/error-handler.js';
import { DemandGenerator, VEHICLE_CLASSES } from '../engine/demand/index.js';
import { BASE_START_SECONDS, validateCongestionSequence } from '../engine/demand/segments.js';
import {
  ArtifactPathResolver,
  buildArtifactPaths,
  drawSeeds,
  emitAdditionalFile,
  emitNetworkSimConfig,
  emitServiceFile,
  emitTrafficSimConfig,
  emitVehicleTypeFile,
} from '../engine/emit/index.js';
import type { ArtifactPathSet, RandomSource } from '../engine/emit/index.js';
import { CoordinateTransformer } from '../engine/projection/index.js';
import { RouteStageOrchestrator } from '../engine/routes/index.js';
import type { ClassDemand } from '../engine/routes/index.js';
import type {
  LaunchMode,
  PipelineOptions,
  PlacedInfrastructureNode,
  RouteArtifactSet,
  ScenarioSpec,
  VehicleClass,
} from '../types/index.js';
import { archiveScenarioConfig } from './archive.service.js';
import type { Toolchain } from './external-tool.service.js';
import { launchSimulator } from './simulator-launcher.service.js';

// ─── Workflow states ─────────────────────────────────────────────────────────

export type PipelineState =
  | 'Constructed'
  | 'DirectoriesEnsured'
  | 'ArchivalConfigSaved'
  | 'TrafficArtifactsPrepared'
  | 'NetworkArtifactsPrepared'
  | 'SimulatorInvoked'
  | 'ScratchCleaned'
  | 'Terminal'
  | 'Failed';

const VALID_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  Constructed: ['DirectoriesEnsured', 'Failed'],
  DirectoriesEnsured: ['ArchivalConfigSaved', 'Failed'],
  ArchivalConfigSaved: ['TrafficArtifactsPrepared', 'Failed'],
  TrafficArtifactsPrepared: ['NetworkArtifactsPrepared', 'Failed'],
  NetworkArtifactsPrepared: ['SimulatorInvoked', 'ScratchCleaned', 'Terminal', 'Failed'],
  SimulatorInvoked: ['ScratchCleaned', 'Terminal', 'Failed'],
  ScratchCleaned: ['Terminal', 'Failed'],
  Terminal: [],
  Failed: [],
};

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ScenarioPipelineConfig {
  simulationRoot: string;
  resultsDir: string;
  polyFile?: string;
  options: PipelineOptions;
}

export interface ScenarioPipelineDeps {
  tools: Toolchain;
  logger: Logger;
  transformer?: CoordinateTransformer;
  /** Source for the network simulator seeds */
  random?: RandomSource;
}

export interface PipelineRunSummary {
  scenarioId: string;
  routeFiles: RouteArtifactSet;
  seeds: number[];
  nodes: PlacedInfrastructureNode[];
  launched: LaunchMode;
  /** Scratch paths that existed and were removed */
  removed: string[];
  durationMs: number;
}

/**
 * Files that only exist to feed one run. Templates and the archived
 * configuration are not part of this list.
 */
export function scratchPaths(paths: ArtifactPathSet): string[] {
  return [
    paths.vtypeFile,
    paths.sumoConfigFile,
    paths.networkConfigFile,
    paths.servicesFile,
    paths.routesDir,
    paths.additionalFile,
  ];
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

/**
 * Compiles one scenario into the inputs of both simulators, optionally runs
 * them, then removes the scratch files. An instance runs once.
 */
export class ScenarioPipeline {
  readonly paths: ArtifactPathSet;
  private readonly resolver: ArtifactPathResolver;
  private readonly logger: Logger;
  private readonly transformer: CoordinateTransformer;
  private readonly random: RandomSource;
  private currentState: PipelineState = 'Constructed';

  constructor(
    readonly spec: ScenarioSpec,
    private readonly config: ScenarioPipelineConfig,
    private readonly deps: ScenarioPipelineDeps
  ) {
    this.paths = buildArtifactPaths(spec, config);
    this.resolver = new ArtifactPathResolver(this.paths);
    this.logger = scenarioLogger(deps.logger, spec.id);
    this.transformer = deps.transformer ?? new CoordinateTransformer();
    this.random = deps.random ?? Math.random;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(): Promise<PipelineRunSummary> {
    if (this.currentState !== 'Constructed') {
      throw new WorkflowError(
        `Pipeline for scenario ${this.spec.id} has already run`,
        this.currentState,
        'DirectoriesEnsured'
      );
    }

    const started = Date.now();
    this.logger.info('Scenario started');

    try {
      // Nothing is written for a scenario with an unknown congestion level
      validateCongestionSequence(this.spec.congestionSequence);
      await this.ensureDirectories();
      this.transition('DirectoriesEnsured');

      await archiveScenarioConfig(this.spec, this.paths);
      this.transition('ArchivalConfigSaved');

      const routeFiles = await this.prepareTrafficArtifacts();
      this.transition('TrafficArtifactsPrepared');

      const { seeds, nodes } = await this.prepareNetworkArtifacts();
      this.transition('NetworkArtifactsPrepared');

      const { launch, keepScratch } = this.config.options;
      if (launch !== 'none') {
        await launchSimulator(launch, this.paths, this.deps.tools, this.logger);
        this.transition('SimulatorInvoked');
      }

      let removed: string[] = [];
      if (!keepScratch) {
        removed = await this.cleanScratch();
        this.transition('ScratchCleaned');
      }

      this.transition('Terminal');
      const durationMs = Date.now() - started;
      this.logger.info({ durationMs }, 'Scenario finished');

      return { scenarioId: this.spec.id, routeFiles, seeds, nodes, launched: launch, removed, durationMs };
    } catch (error) {
      const failedIn = this.currentState;
      this.currentState = 'Failed';
      reportError(this.logger, error, { state: failedIn });
      throw error;
    }
  }

  private transition(target: PipelineState): void {
    if (!VALID_TRANSITIONS[this.currentState].includes(target)) {
      throw new WorkflowError(
        `Cannot transition from ${this.currentState} to ${target}`,
        this.currentState,
        target
      );
    }
    this.logger.debug({ from: this.currentState, to: target }, 'Pipeline state');
    this.currentState = target;
  }

  private async ensureDirectories(): Promise<void> {
    const { paths } = this;
    await assertExists(paths.simulationRoot, 'Simulation folder');
    await assertExists(paths.sumoRoot, 'SUMO folder');
    await assertExists(paths.additionalDir, 'Additional files folder');
    await assertExists(paths.trafficDir, 'Traffic profile');
    await assertExists(paths.netFile, 'Net file');

    for (const dir of [
      paths.routesDir,
      paths.sumoConfigDir,
      paths.results.sumo,
      paths.results.omnet,
      paths.results.dave,
      paths.results.config,
    ]) {
      await ensureDir(dir);
    }
  }

  private async prepareTrafficArtifacts(): Promise<RouteArtifactSet> {
    const { paths, spec } = this;

    await emitAdditionalFile(paths.additionalFile, paths.results.edgeDump, this.resolver);
    await emitVehicleTypeFile(paths.vtypeTemplate, paths.vtypeFile, spec.reactionTime, {
      strict: this.config.options.strictVehicleTypes,
      logger: this.logger,
    });

    const generator = new DemandGenerator(spec, paths, this.logger);
    const demand: ClassDemand[] = [];
    for (const vehicleClass of VEHICLE_CLASSES) {
      demand.push(await this.demandFor(generator, vehicleClass));
    }

    const routes = new RouteStageOrchestrator(spec.id, paths, this.deps.tools, this.logger);
    const routeFiles = await routes.buildAll(demand, spec.obstruction ? { vtypeFile: paths.vtypeFile } : null);

    await emitTrafficSimConfig(
      paths.sumoConfigFile,
      {
        paths,
        routeFiles: routeFiles.map((artifact) => artifact.path),
        beginSeconds: BASE_START_SECONDS,
        durationSeconds: spec.durationSeconds,
        useTrafficLights: spec.useTrafficLights,
      },
      this.resolver
    );
    return routeFiles;
  }

  private async demandFor(generator: DemandGenerator, vehicleClass: VehicleClass): Promise<ClassDemand> {
    return { vehicleClass, matrices: await generator.generateForClass(vehicleClass) };
  }

  private async prepareNetworkArtifacts(): Promise<{ seeds: number[]; nodes: PlacedInfrastructureNode[] }> {
    const { paths, spec } = this;

    await emitServiceFile(spec.v2xRate, paths.servicesFile);

    const seeds = drawSeeds(spec.repeats, this.random);
    const nodes = await emitNetworkSimConfig(
      paths.networkConfigFile,
      {
        paths,
        durationSeconds: spec.durationSeconds,
        seeds,
        infrastructureConfig: paths.infrastructureConfig,
        netFile: paths.netFile,
      },
      this.transformer,
      this.resolver
    );
    return { seeds, nodes };
  }

  private async cleanScratch(): Promise<string[]> {
    const removed: string[] = [];
    for (const path of scratchPaths(this.paths)) {
      if (await removePath(path)) {
        removed.push(path);
      }
    }
    this.logger.debug({ removed: removed.length }, 'Scratch files removed');
    return removed;
  }
}
