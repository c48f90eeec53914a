import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ArtifactNotFoundError, InvalidScenarioError, WorkflowError } from '../lib/errors.js';
import { pathExists } from '../lib/files.js';
import { silentLogger } from '../lib/logger.js';
import { ScenarioPipeline, scratchPaths } from '../services/scenario-pipeline.service.js';
import type { ScenarioPipelineConfig } from '../services/scenario-pipeline.service.js';
import type { PipelineOptions, ScenarioSpec } from '../types/index.js';
import { FakeTool, createFakeToolchain, createSimulationFixture, createTestContext, mockData } from './setup.js';
import type { FakeToolchain, SimulationFixture } from './setup.js';

describe('ScenarioPipeline', () => {
  const ctx = createTestContext();
  let fixture: SimulationFixture;
  let tools: FakeToolchain;

  beforeEach(async () => {
    fixture = await createSimulationFixture(await ctx.setup());
    tools = createFakeToolchain();
  });

  afterEach(async () => {
    await ctx.teardown();
  });

  function pipeline(spec: ScenarioSpec, options: Partial<PipelineOptions> = {}) {
    const config: ScenarioPipelineConfig = {
      simulationRoot: fixture.simulationRoot,
      resultsDir: fixture.resultsDir,
      options: { launch: 'none', keepScratch: false, strictVehicleTypes: false, ...options },
    };
    return new ScenarioPipeline(spec, config, { tools, logger: silentLogger(), random: () => 0 });
  }

  it('prepares, cleans up and keeps the archive', async () => {
    const run = pipeline(mockData.scenario());
    const summary = await run.run();

    expect(run.state).toBe('Terminal');
    expect(summary.scenarioId).toBe('s1');
    expect(summary.launched).toBe('none');
    expect(summary.seeds).toEqual([1, 2]);
    expect(summary.routeFiles.map((route) => route.source)).toEqual(['miv', 'sv']);
    expect(summary.removed).toEqual(scratchPaths(run.paths));

    for (const path of scratchPaths(run.paths)) {
      expect(await pathExists(path)).toBe(false);
    }
    expect(await pathExists(run.paths.vtypeTemplate)).toBe(true);

    const archived = await readFile(join(fixture.root, 'results', 's1', 'config', 'sim_config.csv'), 'utf8');
    expect(archived).toBe(
      'scenario_id;network;traffic;obstruction;duration;congestion_sequence;v2x_rate;tau;repeats;traffic_lights\n' +
        's1;test.net.xml;weekday;0;7200;ab;0.25;1.5;2;1\n'
    );
    expect(await pathExists(join(fixture.root, 'results', 's1', 'config', 'rsu_config.csv'))).toBe(true);
    expect(await pathExists(join(fixture.root, 'results', 's1', 'config', 'detector_config.csv'))).toBe(true);
    expect(await pathExists(join(fixture.root, 'results', 's1', 'omnet'))).toBe(true);
  });

  it('places the roadside units', async () => {
    const summary = await pipeline(mockData.scenario()).run();

    expect(summary.nodes).toHaveLength(1);
    expect(summary.nodes[0]?.id).toBe('rsu_a');
    expect(summary.nodes[0]?.x).toBeCloseTo(1000, 3);
    expect(summary.nodes[0]?.y).toBeCloseTo(500, 3);
  });

  it('keeps scratch files on request', async () => {
    const run = pipeline(mockData.scenario(), { keepScratch: true });
    const summary = await run.run();

    expect(summary.removed).toEqual([]);
    expect(await pathExists(join(run.paths.routesDir, 's1_odm_miv_0_qsv_a.od'))).toBe(true);
    expect(await pathExists(join(run.paths.routesDir, 's1_odm_sv_1_qsv_b.od'))).toBe(true);

    const ini = await readFile(run.paths.networkConfigFile, 'utf8');
    expect(ini).toContain('seed-1-mt = ${seed=1, 2}\n');
    expect(ini).toContain('*.rsu[0].mobility.initialX = 1000.00m\n');
    expect(ini).toContain('*.rsu[0].middleware.RsuCALog.outputDirectory = "../results/s1/omnet/rsu_a_"\n');

    const vtypes = await readFile(run.paths.vtypeFile, 'utf8');
    expect(vtypes.match(/tau="1\.5"/g)).toHaveLength(2);

    const services = await readFile(run.paths.servicesFile, 'utf8');
    expect(services).toContain('rate="0.2500"');
    expect(await pathExists(run.paths.sumoConfigFile)).toBe(true);
    expect(await pathExists(run.paths.additionalFile)).toBe(true);
  });

  it('routes the obstruction vehicle when requested', async () => {
    const summary = await pipeline(mockData.scenario({ obstruction: true })).run();

    expect(summary.routeFiles.map((route) => route.kind)).toEqual(['trips', 'trips', 'obstruction']);
    expect(tools.duarouter.calls).toHaveLength(1);
  });

  it('does not touch the simulators without a launch mode', async () => {
    await pipeline(mockData.scenario()).run();

    expect(tools.od2trips.calls).toHaveLength(2);
    expect(tools.trafficSimulator.calls).toHaveLength(0);
    expect(tools.networkSimulator.calls).toHaveLength(0);
  });

  it('launches the coupled simulation from the simulation root', async () => {
    const run = pipeline(mockData.scenario(), { launch: 'network' });
    await run.run();

    expect(tools.networkSimulator.calls).toEqual([
      { args: ['-u', 'Cmdenv', '-f', 's1_omnetpp.ini'], cwd: run.paths.simulationRoot },
    ]);
    expect(tools.trafficSimulator.calls).toHaveLength(0);
  });

  it('launches the traffic simulator on its own', async () => {
    const run = pipeline(mockData.scenario(), { launch: 'traffic' });
    await run.run();

    expect(tools.trafficSimulator.calls).toEqual([
      { args: ['-c', run.paths.sumoConfigFile, '-X', 'never'], cwd: undefined },
    ]);
  });

  it('writes nothing for an unknown congestion level', async () => {
    const run = pipeline(mockData.scenario({ congestionSequence: ['a', '?'] }));

    await expect(run.run()).rejects.toThrow(InvalidScenarioError);
    expect(run.state).toBe('Failed');
    expect(await pathExists(run.paths.routesDir)).toBe(false);
    expect(await pathExists(join(fixture.root, 'results'))).toBe(false);
  });

  it('fails before writing when the network is missing', async () => {
    const run = pipeline(mockData.scenario({ network: 'missing.net.xml' }));

    await expect(run.run()).rejects.toThrow(ArtifactNotFoundError);
    expect(run.state).toBe('Failed');
    expect(await pathExists(join(fixture.root, 'results'))).toBe(false);
  });

  it('stops on a failing simulator and keeps the scratch files', async () => {
    tools = createFakeToolchain({ networkSimulator: new FakeTool('artery', { exitCode: 2 }) });
    const run = pipeline(mockData.scenario(), { launch: 'network' });

    await expect(run.run()).rejects.toMatchObject({ name: 'ExternalToolError', toolExitCode: 2 });
    expect(run.state).toBe('Failed');
    expect(await pathExists(run.paths.networkConfigFile)).toBe(true);
  });

  it('runs once', async () => {
    const run = pipeline(mockData.scenario());
    await run.run();

    await expect(run.run()).rejects.toThrow(WorkflowError);
    expect(run.state).toBe('Terminal');
  });
});
