import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { ConfigSchemaError, ExternalToolError, InvalidScenarioError } from '../lib/errors.js';
import { parseDelimited } from '../lib/delimited.js';
import { silentLogger } from '../lib/logger.js';
import { BATCH_COLUMNS, toBatchRow, toScenarioSpec } from '../schemas/scenario.schema.js';
import { loadBatch, toScenarioSpecs } from '../services/batch-loader.service.js';
import { ScenarioSetOrchestrator, batchExitCode } from '../services/scenario-set.service.js';
import type { ScenarioDispatcher } from '../services/scenario-set.service.js';
import { executeRunRequest } from '../jobs/processors/scenario-run.processor.js';
import type { PipelineOptions, ScenarioOutcome, ScenarioSpec } from '../types/index.js';
import { createFakeToolchain, createSimulationFixture, createTestContext, mockData, writeFixture } from './setup.js';

const HEADER = BATCH_COLUMNS.join(';');

function row(overrides: Partial<Record<(typeof BATCH_COLUMNS)[number], string>> = {}) {
  return { ...toBatchRow(mockData.scenario()), ...overrides };
}

const OPTIONS: PipelineOptions = { launch: 'none', keepScratch: false, strictVehicleTypes: false };

describe('Batch rows', () => {
  it('coerces a row into a scenario', () => {
    const spec = toScenarioSpec(
      row({ v2x_rate: '0,5', tau: '1.2', obstruction: 'true', traffic_lights: '0', congestion_sequence: 'ab3' }),
      2
    );

    expect(spec).toEqual({
      id: 's1',
      network: 'test.net.xml',
      trafficProfile: 'weekday',
      obstruction: true,
      durationSeconds: 7200,
      congestionSequence: ['a', 'b', '3'],
      v2xRate: 0.5,
      reactionTime: 1.2,
      repeats: 2,
      useTrafficLights: false,
    });
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('round-trips through toBatchRow', () => {
    const spec = mockData.scenario();
    expect(toScenarioSpec(toBatchRow(spec), 2)).toEqual(spec);
  });

  it('names the row and field of a bad value', () => {
    expect(() => toScenarioSpec(row({ v2x_rate: '1,5' }), 3)).toThrow(
      "Row 3: value for 'v2x_rate' is invalid: Must be between 0 and 1"
    );

    try {
      toScenarioSpec(row({ duration: 'ten' }), 4);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidScenarioError);
      expect(error).toMatchObject({ field: 'duration', actual: 'ten' });
    }
  });

  it('rejects flags other than 0, 1, true and false', () => {
    expect(() => toScenarioSpec(row({ obstruction: 'yes' }), 2)).toThrow(InvalidScenarioError);
  });

  it('rejects ids that cannot name files', () => {
    expect(() => toScenarioSpec(row({ scenario_id: 'a/b' }), 2)).toThrow(InvalidScenarioError);
  });

  it('rejects duplicate ids', () => {
    const table = parseDelimited(
      [HEADER, 's1;n.net.xml;weekday;0;3600;a;0.5;1;1;1', 's1;n.net.xml;weekday;0;3600;b;0.5;1;1;1'].join('\n'),
      'batch.csv'
    );
    expect(() => toScenarioSpecs(table)).toThrow("Row 3: scenario id 's1' is used more than once");
  });
});

describe('loadBatch', () => {
  const ctx = createTestContext();

  beforeEach(async () => {
    await ctx.setup();
  });

  afterEach(async () => {
    await ctx.teardown();
  });

  it('reads every scenario in file order', async () => {
    const path = join(ctx.getDir(), 'sim_config.csv');
    await writeFixture(
      path,
      `${HEADER}\ns1;n.net.xml;weekday;0;3600;a;0.5;1;1;1\n\ns2;n.net.xml;weekday;1;1800;zz;0,1;0,8;3;0\n`
    );

    const specs = await loadBatch(path);
    expect(specs.map((spec) => spec.id)).toEqual(['s1', 's2']);
    expect(specs[1]?.congestionSequence).toEqual(['z', 'z']);
    expect(specs[1]?.reactionTime).toBe(0.8);
  });

  it('rejects a header that does not match', async () => {
    const path = join(ctx.getDir(), 'sim_config.csv');
    await writeFixture(path, 'scenario_id;network\ns1;n.net.xml\n');
    await expect(loadBatch(path)).rejects.toThrow(ConfigSchemaError);
  });
});

// ─── Batch orchestration ─────────────────────────────────────────────────────

class FakeDispatcher implements ScenarioDispatcher {
  readonly dispatched: string[] = [];
  close = vi.fn(async () => undefined);

  constructor(private readonly behaviour: (spec: ScenarioSpec) => Promise<ScenarioOutcome>) {}

  dispatch(spec: ScenarioSpec): Promise<ScenarioOutcome> {
    this.dispatched.push(spec.id);
    return this.behaviour(spec);
  }
}

describe('ScenarioSetOrchestrator', () => {
  const specs = ['s1', 's2', 's3'].map((id) => mockData.scenario({ id }));

  it('reports every scenario', async () => {
    const dispatcher = new FakeDispatcher(async (spec) => ({ scenarioId: spec.id, ok: true, durationMs: 5 }));
    const report = await new ScenarioSetOrchestrator(dispatcher, silentLogger()).runBatch(specs, OPTIONS);

    expect(dispatcher.dispatched).toEqual(['s1', 's2', 's3']);
    expect(report.total).toBe(3);
    expect(report.succeeded).toBe(3);
    expect(report.failed).toEqual([]);
    expect(batchExitCode(report)).toBe(0);
  });

  it('keeps going when a scenario fails', async () => {
    const dispatcher = new FakeDispatcher(async (spec) =>
      spec.id === 's2'
        ? { scenarioId: spec.id, ok: false, durationMs: 1, error: { name: 'Invalid Scenario', message: 'bad row' } }
        : { scenarioId: spec.id, ok: true, durationMs: 1 }
    );
    const report = await new ScenarioSetOrchestrator(dispatcher, silentLogger()).runBatch(specs, OPTIONS);

    expect(report.succeeded).toBe(2);
    expect(report.failed).toEqual([{ scenarioId: 's2', message: 'bad row' }]);
    expect(batchExitCode(report)).toBe(1);
  });

  it('turns a broken dispatch into a failed outcome', async () => {
    const dispatcher = new FakeDispatcher(async (spec) => {
      if (spec.id === 's3') throw new ExternalToolError('artery', [], 'exit code 1', 1);
      return { scenarioId: spec.id, ok: true, durationMs: 1 };
    });
    const report = await new ScenarioSetOrchestrator(dispatcher, silentLogger()).runBatch(specs, OPTIONS);

    const failed = report.outcomes.find((outcome) => outcome.scenarioId === 's3');
    expect(failed?.ok).toBe(false);
    expect(failed?.error?.name).toBe('External Tool Error');
    expect(report.failed).toHaveLength(1);
  });
});

// ─── Run requests ────────────────────────────────────────────────────────────

describe('executeRunRequest', () => {
  const ctx = createTestContext();

  beforeEach(async () => {
    await ctx.setup();
  });

  afterEach(async () => {
    await ctx.teardown();
  });

  it('runs a valid request', async () => {
    const fixture = await createSimulationFixture(ctx.getDir());
    const outcome = await executeRunRequest(
      {
        row: row(),
        rowNumber: 2,
        settings: { simulationRoot: fixture.simulationRoot, resultsDir: fixture.resultsDir, options: OPTIONS },
      },
      { tools: createFakeToolchain(), logger: silentLogger() }
    );

    expect(outcome.scenarioId).toBe('s1');
    expect(outcome.ok).toBe(true);
    expect(outcome.error).toBeUndefined();
  });

  it('reports a pipeline failure', async () => {
    const outcome = await executeRunRequest(
      {
        row: row(),
        rowNumber: 2,
        settings: { simulationRoot: join(ctx.getDir(), 'nowhere'), resultsDir: '../results', options: OPTIONS },
      },
      { tools: createFakeToolchain(), logger: silentLogger() }
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.error?.name).toBe('Artifact Not Found');
  });

  it('reports an invalid row against its scenario', async () => {
    const outcome = await executeRunRequest(
      { row: row({ repeats: '0' }), rowNumber: 5, settings: { simulationRoot: '/sim', resultsDir: 'r', options: OPTIONS } },
      { tools: createFakeToolchain(), logger: silentLogger() }
    );

    expect(outcome).toMatchObject({ scenarioId: 's1', ok: false, error: { name: 'Invalid Scenario' } });
    expect(outcome.error?.message).toContain('Row 5');
  });

  it('reports a payload that does not parse', async () => {
    const outcome = await executeRunRequest({ row: {} }, { tools: createFakeToolchain(), logger: silentLogger() });

    expect(outcome).toEqual({
      scenarioId: 'unknown',
      ok: false,
      durationMs: 0,
      error: { name: 'Validation Error', message: 'Input validation failed' },
    });
  });
});
