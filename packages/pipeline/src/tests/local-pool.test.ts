import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { silentLogger } from '../lib/logger.js';
import { LocalProcessPool } from '../jobs/local-pool.js';
import type { PipelineOptions } from '../types/index.js';
import { createTestContext, mockData, writeFixture } from './setup.js';

const OPTIONS: PipelineOptions = { launch: 'none', keepScratch: false, strictVehicleTypes: false };

// Answers every request; scenario "crash" exits mid-run
const ECHO_CHILD = `
process.on('message', (request) => {
  const id = request.row.scenario_id;
  if (id === 'crash') {
    setTimeout(() => process.exit(3), 50);
    return;
  }
  process.send({ type: 'outcome', outcome: { scenarioId: id, ok: true, durationMs: 1 } });
});
process.on('disconnect', () => process.exit(0));
process.send({ type: 'ready' });
`;

const FAILING_CHILD = `process.exit(1);\n`;

describe('LocalProcessPool', () => {
  const ctx = createTestContext();
  let pool: LocalProcessPool | undefined;

  beforeEach(async () => {
    await ctx.setup();
  });

  afterEach(async () => {
    await pool?.close();
    pool = undefined;
    await ctx.teardown();
  });

  async function createPool(source: string, size = 2): Promise<LocalProcessPool> {
    const childModule = join(ctx.getDir(), 'child.mjs');
    await writeFixture(childModule, source);
    pool = new LocalProcessPool({
      size,
      simulationRoot: '/sim',
      resultsDir: '../results',
      logger: silentLogger(),
      childModule,
    });
    return pool;
  }

  it('rejects a non-positive size', () => {
    expect(
      () => new LocalProcessPool({ size: 0, simulationRoot: '/sim', resultsDir: 'r', logger: silentLogger() })
    ).toThrow('Pool size must be a positive integer, got 0');
  });

  it('runs more scenarios than workers', async () => {
    const workers = await createPool(ECHO_CHILD, 2);
    const outcomes = await Promise.all(
      ['s1', 's2', 's3'].map((id) => workers.dispatch(mockData.scenario({ id }), OPTIONS))
    );

    expect(outcomes.map((outcome) => outcome.scenarioId)).toEqual(['s1', 's2', 's3']);
    expect(outcomes.every((outcome) => outcome.ok)).toBe(true);
  });

  it('fails only the scenario whose worker died', async () => {
    const workers = await createPool(ECHO_CHILD, 1);
    const crashed = await workers.dispatch(mockData.scenario({ id: 'crash' }), OPTIONS);

    expect(crashed).toMatchObject({
      scenarioId: 'crash',
      ok: false,
      error: { name: 'Worker Crash', message: 'Worker process exited (code 3)' },
    });

    const next = await workers.dispatch(mockData.scenario({ id: 's2' }), OPTIONS);
    expect(next.ok).toBe(true);
  });

  it('stops spawning when workers die on start', async () => {
    const workers = await createPool(FAILING_CHILD, 1);

    const first = await workers.dispatch(mockData.scenario({ id: 's1' }), OPTIONS);
    expect(first.error?.message).toBe('Worker process exited (code 1)');

    const second = await workers.dispatch(mockData.scenario({ id: 's2' }), OPTIONS);
    expect(second.error?.message).toBe('Worker process exited (code 1) before it was ready');
  });

  it('refuses work once closed', async () => {
    const workers = await createPool(ECHO_CHILD, 1);
    await workers.close();
    await expect(workers.dispatch(mockData.scenario(), OPTIONS)).rejects.toThrow('Pool is closed');
  });
});
