import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ScenarioRunJobData } from '../jobs/queue.js';

vi.mock('../jobs/queue.js', () => ({
  enqueueScenarioRun: vi.fn(async (data: ScenarioRunJobData, jobId: string) => ({
    id: jobId,
    waitUntilFinished: async () => ({ scenarioId: data.row.scenario_id, ok: true, durationMs: 3 }),
  })),
  getScenarioRunEvents: vi.fn(() => ({})),
  closeQueues: vi.fn(async () => undefined),
}));

import { closeQueues, enqueueScenarioRun } from '../jobs/queue.js';
import { QueueDispatcher, scenarioJobId } from '../jobs/queue-dispatcher.js';
import { silentLogger } from '../lib/logger.js';
import type { PipelineOptions } from '../types/index.js';
import { mockData } from './setup.js';

const OPTIONS: PipelineOptions = { launch: 'network', keepScratch: false, strictVehicleTypes: true };

describe('QueueDispatcher', () => {
  beforeEach(() => {
    vi.mocked(enqueueScenarioRun).mockClear();
  });

  it('builds job ids without a colon', () => {
    expect(scenarioJobId('batch', 'city_v2x.10-a')).toBe('batch-city_v2x.10-a');
  });

  it('enqueues one job per scenario with a batch-scoped id', async () => {
    const dispatcher = new QueueDispatcher({ simulationRoot: '/sim', resultsDir: '../results', logger: silentLogger() });

    const first = await dispatcher.dispatch(mockData.scenario({ id: 's1' }), OPTIONS);
    await dispatcher.dispatch(mockData.scenario({ id: 's2' }), OPTIONS);

    expect(first).toEqual({ scenarioId: 's1', ok: true, durationMs: 3 });

    const calls = vi.mocked(enqueueScenarioRun).mock.calls;
    expect(calls).toHaveLength(2);

    const [data, jobId] = calls[0] ?? [];
    expect(jobId).toMatch(/^[0-9a-f-]{36}-s1$/);
    expect(jobId).not.toContain(':');
    expect(calls[1]?.[1]).toBe(jobId?.replace(/s1$/, 's2'));

    expect(data?.rowNumber).toBe(2);
    expect(data?.row.scenario_id).toBe('s1');
    expect(data?.settings).toEqual({ simulationRoot: '/sim', resultsDir: '../results', options: OPTIONS });
    expect(calls[1]?.[0].rowNumber).toBe(3);
  });

  it('closes the queue connections', async () => {
    const dispatcher = new QueueDispatcher({ simulationRoot: '/sim', resultsDir: '../results', logger: silentLogger() });
    await dispatcher.close();
    expect(closeQueues).toHaveBeenCalledTimes(1);
  });
});
