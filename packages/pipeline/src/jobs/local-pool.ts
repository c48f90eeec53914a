import { fork } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from '../lib/logger.js';
import { toBatchRow } from '../schemas/scenario.schema.js';
import type { ScenarioDispatcher } from '../services/scenario-set.service.js';
import type { PipelineOptions, ScenarioOutcome, ScenarioSpec } from '../types/index.js';
import { ChildMessageSchema } from './messages.js';
import type { ScenarioRunRequest } from './messages.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LocalProcessPoolOptions {
  size: number;
  simulationRoot: string;
  resultsDir: string;
  logger: Logger;
  /** Module run in each child; defaults to scenario-child next to this file */
  childModule?: string;
}

interface Task {
  request: ScenarioRunRequest;
  started: number;
  resolve: (outcome: ScenarioOutcome) => void;
}

interface PoolWorker {
  child: ChildProcess;
  task: Task | null;
  /** Set once the child has loaded and validated its environment */
  ready: boolean;
}

/** The child has the same extension as this module: .ts under tsx, .js when built. */
export function defaultChildModule(): string {
  const ext = extname(fileURLToPath(import.meta.url));
  return fileURLToPath(new URL(`./scenario-child${ext}`, import.meta.url));
}

function crashOutcome(task: Task, message: string): ScenarioOutcome {
  return {
    scenarioId: task.request.row.scenario_id,
    ok: false,
    durationMs: Date.now() - task.started,
    error: { name: 'Worker Crash', message },
  };
}

// ─── Pool ────────────────────────────────────────────────────────────────────

/**
 * Fixed-size pool of forked worker processes, each running one scenario at a
 * time. A worker that dies fails only its own scenario and is replaced.
 */
export class LocalProcessPool implements ScenarioDispatcher {
  private readonly workers: PoolWorker[] = [];
  private readonly pending: Task[] = [];
  private readonly childModule: string;
  private rowNumber = 1;
  private closing = false;
  /** Set when a child dies before it is ready; respawning would loop */
  private brokenReason: string | null = null;

  constructor(private readonly options: LocalProcessPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.childModule = options.childModule ?? defaultChildModule();
  }

  get size(): number {
    return this.options.size;
  }

  dispatch(spec: ScenarioSpec, pipelineOptions: PipelineOptions): Promise<ScenarioOutcome> {
    if (this.closing) {
      return Promise.reject(new Error('Pool is closed'));
    }
    this.rowNumber += 1;
    const request: ScenarioRunRequest = {
      row: toBatchRow(spec),
      rowNumber: this.rowNumber,
      settings: {
        simulationRoot: this.options.simulationRoot,
        resultsDir: this.options.resultsDir,
        options: pipelineOptions,
      },
    };
    return new Promise<ScenarioOutcome>((resolve) => {
      const task: Task = { request, started: Date.now(), resolve };
      if (this.brokenReason !== null) {
        resolve(crashOutcome(task, this.brokenReason));
        return;
      }
      this.pending.push(task);
      this.pump();
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    const exits = this.workers.map(
      (worker) =>
        new Promise<void>((resolve) => {
          if (worker.child.exitCode !== null || worker.child.signalCode !== null) {
            resolve();
            return;
          }
          worker.child.once('exit', () => resolve());
          if (worker.child.connected) {
            worker.child.disconnect();
          } else {
            worker.child.kill('SIGTERM');
          }
        })
    );
    await Promise.all(exits);
    this.workers.length = 0;
  }

  private pump(): void {
    while (this.pending.length > 0) {
      let worker = this.workers.find((w) => w.task === null);
      if (!worker && this.workers.length < this.options.size) {
        worker = this.spawnWorker();
      }
      if (!worker) return;

      const task = this.pending.shift();
      if (!task) return;
      worker.task = task;
      worker.child.send(task.request);
    }
  }

  private spawnWorker(): PoolWorker {
    const child = fork(this.childModule, [], { stdio: 'inherit' });
    const worker: PoolWorker = { child, task: null, ready: false };
    this.workers.push(worker);
    this.options.logger.debug({ pid: child.pid }, 'Pool worker started');

    child.on('message', (payload: unknown) => {
      const parsed = ChildMessageSchema.safeParse(payload);
      if (!parsed.success) {
        this.options.logger.warn({ pid: child.pid }, 'Ignoring malformed message from pool worker');
        return;
      }
      if (parsed.data.type === 'ready') {
        worker.ready = true;
      } else if (worker.task) {
        const { resolve } = worker.task;
        worker.task = null;
        resolve(parsed.data.outcome);
        this.pump();
      }
    });

    // IPC writes to a child that is already exiting fail here; the exit handler settles its task
    child.on('error', (error) => {
      this.options.logger.warn({ pid: child.pid, err: error }, 'Pool worker channel error');
    });

    child.on('exit', (code, signal) => {
      this.removeWorker(worker);
      const task = worker.task;
      worker.task = null;
      const reason = `Worker process exited (${signal ?? `code ${String(code)}`})`;
      if (task) {
        this.options.logger.error(
          { pid: child.pid, code, signal, scenarioId: task.request.row.scenario_id },
          'Pool worker died during a scenario'
        );
        task.resolve(crashOutcome(task, reason));
      }
      if (!worker.ready && !this.closing) {
        const brokenReason = `${reason} before it was ready`;
        this.brokenReason = brokenReason;
        this.options.logger.error({ pid: child.pid, code, signal }, 'Pool worker failed to start');
        for (const waiting of this.pending.splice(0)) {
          waiting.resolve(crashOutcome(waiting, brokenReason));
        }
        return;
      }
      if (!this.closing) {
        this.pump();
      }
    });

    return worker;
  }

  private removeWorker(worker: PoolWorker): void {
    const index = this.workers.indexOf(worker);
    if (index >= 0) {
      this.workers.splice(index, 1);
    }
  }
}
