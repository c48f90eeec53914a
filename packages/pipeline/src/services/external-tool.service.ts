import { spawn } from 'node:child_process';
import { ExternalToolError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

export interface ExitStatus {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
}

export interface RunOptions {
  cwd?: string;
}

/**
 * A command-line program the pipeline depends on (od2trips, duarouter, the
 * simulators). Resolves on exit code 0; anything else rejects with
 * ExternalToolError.
 */
export interface ExternalTool {
  readonly name: string;
  run(args: readonly string[], options?: RunOptions): Promise<ExitStatus>;
}

export interface ProcessToolOptions {
  /** Kill the child with SIGTERM after this many milliseconds. */
  timeoutMs: number;
  /** SIGKILL follows when the child is still running this long after SIGTERM (default 5 s). */
  killGraceMs?: number;
  logger: Logger;
  /** Forward the child's output to this process (default: inherit). */
  stdio?: 'inherit' | 'ignore';
}

const DEFAULT_KILL_GRACE_MS = 5000;

/**
 * Runs a binary as a child process and waits for it to exit.
 */
export class ProcessTool implements ExternalTool {
  constructor(
    public readonly name: string,
    private readonly command: string,
    private readonly options: ProcessToolOptions
  ) {}

  run(args: readonly string[], runOptions: RunOptions = {}): Promise<ExitStatus> {
    const { logger, timeoutMs } = this.options;
    const started = Date.now();
    logger.info({ tool: this.name, command: [this.command, ...args].join(' '), cwd: runOptions.cwd }, 'Running tool');

    return new Promise<ExitStatus>((resolve, reject) => {
      const child = spawn(this.command, [...args], {
        cwd: runOptions.cwd,
        stdio: this.options.stdio ?? 'inherit',
      });

      let timedOut = false;
      let killTimer: NodeJS.Timeout | undefined;
      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          logger.warn({ tool: this.name, pid: child.pid }, 'Tool ignored SIGTERM, sending SIGKILL');
          child.kill('SIGKILL');
        }, this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
      }, timeoutMs);

      child.on('error', (error) => {
        clearTimeout(timer);
        clearTimeout(killTimer);
        reject(new ExternalToolError(this.name, args, `could not be started (${error.message})`));
      });

      child.on('exit', (code, signal) => {
        clearTimeout(timer);
        clearTimeout(killTimer);
        const durationMs = Date.now() - started;
        logger.debug({ tool: this.name, exitCode: code, signal, durationMs }, 'Tool finished');

        if (timedOut) {
          reject(new ExternalToolError(this.name, args, `timed out after ${timeoutMs} ms`, code, signal));
        } else if (code === 0) {
          resolve({ exitCode: code, signal, durationMs });
        } else {
          const reason = signal ? `terminated by ${signal}` : `exit code ${String(code)}`;
          reject(new ExternalToolError(this.name, args, reason, code, signal));
        }
      });
    });
  }
}

export interface Toolchain {
  od2trips: ExternalTool;
  duarouter: ExternalTool;
  trafficSimulator: ExternalTool;
  networkSimulator: ExternalTool;
}

export interface ToolchainBinaries {
  od2trips: string;
  duarouter: string;
  sumo: string;
  arteryRunner: string;
}

export function createToolchain(binaries: ToolchainBinaries, options: ProcessToolOptions): Toolchain {
  return {
    od2trips: new ProcessTool('od2trips', binaries.od2trips, options),
    duarouter: new ProcessTool('duarouter', binaries.duarouter, options),
    trafficSimulator: new ProcessTool('sumo', binaries.sumo, options),
    networkSimulator: new ProcessTool('artery', binaries.arteryRunner, options),
  };
}
