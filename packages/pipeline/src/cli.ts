#!/usr/bin/env node
import 'dotenv/config';
import { resolve } from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { LocalProcessPool, QueueDispatcher, serveScenarioQueue } from './jobs/index.js';
import { validateToolchainConfig } from './lib/config/toolchain.js';
import { reportError } from './lib/error-handler.js';
import { createLogger } from './lib/logger.js';
import type { Logger } from './lib/logger.js';
import { loadBatch } from './services/batch-loader.service.js';
import { ScenarioSetOrchestrator, batchExitCode } from './services/scenario-set.service.js';
import type { BatchReport, ScenarioDispatcher } from './services/scenario-set.service.js';
import { toolchainFromConfig } from './services/scenario-runner.service.js';
import type { LaunchMode } from './types/index.js';

const LAUNCH_MODES: readonly LaunchMode[] = ['none', 'traffic', 'network'];

interface RunArgs {
  config: string;
  root?: string;
  results?: string;
  launch: LaunchMode;
  keepScratch: boolean;
  strictVtypes?: boolean;
  poolSize?: number;
  queue: boolean;
}

function parseLaunchMode(value: string): LaunchMode {
  const mode = LAUNCH_MODES.find((m) => m === value);
  if (!mode) {
    throw new Error(`Unknown launch mode '${value}' (expected ${LAUNCH_MODES.join(', ')})`);
  }
  return mode;
}

async function runBatchCommand(args: RunArgs, logger: Logger): Promise<number> {
  const config = validateToolchainConfig();
  const simulationRoot = resolve(args.root ?? config.simulationRoot);
  const resultsDir = args.results ?? config.resultsDir;

  // The whole batch is validated before anything runs
  const scenarios = await loadBatch(args.config);

  const dispatcher: ScenarioDispatcher = args.queue
    ? new QueueDispatcher({ simulationRoot, resultsDir, logger })
    : new LocalProcessPool({ size: args.poolSize ?? config.poolSize, simulationRoot, resultsDir, logger });

  const orchestrator = new ScenarioSetOrchestrator(dispatcher, logger);
  let report: BatchReport;
  try {
    report = await orchestrator.runBatch(scenarios, {
      launch: args.launch,
      keepScratch: args.keepScratch,
      strictVehicleTypes: args.strictVtypes ?? config.strictVehicleTypes,
    });
  } finally {
    await dispatcher.close();
  }

  for (const failure of report.failed) {
    logger.error({ scenarioId: failure.scenarioId }, failure.message);
  }
  logger.info(`${report.succeeded}/${report.total} scenarios succeeded in ${(report.durationMs / 1000).toFixed(1)} s`);
  return batchExitCode(report);
}

async function main(): Promise<void> {
  const logger = createLogger();

  await yargs(hideBin(process.argv))
    .scriptName('cosim')
    .command(
      'run',
      'Compile and run every scenario of a batch file',
      (cmd) =>
        cmd
          .option('config', {
            alias: 'c',
            type: 'string',
            demandOption: true,
            describe: 'Batch file (;-separated, one scenario per row)',
          })
          .option('root', { type: 'string', describe: 'Simulation root folder' })
          .option('results', { type: 'string', describe: 'Results folder, relative to the simulation root' })
          .option('launch', {
            type: 'string',
            choices: LAUNCH_MODES,
            default: 'network',
            describe: 'Simulator to start after compiling',
          })
          .option('keep-scratch', { type: 'boolean', default: false, describe: 'Keep generated scratch files' })
          .option('strict-vtypes', { type: 'boolean', describe: 'Fail when the vtype template has no tau marker' })
          .option('pool-size', { type: 'number', describe: 'Worker processes (default: available CPUs)' })
          .option('queue', { type: 'boolean', default: false, describe: 'Dispatch through the Redis job queue' }),
      async (argv) => {
        process.exitCode = await runBatchCommand(
          {
            config: argv.config,
            root: argv.root,
            results: argv.results,
            launch: parseLaunchMode(argv.launch),
            keepScratch: argv.keepScratch,
            strictVtypes: argv.strictVtypes,
            poolSize: argv.poolSize,
            queue: argv.queue,
          },
          logger
        );
      }
    )
    .command(
      'worker',
      'Process queued scenarios until interrupted',
      (cmd) => cmd.option('concurrency', { type: 'number', describe: 'Scenarios run at the same time' }),
      (argv) => {
        const config = validateToolchainConfig();
        serveScenarioQueue({
          concurrency: argv.concurrency ?? config.poolSize,
          tools: toolchainFromConfig(config, logger),
          logger,
        });
      }
    )
    .demandCommand(1)
    .strict()
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  const report = reportError(createLogger(), error);
  process.exit(report.exitCode);
});
