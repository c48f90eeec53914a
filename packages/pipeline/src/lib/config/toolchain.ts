import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { ToolchainEnvironmentError } from '../errors.js';

export interface ToolchainConfig {
  /** Root of the SUMO installation (`SUMO_HOME`). */
  sumoHome: string;
  simulationRoot: string;
  resultsDir: string;
  poolSize: number;
  toolTimeoutMs: number;
  strictVehicleTypes: boolean;
  binaries: {
    od2trips: string;
    duarouter: string;
    sumo: string;
    arteryRunner: string;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  SUMO_HOME: z.string().min(1).optional(),
  COSIM_SIMULATION_ROOT: z.string().min(1).default('./scenarios/default'),
  COSIM_RESULTS_DIR: z.string().min(1).default('../results'),
  COSIM_POOL_SIZE: z.coerce.number().int().positive().optional(),
  COSIM_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  COSIM_VTYPE_STRICT: booleanFlag.default('false'),
  COSIM_OD2TRIPS_BIN: z.string().min(1).default('od2trips'),
  COSIM_DUAROUTER_BIN: z.string().min(1).default('duarouter'),
  COSIM_SUMO_BIN: z.string().min(1).default('sumo'),
  COSIM_ARTERY_RUNNER: z.string().min(1).default('../../build/run_artery.sh'),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),
});

let cachedConfig: ToolchainConfig | undefined;

/** Empty strings in a .env file mean "unset". */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Validate the process environment once. A missing `SUMO_HOME` aborts the
 * whole batch before any scenario is compiled.
 */
export function validateToolchainConfig(env: NodeJS.ProcessEnv = process.env): ToolchainConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ToolchainEnvironmentError(`Invalid environment configuration:\n${issues.join('\n')}`);
  }

  const vars = parsed.data;
  if (!vars.SUMO_HOME) {
    throw new ToolchainEnvironmentError("please declare environment variable 'SUMO_HOME'");
  }

  const config: ToolchainConfig = {
    sumoHome: vars.SUMO_HOME,
    simulationRoot: vars.COSIM_SIMULATION_ROOT,
    resultsDir: vars.COSIM_RESULTS_DIR,
    poolSize: vars.COSIM_POOL_SIZE ?? availableParallelism(),
    toolTimeoutMs: vars.COSIM_TOOL_TIMEOUT_MS,
    strictVehicleTypes: vars.COSIM_VTYPE_STRICT,
    binaries: {
      od2trips: vars.COSIM_OD2TRIPS_BIN,
      duarouter: vars.COSIM_DUAROUTER_BIN,
      sumo: vars.COSIM_SUMO_BIN,
      arteryRunner: vars.COSIM_ARTERY_RUNNER,
    },
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      password: vars.REDIS_PASSWORD,
      db: vars.REDIS_DB,
    },
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetToolchainConfigCache(): void {
  cachedConfig = undefined;
}
