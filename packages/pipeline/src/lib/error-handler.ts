import { ZodError } from 'zod';
import type { Logger } from './logger.js';
import {
  ConfigSchemaError,
  InvalidScenarioError,
  ArtifactNotFoundError,
  ExternalToolError,
  ProjectionError,
  ToolchainEnvironmentError,
  WorkflowError,
} from './errors.js';

export interface ErrorReport {
  error: string;
  message: string;
  exitCode: number;
  details?: unknown;
}

/**
 * Turn any thrown value into the report printed to the user and the exit
 * code of the process.
 */
export function describeError(error: unknown): ErrorReport {
  const report: ErrorReport = {
    error: 'Internal Error',
    message: 'An unexpected error occurred',
    exitCode: 1,
  };

  if (error instanceof ZodError) {
    report.error = 'Validation Error';
    report.message = 'Input validation failed';
    report.exitCode = 4;
    report.details = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return report;
  }

  if (error instanceof ConfigSchemaError) {
    report.error = 'Config Schema Error';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = { source: error.source, expected: error.expected, actual: error.actual };
    return report;
  }

  if (error instanceof InvalidScenarioError) {
    report.error = 'Invalid Scenario';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = { field: error.field, expected: error.expected, actual: error.actual };
    return report;
  }

  if (error instanceof ArtifactNotFoundError) {
    report.error = 'Artifact Not Found';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = { path: error.path };
    return report;
  }

  if (error instanceof ExternalToolError) {
    report.error = 'External Tool Error';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = { tool: error.tool, exitCode: error.toolExitCode, signal: error.signal };
    return report;
  }

  if (error instanceof ProjectionError) {
    report.error = 'Projection Error';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = { lon: error.lon, lat: error.lat };
    return report;
  }

  if (error instanceof ToolchainEnvironmentError) {
    report.error = 'Toolchain Environment Error';
    report.message = error.message;
    report.exitCode = error.exitCode;
    return report;
  }

  if (error instanceof WorkflowError) {
    report.error = 'Workflow Error';
    report.message = error.message;
    report.exitCode = error.exitCode;
    report.details = {
      currentState: error.currentState,
      attemptedState: error.attemptedState,
    };
    return report;
  }

  if (error instanceof Error) {
    report.message = error.message;
  }

  return report;
}

/**
 * Log the failure with its report and hand the report back so the caller can
 * rethrow or exit.
 */
export function reportError(logger: Logger, error: unknown, context: Record<string, unknown> = {}): ErrorReport {
  const report = describeError(error);
  if (report.error === 'Internal Error') {
    logger.error({ ...context, err: error }, report.message);
  } else {
    logger.error({ ...context, details: report.details }, `${report.error}: ${report.message}`);
  }
  return report;
}
