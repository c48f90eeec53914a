export class ConfigSchemaError extends Error {
  public code = 'CONFIG_SCHEMA';
  public exitCode = 3;
  public source: string;
  public expected?: readonly string[];
  public actual?: readonly string[];

  constructor(source: string, message: string, expected?: readonly string[], actual?: readonly string[]) {
    super(
      expected && actual
        ? `${message} (${source})\nExpected:\n${expected.join(';')}\nbut got this:\n${actual.join(';')}`
        : `${message} (${source})`
    );
    this.name = 'ConfigSchemaError';
    this.source = source;
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidScenarioError extends Error {
  public code = 'INVALID_SCENARIO';
  public exitCode = 4;
  public field: string;
  public expected?: string;
  public actual?: string;

  constructor(field: string, message: string, expected?: string, actual?: string) {
    super(
      expected !== undefined
        ? `${message}\nExpected:\n${expected}\nbut got this:\n${actual ?? '(empty)'}`
        : message
    );
    this.name = 'InvalidScenarioError';
    this.field = field;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ArtifactNotFoundError extends Error {
  public code = 'ARTIFACT_NOT_FOUND';
  public exitCode = 5;
  public path: string;

  constructor(description: string, path: string) {
    super(`${description} not found: ${path}`);
    this.name = 'ArtifactNotFoundError';
    this.path = path;
  }
}

export class ExternalToolError extends Error {
  public code = 'EXTERNAL_TOOL';
  public exitCode = 6;
  public tool: string;
  public args: readonly string[];
  public toolExitCode: number | null;
  public signal: NodeJS.Signals | null;

  constructor(
    tool: string,
    args: readonly string[],
    reason: string,
    toolExitCode: number | null = null,
    signal: NodeJS.Signals | null = null
  ) {
    super(`${tool} failed: ${reason}\n  ${[tool, ...args].join(' ')}`);
    this.name = 'ExternalToolError';
    this.tool = tool;
    this.args = args;
    this.toolExitCode = toolExitCode;
    this.signal = signal;
  }
}

export class ProjectionError extends Error {
  public code = 'PROJECTION';
  public exitCode = 7;
  public lon?: number;
  public lat?: number;

  constructor(message: string, lon?: number, lat?: number) {
    super(lon !== undefined && lat !== undefined ? `${message} (lon=${lon}, lat=${lat})` : message);
    this.name = 'ProjectionError';
    this.lon = lon;
    this.lat = lat;
  }
}

export class ToolchainEnvironmentError extends Error {
  public code = 'TOOLCHAIN_ENVIRONMENT';
  public exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'ToolchainEnvironmentError';
  }
}

export class WorkflowError extends Error {
  public code = 'WORKFLOW';
  public exitCode = 1;
  public currentState?: string;
  public attemptedState?: string;

  constructor(message: string, currentState?: string, attemptedState?: string) {
    super(message);
    this.name = 'WorkflowError';
    this.currentState = currentState;
    this.attemptedState = attemptedState;
  }
}
