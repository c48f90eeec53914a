import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseDelimited, parseDecimal, toDelimited } from '../lib/delimited.js';
import {
  ArtifactNotFoundError,
  ConfigSchemaError,
  ExternalToolError,
  ToolchainEnvironmentError,
  WorkflowError,
} from '../lib/errors.js';
import { describeError } from '../lib/error-handler.js';
import { IniDocument, quoted, withUnit, xmldoc } from '../lib/ini.js';
import { element, option, parseXml, serializeXml } from '../lib/xml.js';
import { resetToolchainConfigCache, validateToolchainConfig } from '../lib/config/toolchain.js';

describe('Delimited tables', () => {
  it('parses rows by header', () => {
    const table = parseDelimited('\uFEFFfrom;to;num\r\n1;2;100\r\n\r\n"3;4";5;6\n', 'odm.csv');

    expect(table.columns).toEqual(['from', 'to', 'num']);
    expect(table.rows).toEqual([
      { from: '1', to: '2', num: '100' },
      { from: '3;4', to: '5', num: '6' },
    ]);
  });

  it('checks the header names and order', () => {
    expect(() => parseDelimited('to;from;num\n', 'odm.csv', { expectedColumns: ['from', 'to', 'num'] })).toThrow(
      ConfigSchemaError
    );
  });

  it('names a row with the wrong number of cells', () => {
    expect(() => parseDelimited('a;b\n1;2\n3\n', 't.csv')).toThrow('Row 3 has 1 cells, expected 2 (t.csv)');
  });

  it('rejects an empty table', () => {
    expect(() => parseDelimited('\n\n', 't.csv')).toThrow('Table is empty');
  });

  it('writes rows back with quoting', () => {
    expect(toDelimited(['a', 'b'], [{ a: 'x;y', b: 'say "hi"' }])).toBe('a;b\n"x;y";"say ""hi"""\n');
  });

  it('accepts a decimal comma', () => {
    expect(parseDecimal('0,25')).toBe(0.25);
    expect(parseDecimal(' 3 ')).toBe(3);
    expect(parseDecimal('')).toBeNaN();
  });
});

describe('Ini documents', () => {
  it('renders sections in insertion order', () => {
    const doc = new IniDocument();
    doc.section('General').set('network', 'World').blank().set('sim-time-limit', '60s');
    doc.section('Config fast').set('cmdenv-express-mode', 'true');
    doc.section('General').set('num-rngs', 2);

    expect(doc.toString()).toBe(
      '[General]\nnetwork = World\n\nsim-time-limit = 60s\nnum-rngs = 2\n\n[Config fast]\ncmdenv-express-mode = true\n'
    );
    expect(doc.get('General', 'num-rngs')).toBe('2');
    expect(doc.get('Config fast', 'network')).toBeUndefined();
  });

  it('rejects duplicate keys in a section', () => {
    const doc = new IniDocument();
    expect(() => doc.section('General').set('a', 1).set('a', 2)).toThrow("Duplicate ini key 'a'");
  });

  it('formats values', () => {
    expect(quoted('say "hi"')).toBe('"say \\"hi\\""');
    expect(xmldoc('services.xml')).toBe('xmldoc("services.xml")');
    expect(withUnit(600, 'm')).toBe('600m');
    expect(withUnit(1.5, 'm', 2)).toBe('1.50m');
  });
});

describe('XML documents', () => {
  it('serializes attributes and nesting', () => {
    const doc = element('configuration', {}, [element('input', {}, [option('seed', 1), option('gui', false)])]);

    expect(serializeXml(doc)).toBe(
      '<configuration>\n\t<input>\n\t\t<seed value="1"/>\n\t\t<gui value="false"/>\n\t</input>\n</configuration>\n'
    );
    expect(parseXml(serializeXml(doc, { declaration: true }))).toEqual({
      configuration: { input: { seed: { value: '1' }, gui: { value: 'false' } } },
    });
  });
});

describe('describeError', () => {
  it('maps pipeline errors to their exit codes', () => {
    expect(describeError(new ConfigSchemaError('t.csv', 'Bad header')).exitCode).toBe(3);
    expect(describeError(new ArtifactNotFoundError('Net file', '/n.xml'))).toEqual({
      error: 'Artifact Not Found',
      message: 'Net file not found: /n.xml',
      exitCode: 5,
      details: { path: '/n.xml' },
    });
    expect(describeError(new ExternalToolError('sumo', ['-c', 'a'], 'exit code 2', 2))).toMatchObject({
      error: 'External Tool Error',
      message: 'sumo failed: exit code 2\n  sumo -c a',
      exitCode: 6,
    });
    expect(describeError(new ToolchainEnvironmentError('missing')).exitCode).toBe(2);
    expect(describeError(new WorkflowError('done', 'Terminal', 'Failed')).details).toEqual({
      currentState: 'Terminal',
      attemptedState: 'Failed',
    });
  });

  it('reports validation issues', () => {
    const result = z.object({ n: z.number() }).safeParse({ n: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const report = describeError(result.error);
    expect(report.error).toBe('Validation Error');
    expect(report.exitCode).toBe(4);
    expect(report.details).toEqual([{ path: 'n', message: 'Expected number, received string' }]);
  });

  it('treats anything else as internal', () => {
    expect(describeError(new Error('boom'))).toEqual({ error: 'Internal Error', message: 'boom', exitCode: 1 });
    expect(describeError('boom').message).toBe('An unexpected error occurred');
  });
});

describe('Toolchain configuration', () => {
  beforeEach(() => {
    resetToolchainConfigCache();
  });

  it('requires SUMO_HOME', () => {
    expect(() => validateToolchainConfig({})).toThrow("please declare environment variable 'SUMO_HOME'");
    expect(() => validateToolchainConfig({ SUMO_HOME: '  ' })).toThrow(ToolchainEnvironmentError);
  });

  it('applies defaults', () => {
    const config = validateToolchainConfig({ SUMO_HOME: '/opt/sumo', COSIM_POOL_SIZE: '3' });

    expect(config.sumoHome).toBe('/opt/sumo');
    expect(config.simulationRoot).toBe('./scenarios/default');
    expect(config.resultsDir).toBe('../results');
    expect(config.poolSize).toBe(3);
    expect(config.toolTimeoutMs).toBe(1_800_000);
    expect(config.strictVehicleTypes).toBe(false);
    expect(config.binaries).toEqual({
      od2trips: 'od2trips',
      duarouter: 'duarouter',
      sumo: 'sumo',
      arteryRunner: '../../build/run_artery.sh',
    });
    expect(config.redis).toEqual({ host: 'localhost', port: 6379, password: undefined, db: 0 });
  });

  it('reads overrides', () => {
    const config = validateToolchainConfig({
      SUMO_HOME: '/opt/sumo',
      COSIM_VTYPE_STRICT: '1',
      COSIM_TOOL_TIMEOUT_MS: '5000',
      REDIS_PORT: '6380',
    });

    expect(config.strictVehicleTypes).toBe(true);
    expect(config.toolTimeoutMs).toBe(5000);
    expect(config.redis.port).toBe(6380);
  });

  it('rejects malformed values', () => {
    expect(() => validateToolchainConfig({ SUMO_HOME: '/opt/sumo', REDIS_PORT: 'redis' })).toThrow(
      /Invalid environment configuration:\nREDIS_PORT/
    );
  });

  it('is validated once', () => {
    const first = validateToolchainConfig({ SUMO_HOME: '/opt/sumo' });
    expect(validateToolchainConfig({})).toBe(first);
  });
});
