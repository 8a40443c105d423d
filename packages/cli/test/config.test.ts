import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, findEnvFile, loadConfig, parseEnvFile } from '../src/config.js';

describe('parseEnvFile', () => {
  it('reads keys and values, skipping comments and malformed lines', () => {
    const content = [
      '# logging',
      'DDL_PDA_ENV=test',
      '',
      'DDL_PDA_LOG_LEVEL="debug"',
      "DDL_PDA_LOG_FILE='logs/out.jsonl'",
      'NOT_A_SETTING',
      '  SPACED = value  ',
    ].join('\n');

    expect(parseEnvFile(content)).toEqual({
      DDL_PDA_ENV: 'test',
      DDL_PDA_LOG_LEVEL: 'debug',
      DDL_PDA_LOG_FILE: 'logs/out.jsonl',
      SPACED: 'value',
    });
  });

  it('keeps a lone quote character', () => {
    expect(parseEnvFile('QUOTE="')).toEqual({ QUOTE: '"' });
  });
});

describe('loadConfig', () => {
  let root: string;
  let nested: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'ddl-pda-config-'));
    nested = path.join(root, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeEnv(dir: string, content: string): void {
    fs.writeFileSync(path.join(dir, '.env'), content);
  }

  it('finds the nearest .env file above the working directory', () => {
    writeEnv(root, 'DDL_PDA_ENV=development\n');
    writeEnv(path.join(root, 'a'), 'DDL_PDA_ENV=test\n');

    expect(findEnvFile(nested)).toEqual({ DDL_PDA_ENV: 'test' });
  });

  it('reads settings from the .env file', () => {
    writeEnv(root, 'DDL_PDA_ENV=development\nDDL_PDA_LOG_LEVEL=info\nDDL_PDA_LOG_FILE=ddl.jsonl\n');

    expect(loadConfig(nested, {})).toEqual({
      environment: 'development',
      logLevel: 'info',
      logFile: 'ddl.jsonl',
    });
  });

  it('lets process environment variables override the .env file', () => {
    writeEnv(root, 'DDL_PDA_ENV=development\nDDL_PDA_LOG_LEVEL=info\n');

    const config = loadConfig(nested, { DDL_PDA_LOG_LEVEL: 'error', DDL_PDA_LOG_FILE: 'env.jsonl' });

    expect(config).toEqual({ environment: 'development', logLevel: 'error', logFile: 'env.jsonl' });
  });

  it('ignores empty environment variables', () => {
    writeEnv(root, 'DDL_PDA_LOG_LEVEL=warn\n');

    expect(loadConfig(nested, { DDL_PDA_LOG_LEVEL: '' }).logLevel).toBe('warn');
  });

  it('defaults to production without console logging', () => {
    writeEnv(root, '# nothing set\n');

    expect(loadConfig(nested, {})).toEqual({ environment: 'production' });
  });

  it('rejects an unknown environment', () => {
    expect(() => loadConfig(nested, { DDL_PDA_ENV: 'staging' })).toThrow(ConfigError);
    expect(() => loadConfig(nested, { DDL_PDA_ENV: 'staging' })).toThrow(
      'DDL_PDA_ENV: expected test, development or production but got "staging"',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig(nested, { DDL_PDA_LOG_LEVEL: 'verbose' })).toThrow(
      'DDL_PDA_LOG_LEVEL: expected debug, info, warn, error or fatal but got "verbose"',
    );
  });
});
