import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { parse } from 'yaml';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../core/errors.js';
import { makeTempDir, removeTempDir, ScriptedPrompter } from '../test-utils.js';
import {
  createTestConfigFromProduction,
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  describeStructure,
  loadConfig,
  parseConfig,
  resolvePaths,
} from './index.js';

describe('resolvePaths', () => {
  it('places everything under the base directory', () => {
    expect(resolvePaths({ ASKAI_HOME: '/data/askai' })).toEqual({
      baseDir: '/data/askai',
      configFile: '/data/askai/config.yml',
      chatsDir: '/data/askai/chats',
      logsDir: '/data/askai/logs',
      logFile: '/data/askai/logs/askai.log',
    });
  });

  it('uses the test subdirectory when testing', () => {
    expect(resolvePaths({ ASKAI_HOME: '/data/askai', ASKAI_TESTING: 'yes' }).configFile).toBe(
      '/data/askai/test/config.yml',
    );
  });
});

describe('parseConfig', () => {
  const paths = resolvePaths({ ASKAI_HOME: '/data/askai' });

  it('fills in defaults', () => {
    const config = parseConfig({}, paths, {});
    expect(config.api_key).toBe('');
    expect(config.base_url).toBe(DEFAULT_BASE_URL);
    expect(config.default_model).toBe(DEFAULT_MODEL);
    expect(config.log_level).toBe('info');
    expect(config.chat).toEqual({ storage_path: '/data/askai/chats', max_history: 10 });
    expect(config.web_search).toEqual({ enabled: false, method: 'plugin', max_results: 5, context_size: 'medium' });
  });

  it('applies environment overrides', () => {
    const config = parseConfig({ api_key: 'from-file' }, paths, {
      OPENROUTER_API_KEY: 'test-secret',
      OPENROUTER_BASE_URL: 'http://localhost:8080/v1',
      ASKAI_DEFAULT_MODEL: 'some/model',
    });
    expect(config.api_key).toBe('test-secret');
    expect(config.base_url).toBe('http://localhost:8080/v1/');
    expect(config.default_model).toBe('some/model');
  });

  it('treats placeholders as unset', () => {
    const config = parseConfig(
      { api_key: 'PLACEHOLDER_API_KEY', default_vision_model: 'PLACEHOLDER_MODEL' },
      paths,
      {},
    );
    expect(config.api_key).toBe('');
    expect(config.default_vision_model).toBeUndefined();
  });

  it('accepts level names used by other loggers', () => {
    expect(parseConfig({ log_level: 'WARNING' }, paths, {}).log_level).toBe('warn');
    expect(parseConfig({ log_level: 'critical' }, paths, {}).log_level).toBe('fatal');
  });

  it('reports every invalid field', () => {
    expect(() => parseConfig({ log_rotation: 0, chat: { max_history: -1 } }, paths, {})).toThrow(
      new ConfigError(
        'Invalid configuration in /data/askai/config.yml: log_rotation: Number must be greater than or equal to 1; ' +
          'chat.max_history: Number must be greater than or equal to 0',
      ),
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('fails without an api key when it cannot ask', async () => {
    await expect(loadConfig({ env: { ASKAI_HOME: dir } })).rejects.toThrow(ConfigError);
  });

  it('reads the file and creates the directories', async () => {
    await writeFile(join(dir, 'config.yml'), 'api_key: test-secret\nenable_logging: false\n');

    const config = await loadConfig({ env: { ASKAI_HOME: dir } });

    expect(config.api_key).toBe('test-secret');
    expect(existsSync(join(dir, 'chats'))).toBe(true);
    expect(existsSync(join(dir, 'logs'))).toBe(false);
  });

  it('runs the setup wizard when the key is missing', async () => {
    const prompter = new ScriptedPrompter(['test-secret', '']);

    const config = await loadConfig({ env: { ASKAI_HOME: dir }, prompter });

    expect(config.api_key).toBe('test-secret');
    expect(config.default_model).toBe(DEFAULT_MODEL);
    expect(config.chat.storage_path).toBe(join(dir, 'chats'));
    const written: unknown = parse(await readFile(join(dir, 'config.yml'), 'utf-8'));
    expect(written).toMatchObject({ api_key: 'test-secret', log_path: join(dir, 'logs', 'askai.log') });
  });
});

describe('test environment helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('copies the production config with test paths', async () => {
    await writeFile(join(dir, 'config.yml'), 'api_key: test-secret\ndefault_model: some/model\n');

    const path = await createTestConfigFromProduction({ ASKAI_HOME: dir });

    expect(path).toBe(join(dir, 'test', 'config.yml'));
    expect(parse(await readFile(path, 'utf-8'))).toEqual({
      api_key: 'test-secret',
      default_model: 'some/model',
      log_path: join(dir, 'test', 'logs', 'askai.log'),
      chat: { storage_path: join(dir, 'test', 'chats') },
    });
  });

  it('needs a production config to copy', async () => {
    await mkdir(join(dir, 'test'));
    await expect(createTestConfigFromProduction({ ASKAI_HOME: dir })).rejects.toThrow(
      `Production config not found at ${join(dir, 'config.yml')}`,
    );
  });

  it('describes the directory layout', () => {
    const lines = describeStructure({ ASKAI_HOME: '/data/askai', ASKAI_TESTING: 'true' }).split('\n');
    expect(lines[0]).toBe('AskAI directory structure (active environment: test)');
    expect(lines[2]).toBe('/data/askai/');
    expect(lines[lines.length - 1]).toBe('Config file: /data/askai/test/config.yml');
  });
});
