/**
 * Configuration for AskAI
 *
 * Reads ~/.askai/config.yml (or the test copy when ASKAI_TESTING is set),
 * validates it and applies environment overrides.
 */

import { homedir } from 'os';
import { join, dirname } from 'path';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { parse, parseDocument } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { Prompter } from '../utils/prompt.js';

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1/';
export const DEFAULT_MODEL = 'anthropic/claude-3.5-sonnet';

const TEMPLATE_PATH = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'config', 'config.example.yml');

export type Env = Record<string, string | undefined>;

export interface AskAIPaths {
  baseDir: string;
  configFile: string;
  chatsDir: string;
  logsDir: string;
  logFile: string;
}

const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'fatal',
};

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function isPlaceholder(value: unknown): boolean {
  return typeof value === 'string' && value.includes('PLACEHOLDER_');
}

export function isTestEnvironment(env: Env = process.env): boolean {
  const flag = (env.ASKAI_TESTING ?? '').toLowerCase();
  return flag === 'true' || flag === '1' || flag === 'yes';
}

/**
 * Directory layout for the current environment
 */
export function resolvePaths(env: Env = process.env): AskAIPaths {
  const root = expandHome(env.ASKAI_HOME || join(homedir(), '.askai'));
  const baseDir = isTestEnvironment(env) ? join(root, 'test') : root;
  const logsDir = join(baseDir, 'logs');
  return {
    baseDir,
    configFile: join(baseDir, 'config.yml'),
    chatsDir: join(baseDir, 'chats'),
    logsDir,
    logFile: join(logsDir, 'askai.log'),
  };
}

export function getConfigPath(env: Env = process.env): string {
  return resolvePaths(env).configFile;
}

const logLevelSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value;
    const lower = value.toLowerCase();
    return LOG_LEVEL_ALIASES[lower] ?? lower;
  },
  z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
);

export function buildConfigSchema(paths: AskAIPaths) {
  return z.object({
    api_key: z.string().default(''),
    base_url: z.string().url().default(DEFAULT_BASE_URL),
    default_model: z.string().min(1).default(DEFAULT_MODEL),
    default_vision_model: z.string().nullish(),
    default_pdf_model: z.string().nullish(),
    enable_logging: z.boolean().default(true),
    log_path: z.string().default(paths.logFile),
    log_level: logLevelSchema.default('info'),
    log_rotation: z.number().int().min(1).default(5),
    patterns: z
      .object({
        private_patterns_path: z.string().nullish(),
      })
      .default({}),
    web_search: z
      .object({
        enabled: z.boolean().default(false),
        method: z.enum(['plugin', 'options']).default('plugin'),
        max_results: z.number().int().positive().default(5),
        search_prompt: z.string().nullish(),
        context_size: z.enum(['low', 'medium', 'high']).default('medium'),
      })
      .default({}),
    chat: z
      .object({
        storage_path: z.string().default(paths.chatsDir),
        max_history: z.number().int().min(0).default(10),
      })
      .default({}),
  });
}

export type AskAIConfig = z.output<ReturnType<typeof buildConfigSchema>>;

/**
 * Validate raw config data and apply environment overrides
 */
export function parseConfig(raw: unknown, paths: AskAIPaths, env: Env = process.env): AskAIConfig {
  const result = buildConfigSchema(paths).safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${paths.configFile}: ${issues}`);
  }

  const config = result.data;
  if (env.OPENROUTER_API_KEY) config.api_key = env.OPENROUTER_API_KEY;
  if (env.OPENROUTER_BASE_URL) config.base_url = env.OPENROUTER_BASE_URL;
  if (env.ASKAI_DEFAULT_MODEL) config.default_model = env.ASKAI_DEFAULT_MODEL;

  // Placeholders count as unset
  if (isPlaceholder(config.api_key)) config.api_key = '';
  if (isPlaceholder(config.default_vision_model)) config.default_vision_model = undefined;
  if (isPlaceholder(config.default_pdf_model)) config.default_pdf_model = undefined;
  if (isPlaceholder(config.patterns.private_patterns_path)) config.patterns.private_patterns_path = undefined;

  config.log_path = expandHome(config.log_path);
  config.chat.storage_path = expandHome(config.chat.storage_path);
  if (config.patterns.private_patterns_path) {
    config.patterns.private_patterns_path = expandHome(config.patterns.private_patterns_path);
  }
  if (!config.base_url.endsWith('/')) config.base_url += '/';

  return config;
}

export interface LoadConfigOptions {
  env?: Env;
  /** Used by the setup wizard when the config is missing */
  prompter?: Prompter;
}

/**
 * Load the configuration, running the setup wizard when it is incomplete
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AskAIConfig> {
  const env = options.env ?? process.env;
  const paths = resolvePaths(env);

  let raw: unknown = {};
  if (existsSync(paths.configFile)) {
    try {
      raw = parse(await readFile(paths.configFile, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Could not read ${paths.configFile}`, { cause: error });
    }
  }

  let config = parseConfig(raw, paths, env);
  if (!config.api_key) {
    if (!options.prompter) {
      throw new ConfigError(
        `No OpenRouter API key configured. Edit ${paths.configFile} or set OPENROUTER_API_KEY.`,
      );
    }
    await runSetupWizard(paths, options.prompter);
    config = parseConfig(parse(await readFile(paths.configFile, 'utf-8')), paths, env);
    if (!config.api_key) {
      throw new ConfigError('An OpenRouter API key is required.');
    }
  }

  await ensureDirectories(config);
  return config;
}

/**
 * Create chat and log directories
 */
export async function ensureDirectories(config: AskAIConfig): Promise<void> {
  await mkdir(config.chat.storage_path, { recursive: true });
  if (config.enable_logging) {
    await mkdir(dirname(config.log_path), { recursive: true });
  }
}

/**
 * Ask for the required values and write a config file from the template
 */
export async function runSetupWizard(paths: AskAIPaths, prompter: Prompter): Promise<void> {
  console.log('AskAI setup');
  console.log(`No usable configuration found at ${paths.configFile}.\n`);

  const apiKey = await prompter.ask('OpenRouter API key: ');
  if (!apiKey) {
    throw new ConfigError('An OpenRouter API key is required.');
  }
  const model = await prompter.ask(`Default model [${DEFAULT_MODEL}]: `);

  const doc = existsSync(paths.configFile)
    ? parseDocument(await readFile(paths.configFile, 'utf-8'))
    : parseDocument(await readFile(TEMPLATE_PATH, 'utf-8'));
  doc.setIn(['api_key'], apiKey);
  doc.setIn(['default_model'], model || DEFAULT_MODEL);
  doc.setIn(['log_path'], paths.logFile);
  doc.setIn(['chat', 'storage_path'], paths.chatsDir);

  await mkdir(paths.baseDir, { recursive: true });
  await writeFile(paths.configFile, doc.toString());
  console.log(`\nConfiguration saved to ${paths.configFile}\n`);
}

/**
 * Copy the production config into the test environment with test paths
 */
export async function createTestConfigFromProduction(env: Env = process.env): Promise<string> {
  const production = resolvePaths({ ...env, ASKAI_TESTING: undefined });
  const test = resolvePaths({ ...env, ASKAI_TESTING: 'true' });

  if (!existsSync(production.configFile)) {
    throw new ConfigError(`Production config not found at ${production.configFile}`);
  }

  const doc = parseDocument(await readFile(production.configFile, 'utf-8'));
  doc.setIn(['log_path'], test.logFile);
  doc.setIn(['chat', 'storage_path'], test.chatsDir);

  await mkdir(test.chatsDir, { recursive: true });
  await mkdir(test.logsDir, { recursive: true });
  await writeFile(test.configFile, doc.toString());
  return test.configFile;
}

/**
 * Human readable overview of the AskAI directories
 */
export function describeStructure(env: Env = process.env): string {
  const production = resolvePaths({ ...env, ASKAI_TESTING: undefined });
  const test = resolvePaths({ ...env, ASKAI_TESTING: 'true' });
  const active = isTestEnvironment(env) ? 'test' : 'production';

  return [
    `AskAI directory structure (active environment: ${active})`,
    '',
    `${production.baseDir}/`,
    '├── config.yml        production configuration',
    '├── chats/            persistent chat histories',
    '├── logs/             log files',
    '└── test/             test environment (ASKAI_TESTING=true)',
    '    ├── config.yml',
    '    ├── chats/',
    '    └── logs/',
    '',
    `Config file: ${isTestEnvironment(env) ? test.configFile : production.configFile}`,
  ].join('\n');
}
