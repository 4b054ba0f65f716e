/**
 * AskAI command line application
 *
 * Parses the arguments, wires the services together and dispatches to
 * the requested command. Resolves with the process exit code.
 */

import type { Logger } from 'pino';
import { ChatManager } from '../chat/manager.js';
import {
  createTestConfigFromProduction,
  describeStructure,
  getConfigPath,
  isTestEnvironment,
  loadConfig,
  type AskAIConfig,
  type Env,
} from '../config/index.js';
import { AIService } from '../core/ai-service.js';
import { PatternError, ValidationError } from '../core/errors.js';
import { OpenRouterClient, type FetchFn } from '../core/llm.js';
import { MessageBuilder, readTerminalContext } from '../core/message-builder.js';
import { setupLogger } from '../logging/logger.js';
import { OutputCoordinator } from '../output/coordinator.js';
import { normalizeResponse } from '../output/normalizer.js';
import { PatternManager } from '../patterns/manager.js';
import { QuestionProcessor } from '../questions/processor.js';
import { printErrorOrWarning } from '../utils/console.js';
import { isInteractive, ReadlinePrompter, type Prompter } from '../utils/prompt.js';
import { InteractiveChat } from './interactive.js';
import { runOpenRouterCommand } from './openrouter.js';
import { buildProgram, type CliOptions } from './program.js';
import { validateOptions } from './validate.js';
import { readVersion } from './version.js';

export const CONFIG_ACTIONS = ['create-test-config', 'show-config-path', 'show-structure'] as const;

export interface CliDependencies {
  env?: Env;
  /** Defaults to a readline prompter when stdin is a terminal; null runs without prompts */
  prompter?: Prompter | null;
  fetchFn?: FetchFn;
  /** Piped input; read from stdin when not given */
  terminalContext?: string;
}

interface AppContext {
  options: CliOptions;
  config: AskAIConfig;
  logger: Logger;
  client: OpenRouterClient;
  aiService: AIService;
  chatManager: ChatManager;
  patternManager: PatternManager;
  messageBuilder: MessageBuilder;
  prompter: Prompter | undefined;
  deps: CliDependencies;
}

// ============================================================================
// Entry
// ============================================================================

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = buildProgram(readVersion());
  if (argv.length <= 2) {
    program.outputHelp();
    return 0;
  }
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const env = deps.env ?? process.env;

  if (options.config !== undefined) {
    return runConfigCommand(options.config, env);
  }

  const ownPrompter = deps.prompter !== undefined ? undefined : isInteractive() ? new ReadlinePrompter() : undefined;
  const prompter = deps.prompter ?? ownPrompter;
  try {
    const context = await createContext(options, deps, env, prompter);
    return await dispatch(context);
  } finally {
    ownPrompter?.close();
  }
}

async function createContext(
  options: CliOptions,
  deps: CliDependencies,
  env: Env,
  prompter: Prompter | undefined,
): Promise<AppContext> {
  const config = await loadConfig({ env, prompter });
  const logger = await setupLogger(config, { debug: options.debug });
  logger.debug({ test_environment: isTestEnvironment(env) }, 'Configuration loaded');

  const client = new OpenRouterClient(
    {
      apiKey: config.api_key,
      baseUrl: config.base_url,
      defaultModel: config.default_model,
      defaultVisionModel: config.default_vision_model ?? undefined,
      defaultPdfModel: config.default_pdf_model ?? undefined,
    },
    logger,
    deps.fetchFn,
  );

  const chatManager = new ChatManager(
    { storageDir: config.chat.storage_path, maxHistory: config.chat.max_history },
    logger,
  );
  chatManager.on('chat:created', ({ chatId }) => logger.info({ chat_id: chatId }, 'Created chat'));
  chatManager.on('chat:deleted', ({ chatId }) => logger.info({ chat_id: chatId }, 'Deleted chat'));
  chatManager.on('chat:repaired', ({ chatId, backupPath }) =>
    logger.info({ chat_id: chatId, backup_path: backupPath }, 'Repaired chat'),
  );
  await chatManager.init();

  const patternManager = new PatternManager(logger, { privateDir: config.patterns.private_patterns_path ?? null });

  return {
    options,
    config,
    logger,
    client,
    aiService: new AIService(config, client, logger),
    chatManager,
    patternManager,
    messageBuilder: new MessageBuilder(logger),
    prompter,
    deps,
  };
}

/**
 * Commands first, then the model call
 */
async function dispatch(ctx: AppContext): Promise<number> {
  const { options } = ctx;

  if (options.openrouter !== undefined) {
    const [command = '', ...args] = options.openrouter;
    console.log(await runOpenRouterCommand(ctx.client, ctx.logger, command, args));
    return 0;
  }

  if (options.listPatterns) {
    await ctx.patternManager.preparePrivateDirectory(ctx.prompter);
    console.log(ctx.patternManager.formatPatternList(await ctx.patternManager.listPatterns()));
    return 0;
  }
  if (options.viewPattern !== undefined) {
    return viewPattern(ctx, options.viewPattern);
  }

  if (options.listChats) {
    console.log(ctx.chatManager.formatChatList(await ctx.chatManager.listChats()));
    return 0;
  }
  if (options.viewChat !== undefined) {
    return viewChat(ctx, options.viewChat);
  }
  if (options.manageChats) {
    await ctx.chatManager.manageChats(requirePrompter(ctx, 'Managing chats'));
    return 0;
  }

  if (options.interactive) {
    return runInteractive(ctx);
  }

  const validation = validateOptions(options);
  for (const warning of validation.warnings) {
    ctx.logger.warn(warning);
    printErrorOrWarning(warning, true);
  }
  if (validation.errors.length > 0) {
    ctx.logger.error({ errors: validation.errors }, 'Invalid arguments');
    throw new ValidationError(validation.errors.join('\n'));
  }

  if (options.usePattern !== undefined) {
    return runPattern(ctx, options.usePattern);
  }
  return runQuestion(ctx);
}

// ============================================================================
// Commands
// ============================================================================

async function runConfigCommand(action: string | true, env: Env): Promise<number> {
  if (action === true) {
    console.log('Available configuration commands:');
    console.log('  create-test-config  - Create or recreate the test configuration file');
    console.log('  show-config-path    - Show which configuration file is being used');
    console.log('  show-structure      - Show the AskAI directory structure');
    return 0;
  }

  switch (action) {
    case 'create-test-config': {
      const path = await createTestConfigFromProduction(env);
      console.log(`\nTest configuration created at ${path}`);
      console.log('It is used automatically when ASKAI_TESTING=true.');
      return 0;
    }
    case 'show-config-path': {
      const environment = isTestEnvironment(env) ? 'test' : 'production';
      console.log(`Configuration file (${environment}): ${getConfigPath(env)}`);
      return 0;
    }
    case 'show-structure':
      console.log(describeStructure(env));
      return 0;
    default:
      throw new ValidationError(
        `Unknown configuration command: ${action}. Valid commands: ${CONFIG_ACTIONS.join(', ')}`,
      );
  }
}

function requirePrompter(ctx: AppContext, what: string): Prompter {
  if (!ctx.prompter) {
    throw new ValidationError(`${what} needs an interactive terminal`);
  }
  return ctx.prompter;
}

async function viewPattern(ctx: AppContext, ref: string | true): Promise<number> {
  const patternId = ref === true ? await ctx.patternManager.selectPattern(requirePrompter(ctx, 'Choosing a pattern')) : ref;
  if (!patternId) return 0;

  const content = await ctx.patternManager.getPatternContent(patternId);
  if (content === null) {
    throw new PatternError(`Pattern '${patternId}' not found`);
  }
  console.log(content);
  return 0;
}

async function viewChat(ctx: AppContext, ref: string | true): Promise<number> {
  const chatId =
    ref === true ? await ctx.chatManager.selectChat(requirePrompter(ctx, 'Choosing a chat'), false) : ref;
  if (!chatId || chatId === 'new') return 0;
  console.log(await ctx.chatManager.formatChat(chatId));
  return 0;
}

async function runInteractive(ctx: AppContext): Promise<number> {
  const ref = ctx.options.persistentChat;
  let chatId: string | null;
  if (ref === undefined || ref === 'n') {
    chatId = await ctx.chatManager.createChat();
  } else if (ref === true || ref === 'new') {
    chatId = await ctx.chatManager.selectChat(requirePrompter(ctx, 'Choosing a chat'));
    if (chatId === 'new') chatId = await ctx.chatManager.createChat();
  } else {
    await ctx.chatManager.loadChat(ref);
    chatId = ref;
  }
  if (!chatId) return 0;

  // The session owns stdin from here on
  ctx.prompter?.close();
  const chat = new InteractiveChat({
    chatManager: ctx.chatManager,
    aiService: ctx.aiService,
    messageBuilder: ctx.messageBuilder,
    logger: ctx.logger,
    chatId,
    modelName: ctx.options.model,
    format: ctx.options.format,
    plainMd: ctx.options.plainMd,
  });
  await chat.start();
  return 0;
}

/**
 * Parse --pattern-input
 */
export function parsePatternInput(raw: string | undefined): Record<string, unknown> | undefined {
  if (raw === undefined) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`--pattern-input is not valid JSON: ${raw}`, { cause: error });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError('--pattern-input must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

async function terminalContext(ctx: AppContext): Promise<string | undefined> {
  if ('terminalContext' in ctx.deps) return ctx.deps.terminalContext;
  return readTerminalContext();
}

async function runPattern(ctx: AppContext, ref: string | true): Promise<number> {
  const { patternManager, logger } = ctx;
  await patternManager.preparePrivateDirectory(ctx.prompter);

  const patternId = ref === true ? await patternManager.selectPattern(requirePrompter(ctx, 'Choosing a pattern')) : ref;
  if (!patternId) return 0;

  const pattern = await patternManager.getPattern(patternId);
  if (!pattern) {
    throw new PatternError(`Pattern '${patternId}' not found`);
  }

  const inputs = await patternManager.processInputs(pattern, parsePatternInput(ctx.options.patternInput), {
    interactive: Boolean(ctx.prompter),
    prompter: ctx.prompter,
  });
  const messages = await ctx.messageBuilder.buildPatternMessages({
    pattern,
    inputs,
    fileInput: ctx.options.fileInput,
    terminalContext: await terminalContext(ctx),
  });

  const result = await ctx.aiService.getAIResponse(messages, { patternId, patternModel: pattern.model });

  if (pattern.outputs.length === 0) {
    console.log(normalizeResponse(result.content));
    return 0;
  }

  const coordinator = new OutputCoordinator(logger, { prompter: ctx.prompter });
  console.log(await coordinator.processPatternOutput(result.content, pattern.outputs));

  const created = await coordinator.executePendingOperations();
  if (created.length > 0) {
    console.log(`\nCreated output files: ${created.join(', ')}`);
  }
  logger.info({ pattern_id: patternId, created_files: created.length }, 'Pattern run finished');
  return 0;
}

async function runQuestion(ctx: AppContext): Promise<number> {
  const { options } = ctx;
  let messages = await ctx.messageBuilder.buildQuestionMessages({
    question: options.question,
    fileInput: options.fileInput,
    url: options.url,
    imagePath: options.image,
    imageUrl: options.imageUrl,
    pdfPath: options.pdf,
    pdfUrl: options.pdfUrl,
    format: options.format,
    terminalContext: await terminalContext(ctx),
  });

  let chatId: string | undefined;
  if (options.persistentChat !== undefined) {
    const ref = options.persistentChat === true ? 'new' : options.persistentChat;
    const chat = await ctx.chatManager.handlePersistentChat(ref, messages, ctx.prompter);
    if (!chat) {
      console.log('Chat selection cancelled');
      return 0;
    }
    chatId = chat.chatId;
    messages = chat.messages;
  }

  const result = await ctx.aiService.getAIResponse(messages, { modelName: options.model, url: options.url });

  const coordinator = new OutputCoordinator(ctx.logger, { prompter: ctx.prompter });
  const processor = new QuestionProcessor(coordinator, ctx.logger, ctx.chatManager);
  await processor.processQuestionResponse(result, messages, {
    format: options.format,
    outputFile: options.output,
    plainMd: Boolean(options.plainMd) && options.format === 'md',
    chatId,
  });
  return 0;
}
