/**
 * AI service
 *
 * Decides which model and web search settings a request uses, then
 * calls OpenRouter with a spinner on screen.
 */

import ora from 'ora';
import type { Logger } from 'pino';
import type { AskAIConfig } from '../config/index.js';
import { isTestEnvironment } from '../config/index.js';
import type { OpenRouterClient } from './llm.js';
import type {
  CompletionOptions,
  CompletionResult,
  Message,
  ModelConfig,
  Plugin,
  WebPlugin,
  WebSearchOptions,
} from './types.js';

/** Model settings a pattern may carry */
export interface PatternModelSettings {
  provider?: string;
  name?: string;
  temperature?: number;
  max_tokens?: number;
  stop?: string[];
  web_search?: boolean;
  web_plugin?: { max_results?: number; search_prompt?: string };
  web_search_options?: WebSearchOptions;
}

export interface AIRequestOptions {
  /** Model chosen on the command line */
  modelName?: string;
  patternId?: string;
  patternModel?: PatternModelSettings;
  /** A URL is part of the request, which turns on web search */
  url?: string;
}

export interface ResolvedModel {
  config: ModelConfig;
  explicit: boolean;
  source: 'pattern' | 'cli' | 'default';
}

export interface WebSearchSettings {
  plugin?: WebPlugin;
  options?: WebSearchOptions;
}

export interface AIServiceOptions {
  spinner?: boolean;
}

export class AIService {
  private config: AskAIConfig;
  private client: OpenRouterClient;
  private logger: Logger;
  private spinnerEnabled: boolean;

  constructor(config: AskAIConfig, client: OpenRouterClient, logger: Logger, options: AIServiceOptions = {}) {
    this.config = config;
    this.client = client;
    this.logger = logger;
    this.spinnerEnabled = options.spinner ?? !isTestEnvironment();
  }

  /**
   * Pattern model > command line model > configured default
   */
  resolveModel(options: AIRequestOptions): ResolvedModel {
    const pattern = options.patternModel;
    // Sampling settings of a pattern apply whichever model is used
    const tuning: Omit<ModelConfig, 'name'> = {
      temperature: pattern?.temperature,
      max_tokens: pattern?.max_tokens,
      stop: pattern?.stop,
    };
    if (pattern?.name) {
      return {
        source: 'pattern',
        explicit: true,
        config: { name: pattern.name, provider: pattern.provider, ...tuning },
      };
    }
    if (options.modelName) {
      return { source: 'cli', explicit: true, config: { name: options.modelName, ...tuning } };
    }
    return { source: 'default', explicit: false, config: { name: this.config.default_model, ...tuning } };
  }

  /**
   * Pattern web settings win; otherwise the global settings apply when
   * web search is enabled or a URL was given.
   */
  resolveWebSearch(options: AIRequestOptions): WebSearchSettings {
    const pattern = options.patternModel;
    if (pattern?.web_plugin) {
      return { plugin: { id: 'web', ...pattern.web_plugin } };
    }
    if (pattern?.web_search_options) {
      return { options: pattern.web_search_options };
    }
    if (pattern?.web_search || this.config.web_search.enabled || options.url) {
      return this.globalWebSearch();
    }
    return {};
  }

  private globalWebSearch(): WebSearchSettings {
    const web = this.config.web_search;
    if (web.method === 'plugin') {
      const plugin: WebPlugin = { id: 'web', max_results: web.max_results };
      if (web.search_prompt) plugin.search_prompt = web.search_prompt;
      return { plugin };
    }
    return { options: { search_context_size: web.context_size || 'medium' } };
  }

  async getAIResponse(messages: Message[], options: AIRequestOptions = {}): Promise<CompletionResult> {
    const model = this.resolveModel(options);
    const web = this.resolveWebSearch(options);

    const plugins: Plugin[] = web.plugin ? [web.plugin] : [];
    const completionOptions: CompletionOptions = {
      explicitModel: model.explicit,
      plugins,
      webSearchOptions: web.options,
    };

    this.logger.debug(
      {
        model: model.config.name,
        model_source: model.source,
        pattern_id: options.patternId,
        message_count: messages.length,
        web_search: web.plugin ? 'plugin' : web.options ? 'options' : 'off',
      },
      'Sending request to OpenRouter',
    );

    const spinner = ora({ text: 'Thinking...', isSilent: !this.spinnerEnabled }).start();
    try {
      const result = await this.client.requestCompletion(messages, model.config, completionOptions);
      this.logger.info(
        { model: model.config.name, response_length: result.content.length },
        'Received response from OpenRouter',
      );
      return result;
    } finally {
      spinner.stop();
    }
  }
}
