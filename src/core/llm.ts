/**
 * OpenRouter client for AskAI
 * Chat completions (text, images, PDFs), credits and model listing
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type {
  Annotation,
  CompletionOptions,
  CompletionResult,
  Credits,
  Message,
  ModelConfig,
  ModelInfo,
  Plugin,
} from './types.js';
import { OpenRouterError, errorMessage } from './errors.js';

export const FALLBACK_PDF_MODEL = 'anthropic/claude-sonnet-4';
export const FALLBACK_VISION_MODEL = 'anthropic/claude-3-opus:latest';
export const PDF_PLUGIN: Plugin = { id: 'file-parser', pdf: { engine: 'mistral-ocr' } };

const REQUEST_TIMEOUT_MS = 30_000;

const PDF_ERROR_PHRASES = ['failed to parse', 'pdf', '.pdf', 'cannot read', 'file format', 'document format'];

export const PDF_PARSE_FAILURE_MESSAGE =
  "I couldn't parse the PDF file you provided. This might be because:\n\n" +
  "1. The PDF has a format that's not supported\n" +
  '2. The PDF might be password-protected or encrypted\n' +
  '3. The PDF might be corrupted or too large\n\n' +
  'Please try with a different PDF file, or consider extracting the text manually ' +
  'and sending it as a regular message.';

export interface OpenRouterConfig {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
  defaultVisionModel?: string | null;
  defaultPdfModel?: string | null;
  timeoutMs?: number;
}

export type FetchFn = typeof fetch;

export interface ContentInfo {
  hasMultimodal: boolean;
  hasPdf: boolean;
  hasPdfUrl: boolean;
}

const annotationSchema = z
  .object({
    type: z.string(),
    url_citation: z
      .object({
        url: z.string(),
        title: z.string().optional(),
        content: z.string().optional(),
        start_index: z.number().optional(),
        end_index: z.number().optional(),
      })
      .optional(),
  })
  .passthrough();

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          annotations: z.array(annotationSchema).optional(),
        }),
      }),
    )
    .min(1),
});

const creditsSchema = z.object({
  data: z.object({
    total_credits: z.number(),
    total_usage: z.number(),
  }),
});

const modelsSchema = z.object({
  data: z.array(
    z
      .object({
        id: z.string(),
        name: z.string().optional(),
        description: z.string().optional(),
        context_length: z.number().nullish(),
        pricing: z
          .object({
            prompt: z.union([z.string(), z.number()]).optional(),
            completion: z.union([z.string(), z.number()]).optional(),
          })
          .optional(),
        top_provider: z
          .object({
            max_completion_tokens: z.number().nullish(),
          })
          .optional(),
      })
      .passthrough(),
  ),
});

/**
 * Scan messages for images and PDFs
 */
export function detectContentTypes(messages: Message[]): ContentInfo {
  const info: ContentInfo = { hasMultimodal: false, hasPdf: false, hasPdfUrl: false };

  for (const message of messages) {
    if (typeof message.content === 'string') continue;
    for (const part of message.content) {
      if (part.type === 'image_url') {
        info.hasMultimodal = true;
        if (part.image_url.url.includes('application/pdf')) info.hasPdf = true;
      } else if (part.type === 'file') {
        const data = part.file.file_data;
        const isPdfUrl = data.startsWith('http') && data.toLowerCase().endsWith('.pdf');
        const isPdfBase64 = data.includes('application/pdf');
        if (isPdfUrl || isPdfBase64) {
          info.hasMultimodal = true;
          info.hasPdf = true;
          if (isPdfUrl) info.hasPdfUrl = true;
        }
      }
    }
    if (info.hasMultimodal) break;
  }

  return info;
}

/**
 * Add a plugin, replacing one with the same id
 */
export function addPlugin(plugins: Plugin[], plugin: Plugin): Plugin[] {
  const index = plugins.findIndex((p) => p.id === plugin.id);
  if (index === -1) return [...plugins, plugin];
  const next = [...plugins];
  next[index] = plugin;
  return next;
}

export class OpenRouterClient {
  private config: Required<Omit<OpenRouterConfig, 'defaultVisionModel' | 'defaultPdfModel'>> &
    Pick<OpenRouterConfig, 'defaultVisionModel' | 'defaultPdfModel'>;
  private logger: Logger;
  private fetchFn: FetchFn;

  constructor(config: OpenRouterConfig, logger: Logger, fetchFn: FetchFn = fetch) {
    this.config = {
      timeoutMs: REQUEST_TIMEOUT_MS,
      ...config,
      baseUrl: config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`,
    };
    this.logger = logger;
    this.fetchFn = fetchFn;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Build the request body for a chat completion
   */
  buildPayload(messages: Message[], modelConfig?: ModelConfig, options: CompletionOptions = {}): Record<string, unknown> {
    const explicit = options.explicitModel ?? false;
    const content = detectContentTypes(messages);

    let model = modelConfig?.name ?? this.config.defaultModel;
    let plugins: Plugin[] = [...(modelConfig?.plugins ?? [])];

    if (content.hasMultimodal && !explicit) {
      if (content.hasPdf) {
        model = this.config.defaultPdfModel || FALLBACK_PDF_MODEL;
        plugins = addPlugin(plugins, PDF_PLUGIN);
        this.logger.debug(
          { selected_model: model, pdf_engine: 'mistral-ocr', pdf_url: content.hasPdfUrl },
          'Detected PDF content, using PDF-capable model with file-parser plugin',
        );
      } else {
        model = this.config.defaultVisionModel || FALLBACK_VISION_MODEL;
        if (!this.config.defaultVisionModel) {
          this.logger.warn('Using default visual model as no specific model configured');
        }
        this.logger.debug({ selected_model: model }, 'Detected image content, using vision-capable model');
      }
    }

    for (const plugin of options.plugins ?? []) {
      plugins = addPlugin(plugins, plugin);
    }

    // PDF URLs always need the parser, even with a chosen model
    if (content.hasPdfUrl) {
      plugins = addPlugin(plugins, PDF_PLUGIN);
    }

    const payload: Record<string, unknown> = { model };
    if (modelConfig?.temperature !== undefined) payload.temperature = modelConfig.temperature;
    if (modelConfig?.max_tokens !== undefined) payload.max_tokens = modelConfig.max_tokens;
    if (modelConfig?.stop && modelConfig.stop.length > 0) payload.stop = modelConfig.stop;

    const webSearchOptions = options.webSearchOptions ?? modelConfig?.web_search_options;
    if (webSearchOptions) payload.web_search_options = webSearchOptions;
    if (plugins.length > 0) payload.plugins = plugins;

    payload.messages = messages;
    return payload;
  }

  /**
   * Send a chat completion request
   */
  async requestCompletion(
    messages: Message[],
    modelConfig?: ModelConfig,
    options: CompletionOptions = {},
  ): Promise<CompletionResult> {
    const payload = this.buildPayload(messages, modelConfig, options);
    const content = detectContentTypes(messages);

    this.logger.debug(
      { model: payload.model, plugins: payload.plugins ?? [], has_pdf: content.hasPdf },
      'Final OpenRouter API payload',
    );

    const response = await this.send('chat/completions', {
      method: 'POST',
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const text = await response.text();
      this.logger.error({ status: response.status, error: text }, 'OpenRouter API error');

      if (response.status === 422 && content.hasPdf) {
        const lower = text.toLowerCase();
        if (PDF_ERROR_PHRASES.some((phrase) => lower.includes(phrase))) {
          this.logger.warn('PDF parsing error detected, returning friendly error message');
          return { content: PDF_PARSE_FAILURE_MESSAGE, annotations: [], raw: { error: text } };
        }
      }
      throw new OpenRouterError(`OpenRouter API error: ${response.status} ${text}`, response.status);
    }

    const data: unknown = await response.json();
    return parseCompletionResponse(data, this.logger);
  }

  /**
   * Credit balance for the configured key
   */
  async getCredits(): Promise<Credits> {
    this.logger.debug('Requesting credit balance from OpenRouter API');
    const data = await this.getJson('credits', 'Error getting credit balance');
    const parsed = creditsSchema.safeParse(data);
    if (!parsed.success) {
      throw new OpenRouterError('Invalid credits response from OpenRouter API');
    }
    return parsed.data.data;
  }

  /**
   * All models available through OpenRouter
   */
  async listModels(): Promise<ModelInfo[]> {
    this.logger.debug('Requesting model list from OpenRouter API');
    const data = await this.getJson('models', 'Error getting available models');
    const parsed = modelsSchema.safeParse(data);
    if (!parsed.success) {
      throw new OpenRouterError('Invalid models response from OpenRouter API');
    }
    return parsed.data.data;
  }

  private async getJson(endpoint: string, errorPrefix: string): Promise<unknown> {
    const response = await this.send(endpoint, { method: 'GET' });
    if (!response.ok) {
      const text = await response.text();
      this.logger.error({ status: response.status, error: text }, errorPrefix);
      throw new OpenRouterError(`${errorPrefix}: ${response.status} ${text}`, response.status);
    }
    return response.json();
  }

  private async send(endpoint: string, init: { method: string; body?: string }): Promise<Response> {
    try {
      return await this.fetchFn(`${this.config.baseUrl}${endpoint}`, {
        ...init,
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.config.apiKey}`,
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      this.logger.fatal({ error: errorMessage(error) }, 'Connection error when calling OpenRouter API');
      throw new OpenRouterError(`Connection error when calling OpenRouter API: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }
}

/**
 * Parse an OpenAI-compatible response to our CompletionResult format
 */
export function parseCompletionResponse(data: unknown, logger?: Logger): CompletionResult {
  const parsed = completionSchema.safeParse(data);
  if (!parsed.success) {
    throw new OpenRouterError('Invalid OpenRouter response: no choices');
  }

  const message = parsed.data.choices[0].message;
  const annotations: Annotation[] = message.annotations ?? [];
  if (annotations.length > 0) {
    logger?.debug({ annotation_count: annotations.length }, 'Received web search annotations');
  }

  return {
    content: message.content ?? '',
    annotations,
    raw: data,
  };
}
