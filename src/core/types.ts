/**
 * Core types for AskAI
 * Messages and request shapes for the OpenRouter chat completions API
 */

// Message roles in conversation
export type MessageRole = 'system' | 'user' | 'assistant';

// Multimodal content parts
export interface TextPart {
  type: 'text';
  text: string;
}

export interface ImageUrlPart {
  type: 'image_url';
  image_url: { url: string };
}

export interface FilePart {
  type: 'file';
  file: { filename: string; file_data: string };
}

export type ContentPart = TextPart | ImageUrlPart | FilePart;

export type MessageContent = string | ContentPart[];

// Base message interface
export interface Message {
  role: MessageRole;
  content: MessageContent;
}

// OpenRouter plugins
export interface FileParserPlugin {
  id: 'file-parser';
  pdf: { engine: string };
}

export interface WebPlugin {
  id: 'web';
  max_results?: number;
  search_prompt?: string;
}

export type Plugin = FileParserPlugin | WebPlugin;

export type SearchContextSize = 'low' | 'medium' | 'high';

export interface WebSearchOptions {
  search_context_size: SearchContextSize;
}

// Model configuration sent along with a request
export interface ModelConfig {
  name: string;
  provider?: string;
  temperature?: number;
  max_tokens?: number;
  stop?: string[];
  plugins?: Plugin[];
  web_search_options?: WebSearchOptions;
}

// Url citation returned by web search
export interface Annotation {
  type: string;
  url_citation?: {
    url: string;
    title?: string;
    content?: string;
    start_index?: number;
    end_index?: number;
  };
}

// LLM response structure
export interface CompletionResult {
  content: string;
  annotations?: Annotation[];
  raw: unknown;
}

// What a request carries besides the messages
export interface CompletionOptions {
  /** The model was picked by the user or a pattern and must not be swapped */
  explicitModel?: boolean;
  plugins?: Plugin[];
  webSearchOptions?: WebSearchOptions;
}

export interface Credits {
  total_credits: number;
  total_usage: number;
}

export interface ModelInfo {
  id: string;
  name?: string;
  description?: string;
  context_length?: number | null;
  pricing?: { prompt?: string | number; completion?: string | number };
  top_provider?: { max_completion_tokens?: number | null };
}

export type ResponseFormat = 'rawtext' | 'json' | 'md';
