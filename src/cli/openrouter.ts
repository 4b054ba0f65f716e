/**
 * OpenRouter account commands: credit balance and model listing
 */

import type { Logger } from 'pino';
import type { OpenRouterClient } from '../core/llm.js';
import { ValidationError } from '../core/errors.js';
import type { Credits, ModelInfo } from '../core/types.js';

export const OPENROUTER_COMMANDS = ['check-credits', 'list-models'] as const;
export type OpenRouterCommand = (typeof OPENROUTER_COMMANDS)[number];

export function isOpenRouterCommand(value: string): value is OpenRouterCommand {
  return OPENROUTER_COMMANDS.some((command) => command === value);
}

export function formatCredits(credits: Credits): string {
  const remaining = credits.total_credits - credits.total_usage;
  return [
    '',
    'OpenRouter Credit Balance:',
    '-'.repeat(40),
    `Total Credits:     $${credits.total_credits.toFixed(4)}`,
    `Total Usage:       $${credits.total_usage.toFixed(4)}`,
    `Remaining Credits: $${remaining.toFixed(4)}`,
    '-'.repeat(40),
  ].join('\n');
}

/**
 * Cut to 200 characters: at a sentence end past 150, else at a word
 * boundary past 150, else hard
 */
export function truncateDescription(description: string, limit = 200): string {
  if (description.length <= limit) return description;
  const head = description.slice(0, limit);
  const lastPeriod = head.lastIndexOf('.');
  const lastSpace = head.lastIndexOf(' ');
  if (lastPeriod > 150) return `${description.slice(0, lastPeriod + 1)}...`;
  if (lastSpace > 150) return `${description.slice(0, lastSpace)}...`;
  return `${head}...`;
}

function formatCount(value: number | null | undefined): string {
  return typeof value === 'number' && Number.isInteger(value) ? value.toLocaleString('en-US') : String(value ?? 'N/A');
}

function formatPrice(value: string | number | undefined): string {
  if (value === undefined) return '$N/A';
  const price = Number(value);
  return Number.isFinite(price) && String(value).trim() !== '' ? `$${price.toFixed(8)}` : `$${value}`;
}

export function filterModels(models: ModelInfo[], filters: string[]): ModelInfo[] {
  if (filters.length === 0) return models;
  const terms = filters.map((term) => term.toLowerCase());
  return models.filter((model) => {
    const id = model.id.toLowerCase();
    const name = (model.name ?? '').toLowerCase();
    return terms.some((term) => id.includes(term) || name.includes(term));
  });
}

export function formatModels(models: ModelInfo[], filters: string[] = []): string {
  if (models.length === 0) return 'No models found.';

  const filtered = filterModels(models, filters);
  if (filtered.length === 0) {
    return filters.length > 0 ? `No models found matching filter(s): ${filters.join(', ')}` : 'No models found.';
  }

  const lines: string[] = [''];
  lines.push(
    filters.length > 0
      ? `Filtered OpenRouter Models (${filtered.length} of ${models.length} total, filter: ${filters.join(', ')}):`
      : `Available OpenRouter Models (${filtered.length} total):`,
  );
  lines.push('='.repeat(100));

  for (const model of filtered) {
    const pricing = model.pricing ?? {};
    lines.push(`ID: ${model.id}`);
    lines.push(`Name: ${model.name ?? 'N/A'}`);
    lines.push(`Description: ${truncateDescription(model.description || 'No description available')}`);
    lines.push(`Context Length: ${formatCount(model.context_length)}`);
    lines.push(`Max Completion Tokens: ${formatCount(model.top_provider?.max_completion_tokens)}`);
    lines.push(
      `Pricing: ${formatPrice(pricing.prompt)}/token (prompt), ${formatPrice(pricing.completion)}/token (completion)`,
    );
    lines.push('-'.repeat(100));
  }
  return lines.join('\n');
}

/**
 * Run `--openrouter <command> [args...]` and resolve with the text to print
 */
export async function runOpenRouterCommand(
  client: OpenRouterClient,
  logger: Logger,
  command: string,
  args: string[] = [],
): Promise<string> {
  if (!isOpenRouterCommand(command)) {
    throw new ValidationError(
      `Invalid OpenRouter command '${command}'. Valid commands: ${OPENROUTER_COMMANDS.join(', ')}`,
    );
  }

  switch (command) {
    case 'check-credits':
      logger.info('User requested OpenRouter credit balance');
      return formatCredits(await client.getCredits());
    case 'list-models':
      logger.info({ filters: args }, 'User requested OpenRouter available models');
      return formatModels(await client.listModels(), args);
  }
}
