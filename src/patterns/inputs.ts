/**
 * Pattern input validation and collection
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import type { Logger } from 'pino';
import { PatternInputError } from '../core/errors.js';
import { printErrorOrWarning } from '../utils/console.js';
import type { Prompter } from '../utils/prompt.js';
import type { InputGroup, InputValue, PatternDefinition, PatternInput, PatternInputValues } from './types.js';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp'];

const URL_PATTERN =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;

/**
 * Check a raw value against an input definition.
 * Returns the error message, or null when the value is fine.
 */
export function validateInputValue(input: PatternInput, value: string): string | null {
  switch (input.type) {
    case 'number': {
      const num = Number(value);
      if (value.trim() === '' || Number.isNaN(num)) return 'Value must be a number';
      if (input.min !== undefined && num < input.min) return `Value must be >= ${input.min}`;
      if (input.max !== undefined && num > input.max) return `Value must be <= ${input.max}`;
      return null;
    }
    case 'select': {
      const options = input.options ?? [];
      return options.includes(value) ? null : `Value must be one of: ${options.join(', ')}`;
    }
    case 'file':
      return existsSync(value) ? null : `File not found: ${value}`;
    case 'image_file': {
      if (!existsSync(value)) return `Image file not found: ${value}`;
      if (!IMAGE_EXTENSIONS.includes(extname(value).toLowerCase())) {
        return `File does not appear to be an image. Supported formats: ${IMAGE_EXTENSIONS.join(', ')}`;
      }
      return null;
    }
    case 'pdf_file': {
      if (!existsSync(value)) return `PDF file not found: ${value}`;
      if (extname(value).toLowerCase() !== '.pdf') {
        return 'File does not appear to be a PDF. Only .pdf extension is supported.';
      }
      return null;
    }
    case 'url':
      return URL_PATTERN.test(value) ? null : 'Value must be a valid URL (http:// or https://)';
    case 'text':
      return null;
  }
}

export interface InputProcessingOptions {
  /** Prompt for values that were not provided */
  interactive: boolean;
  prompter?: Prompter;
}

export class PatternInputProcessor {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Merge provided values with prompted ones and check every rule.
   * Throws PatternInputError when a required value is missing or invalid.
   */
  async process(
    pattern: PatternDefinition,
    provided: Record<string, unknown> = {},
    options: InputProcessingOptions,
  ): Promise<PatternInputValues> {
    const result: PatternInputValues = {};
    if (pattern.inputs.length === 0) return result;

    const byName = new Map(pattern.inputs.map((input) => [input.name, input]));
    const prompter = options.interactive ? options.prompter : undefined;

    for (const [name, raw] of Object.entries(provided)) {
      const input = byName.get(name);
      if (!input) {
        this.logger.warn({ input: name, pattern_id: pattern.id }, 'Ignoring value for unknown pattern input');
        continue;
      }
      result[name] = await this.acceptValue(input, String(raw));
    }

    if (prompter) {
      for (const group of pattern.inputGroups) {
        await this.promptGroup(group, byName, result, prompter);
      }
    }

    const grouped = new Set(pattern.inputGroups.flatMap((group) => group.input_names));
    for (const input of pattern.inputs) {
      if (input.name in result || grouped.has(input.name)) continue;

      if (!input.required) {
        if (prompter && !input.ignore_undefined) {
          result[input.name] = await this.promptValue(input, prompter);
        } else if (input.default !== undefined && input.default !== null) {
          result[input.name] = input.default;
        }
        continue;
      }

      if (prompter) {
        result[input.name] = await this.promptValue(input, prompter);
      } else if (!input.ignore_undefined) {
        throw new PatternInputError(`Required input '${input.name}' is missing`, input.name);
      }
    }

    for (const group of pattern.inputGroups) {
      const count = group.input_names.filter((name) => name in result).length;
      if (count < group.required_inputs) {
        throw new PatternInputError(
          `Group '${group.name}' requires at least ${group.required_inputs} input(s), but only ${count} provided`,
        );
      }
    }

    this.logger.debug({ pattern_id: pattern.id, inputs: Object.keys(result) }, 'Processed pattern inputs');
    return result;
  }

  /**
   * Validate a value and convert it to what the model receives
   */
  private async acceptValue(input: PatternInput, value: string): Promise<InputValue> {
    const error = validateInputValue(input, value);
    if (error) {
      throw new PatternInputError(`Invalid value for '${input.name}': ${error}`, input.name);
    }
    if (input.type === 'number') return Number(value);
    if (input.type === 'file') return (await readFile(value, 'utf-8')).trim();
    return value;
  }

  private async promptGroup(
    group: InputGroup,
    byName: Map<string, PatternInput>,
    result: PatternInputValues,
    prompter: Prompter,
  ): Promise<void> {
    const members = group.input_names.flatMap((name) => byName.get(name) ?? []);
    const providedCount = members.filter((input) => input.name in result).length;
    const available = members.filter((input) => !(input.name in result));
    const needed = Math.min(group.required_inputs - providedCount, available.length);
    if (needed <= 0) return;

    console.log(`\n${group.description ?? `Input group ${group.name}`}`);
    console.log(`Select which input(s) to provide (${group.required_inputs} required):`);
    available.forEach((input, i) => console.log(`${i + 1}. ${input.name}: ${input.description}`));

    const selections: PatternInput[] = [];
    while (selections.length < needed) {
      const choice = await prompter.ask(`Select input number (1-${available.length}): `);
      const index = Number.parseInt(choice, 10);
      if (Number.isNaN(index) || index < 1 || index > available.length) {
        console.log(`Please enter a number between 1 and ${available.length}`);
        continue;
      }
      const selected = available[index - 1];
      if (selections.includes(selected)) {
        console.log(`You've already selected ${selected.name}`);
        continue;
      }
      selections.push(selected);
    }

    for (const input of selections) {
      result[input.name] = await this.promptValue(input, prompter);
    }
  }

  private async promptValue(input: PatternInput, prompter: Prompter): Promise<InputValue> {
    for (;;) {
      console.log(`\n${input.description}`);
      if (input.type === 'select') console.log(`Options: ${(input.options ?? []).join(', ')}`);
      if (!input.required) console.log('(Optional - press Enter to skip)');

      const value = await prompter.ask(`${input.name}: `);
      if (!value) {
        if (!input.required) return input.default ?? null;
        continue;
      }

      try {
        return await this.acceptValue(input, value);
      } catch (error) {
        if (!(error instanceof PatternInputError)) throw error;
        printErrorOrWarning(error.message);
      }
    }
  }
}
