/**
 * Pattern definitions
 *
 * A pattern is a markdown file with a purpose, a functionality list and
 * yaml blocks describing its inputs, outputs and model settings.
 */

import { z } from 'zod';
import type { PatternModelSettings } from '../core/ai-service.js';

export const INPUT_TYPES = ['text', 'number', 'select', 'file', 'url', 'image_file', 'pdf_file'] as const;
export const OUTPUT_TYPES = ['text', 'json', 'table', 'list', 'code', 'command', 'markdown', 'html', 'css', 'js'] as const;
export const OUTPUT_ACTIONS = ['display', 'write', 'execute', 'none'] as const;

export type InputType = (typeof INPUT_TYPES)[number];
export type OutputType = (typeof OUTPUT_TYPES)[number];
export type OutputAction = (typeof OUTPUT_ACTIONS)[number];

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const patternInputSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  type: z.enum(INPUT_TYPES),
  required: z.boolean().default(true),
  default: scalarSchema.nullish(),
  options: z.array(z.coerce.string()).optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  group: z.string().optional(),
  ignore_undefined: z.boolean().default(false),
});

export const inputGroupSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  required_inputs: z.number().int().min(0).default(1),
  input_names: z.array(z.string()).default([]),
});

export const inputsBlockSchema = z.object({
  inputs: z.array(patternInputSchema).default([]),
  input_groups: z.array(inputGroupSchema).default([]),
});

export const patternOutputSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  type: z.enum(OUTPUT_TYPES),
  action: z.enum(OUTPUT_ACTIONS).optional(),
  required: z.boolean().default(true),
  auto_run: z.boolean().default(false),
  write_to_file: z.string().nullish(),
  example: z.unknown().optional(),
});

export const outputsBlockSchema = z.object({
  results: z.array(patternOutputSchema).optional(),
  outputs: z.array(patternOutputSchema).optional(),
});

export const modelBlockSchema = z.object({
  model: z
    .object({
      provider: z.string().optional(),
      name: z.string().optional(),
      temperature: z.number().min(0).max(2).optional(),
      max_tokens: z.number().int().positive().optional(),
      stop: z.array(z.string()).optional(),
      web_search: z.boolean().optional(),
      web_plugin: z
        .object({
          max_results: z.number().int().positive().optional(),
          search_prompt: z.string().optional(),
        })
        .optional(),
      web_search_options: z
        .object({
          search_context_size: z.enum(['low', 'medium', 'high']),
        })
        .optional(),
    })
    .optional(),
  execution: z
    .object({
      handler: z.string().default('default'),
      prompt_for_confirmation: z.boolean().default(true),
      show_visual_output_first: z.boolean().default(false),
    })
    .passthrough()
    .optional(),
});

export type PatternInput = z.output<typeof patternInputSchema>;
export type InputGroup = z.output<typeof inputGroupSchema>;
export type PatternOutput = z.output<typeof patternOutputSchema>;

export interface ExecutionSettings {
  handler: string;
  prompt_for_confirmation: boolean;
  show_visual_output_first: boolean;
}

export type PatternSource = 'private' | 'built-in';

export interface PatternSummary {
  id: string;
  name: string;
  filePath: string;
  source: PatternSource;
}

export interface PatternDefinition extends PatternSummary {
  purpose: string;
  /** Purpose and functionality sections sent as the system prompt */
  prompt: string;
  inputs: PatternInput[];
  inputGroups: InputGroup[];
  outputs: PatternOutput[];
  model?: PatternModelSettings;
  execution: ExecutionSettings;
}

export type InputValue = string | number | boolean | null;
export type PatternInputValues = Record<string, InputValue>;
