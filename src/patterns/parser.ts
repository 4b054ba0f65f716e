/**
 * Pattern markdown parser
 */

import { parse } from 'yaml';
import type { z } from 'zod';
import { PatternError } from '../core/errors.js';
import {
  inputsBlockSchema,
  modelBlockSchema,
  outputsBlockSchema,
  type ExecutionSettings,
  type InputGroup,
  type PatternDefinition,
  type PatternInput,
  type PatternSummary,
} from './types.js';

const DEFAULT_EXECUTION: ExecutionSettings = {
  handler: 'default',
  prompt_for_confirmation: true,
  show_visual_output_first: false,
};

/**
 * Name from the first line, without the "# Pattern:" prefix
 */
export function parsePatternName(content: string): string {
  const firstLine = content.split('\n')[0] ?? '';
  return firstLine.replace('# Pattern:', '').replace(/^#\s*/, '').trim();
}

/**
 * Body of a "## Heading" section, up to the next level-2 heading
 */
export function extractSection(content: string, heading: string): string | null {
  const lines = content.split('\n');
  const start = lines.findIndex((line) => line.trim().replace(/:$/, '') === `## ${heading}`);
  if (start === -1) return null;

  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (/^##\s/.test(line)) break;
    body.push(line);
  }
  return body.join('\n').trim();
}

/**
 * First ```yaml block of a section
 */
export function extractYamlBlock(section: string): string | null {
  const match = section.match(/```ya?ml\s*\n([\s\S]*?)```/);
  return match ? match[1] : null;
}

function parseYamlSection<T extends z.ZodTypeAny>(
  content: string,
  heading: string,
  schema: T,
  patternId: string,
): z.output<T> | null {
  const section = extractSection(content, heading);
  if (section === null) return null;
  const block = extractYamlBlock(section);
  if (block === null) return null;

  let data: unknown;
  try {
    data = parse(block);
  } catch (error) {
    throw new PatternError(`Invalid yaml in '${heading}' of pattern '${patternId}'`, { cause: error });
  }

  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PatternError(`Invalid '${heading}' in pattern '${patternId}': ${issues}`);
  }
  return result.data;
}

/**
 * Add groups for inputs that name a group nobody declared, and fill
 * empty input_names from the inputs that point at a group.
 */
export function resolveInputGroups(inputs: PatternInput[], declared: InputGroup[]): InputGroup[] {
  const groups = declared.map((group) => ({
    ...group,
    input_names:
      group.input_names.length > 0
        ? group.input_names
        : inputs.filter((input) => input.group === group.name).map((input) => input.name),
  }));

  const known = new Set(groups.map((group) => group.name));
  for (const input of inputs) {
    if (!input.group || known.has(input.group)) continue;
    known.add(input.group);
    groups.push({
      name: input.group,
      description: `Input group ${input.group}`,
      required_inputs: 1,
      input_names: inputs.filter((other) => other.group === input.group).map((other) => other.name),
    });
  }
  return groups;
}

export function buildPatternPrompt(purpose: string, functionality: string): string {
  const sections: string[] = [];
  if (purpose) sections.push(`## Purpose\n\n${purpose}`);
  if (functionality) sections.push(`## Functionality\n\n${functionality}`);
  return sections.join('\n\n');
}

export function parsePattern(content: string, summary: PatternSummary): PatternDefinition {
  const purpose = extractSection(content, 'Purpose') ?? '';
  const functionality = extractSection(content, 'Functionality') ?? '';

  const inputsBlock = parseYamlSection(content, 'Pattern Inputs', inputsBlockSchema, summary.id);
  const outputsBlock = parseYamlSection(content, 'Pattern Outputs', outputsBlockSchema, summary.id);
  const modelBlock = parseYamlSection(content, 'Model Configuration', modelBlockSchema, summary.id);

  const inputs = inputsBlock?.inputs ?? [];

  return {
    ...summary,
    purpose,
    prompt: buildPatternPrompt(purpose, functionality),
    inputs,
    inputGroups: resolveInputGroups(inputs, inputsBlock?.input_groups ?? []),
    outputs: outputsBlock?.results ?? outputsBlock?.outputs ?? [],
    model: modelBlock?.model,
    execution: { ...DEFAULT_EXECUTION, ...modelBlock?.execution },
  };
}
