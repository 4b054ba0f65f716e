/**
 * Format instructions appended to prompts
 */

import type { PatternOutput } from '../patterns/types.js';
import type { ResponseFormat } from './types.js';

const FORMAT_INSTRUCTIONS: Record<ResponseFormat, string> = {
  rawtext: 'Please provide your response as plain text.',
  md: 'Please format the response as GitHub-flavored Markdown.',
  json: 'Please respond with a valid JSON structure containing your answer.',
};

export function buildFormatInstruction(format: ResponseFormat): string {
  return FORMAT_INSTRUCTIONS[format];
}

function placeholderFor(output: PatternOutput): unknown {
  switch (output.type) {
    case 'text':
      return `sample text for ${output.name}`;
    case 'markdown':
      return `# Sample markdown for ${output.name}\n\nThis is an example of markdown content.`;
    case 'json':
      return { key: `sample value for ${output.name}` };
    case 'html':
      return `<div>Sample HTML for ${output.name}</div>`;
    case 'code':
      return `# Sample code for ${output.name}\ndef example():\n    return 'example'`;
    default:
      return `Sample content for ${output.name}`;
  }
}

/**
 * Instruction that makes the model answer with {"results": {...}} for the given outputs
 */
export function buildOutputFormatTemplate(outputs: PatternOutput[]): string | null {
  if (outputs.length === 0) return null;

  const results: Record<string, unknown> = {};
  for (const output of outputs) {
    results[output.name] = output.example ?? placeholderFor(output);
  }
  const templateJson = JSON.stringify({ results }, null, 2);

  let instruction =
    '**CRITICAL FORMATTING REQUIREMENT**\n\n' +
    'Your response MUST follow this exact JSON format without any deviations or additional text:\n\n\n' +
    `${templateJson}\n\n\nWhere:\n`;

  for (const output of outputs) {
    instruction += `- \`${output.name}\`: ${output.description}\n`;
  }

  instruction += `
⚠️ CRITICAL FORMATTING REQUIREMENTS ⚠️

1. Use the EXACT field names specified above in your response.
2. The JSON object MUST have 'results' as its top-level field.
3. Do not include any additional fields or nested objects not present in the template.
4. All required fields MUST be present exactly as shown.
5. Make sure the JSON is valid and correctly formatted.
6. DO NOT wrap your response in markdown code blocks or use triple backticks (\`\`\`).
7. DO NOT use any markdown formatting around your JSON response.
8. RETURN ONLY THE RAW JSON OBJECT - nothing else before or after.
9. DO NOT use \\n\`\`\`json\\n as start for the response field content.

This is not a suggestion - this is a strict formatting requirement that must be followed exactly.
`;

  return instruction;
}
