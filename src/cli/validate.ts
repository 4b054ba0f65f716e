import type { CliOptions } from './program.js';

export const MISSING_INPUT_MESSAGE =
  'Provide a question with -q, a URL with --url, an image with --image/--image-url, ' +
  'a PDF with --pdf/--pdf-url, or a pattern with -p';

export const PATTERN_WITH_CHAT_WARNING =
  'Chat persistence (-c) is not available with patterns (-p). The chat options will be ignored.';

export const PATTERN_WITH_QUESTION_WARNING =
  'Question parameters (-q, --url, --image, --image-url, --pdf, --pdf-url, -o, -f, --plain-md, -m) ' +
  'are ignored when using a pattern (-p). Pattern inputs should be provided using --pattern-input.';

export const PLAIN_MD_WARNING = '--plain-md can only be used with -f md. The parameter --plain-md will be ignored.';

export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

export function hasQuestionInput(options: CliOptions): boolean {
  return Boolean(
    options.question || options.url || options.image || options.imageUrl || options.pdf || options.pdfUrl,
  );
}

/**
 * Check a run that is going to call the model
 */
export function validateOptions(options: CliOptions): ValidationResult {
  const result: ValidationResult = { errors: [], warnings: [] };
  const usingPattern = options.usePattern !== undefined;

  if (!usingPattern && !hasQuestionInput(options)) {
    result.errors.push(MISSING_INPUT_MESSAGE);
    return result;
  }

  if (usingPattern && options.persistentChat !== undefined) {
    result.warnings.push(PATTERN_WITH_CHAT_WARNING);
  }
  if (
    usingPattern &&
    (hasQuestionInput(options) || options.output || options.format !== 'rawtext' || options.plainMd || options.model)
  ) {
    result.warnings.push(PATTERN_WITH_QUESTION_WARNING);
  }
  if (options.plainMd && options.format !== 'md') {
    result.warnings.push(PLAIN_MD_WARNING);
  }
  return result;
}
