/**
 * Error types raised across AskAI.
 * The entry point prints `message` and exits with status 1.
 */

export class AskAIError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends AskAIError {}

export class OpenRouterError extends AskAIError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class PatternError extends AskAIError {}

export class PatternInputError extends AskAIError {
  readonly inputName: string | undefined;

  constructor(message: string, inputName?: string) {
    super(message);
    this.inputName = inputName;
  }
}

export class ChatError extends AskAIError {}

export class ValidationError extends AskAIError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
