/**
 * Message Builder
 *
 * Turns command line input (question, files, URLs, images, PDFs) or a
 * pattern with its inputs into the message list sent to the model.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import type { Logger } from 'pino';
import { ValidationError } from './errors.js';
import { buildFormatInstruction, buildOutputFormatTemplate } from './format.js';
import type { ContentPart, Message, ResponseFormat } from './types.js';
import type { PatternDefinition, PatternInputValues } from '../patterns/types.js';

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
};

export const PATTERN_USER_MESSAGE = 'Execute the pattern with the provided inputs.';

export interface QuestionRequest {
  question?: string;
  fileInput?: string;
  url?: string;
  imagePath?: string;
  imageUrl?: string;
  pdfPath?: string;
  pdfUrl?: string;
  format: ResponseFormat;
  /** Output piped into askai */
  terminalContext?: string;
}

export interface PatternRequest {
  pattern: PatternDefinition;
  inputs: PatternInputValues;
  fileInput?: string;
  terminalContext?: string;
}

export function imageMimeType(path: string): string {
  const mime = IMAGE_MIME_TYPES[extname(path).toLowerCase()];
  if (!mime) {
    throw new ValidationError(
      `Unsupported image format: ${path}. Supported formats: ${Object.keys(IMAGE_MIME_TYPES).join(', ')}`,
    );
  }
  return mime;
}

export async function encodeFileToDataUrl(path: string, mimeType: string): Promise<string> {
  if (!existsSync(path)) {
    throw new ValidationError(`File does not exist at path: ${path}`);
  }
  const data = await readFile(path);
  return `data:${mimeType};base64,${data.toString('base64')}`;
}

/**
 * Everything piped into stdin, or undefined when stdin is a terminal
 */
export async function readTerminalContext(stdin: NodeJS.ReadStream = process.stdin): Promise<string | undefined> {
  if (stdin.isTTY) return undefined;

  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  const text = Buffer.concat(chunks).toString('utf-8').trim();
  return text || undefined;
}

export class MessageBuilder {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Context shared by both modes: piped terminal output and a file to work with
   */
  private async contextMessages(terminalContext?: string, fileInput?: string): Promise<Message[]> {
    const messages: Message[] = [];
    if (terminalContext) {
      messages.push({ role: 'system', content: `Previous terminal output:\n${terminalContext}` });
    }
    if (fileInput) {
      if (!existsSync(fileInput)) {
        throw new ValidationError(`File not found: ${fileInput}`);
      }
      const content = await readFile(fileInput, 'utf-8');
      messages.push({ role: 'system', content: `The file content of ${fileInput} to work with:\n${content}` });
    }
    return messages;
  }

  async buildQuestionMessages(request: QuestionRequest): Promise<Message[]> {
    const messages = await this.contextMessages(request.terminalContext, request.fileInput);
    messages.push({ role: 'system', content: buildFormatInstruction(request.format) });

    let question = request.question;
    if (request.url) {
      question = question
        ? `Please analyze the content from this URL: ${request.url}\n\nQuestion: ${question}`
        : `Please analyze and summarize the content from this URL: ${request.url}`;
    }

    const attachments: ContentPart[] = [];
    if (request.imagePath) {
      const url = await encodeFileToDataUrl(request.imagePath, imageMimeType(request.imagePath));
      attachments.push({ type: 'image_url', image_url: { url } });
    }
    if (request.imageUrl) {
      attachments.push({ type: 'image_url', image_url: { url: request.imageUrl } });
    }
    if (request.pdfPath) {
      const fileData = await encodeFileToDataUrl(request.pdfPath, 'application/pdf');
      attachments.push({ type: 'file', file: { filename: basename(request.pdfPath), file_data: fileData } });
    }
    if (request.pdfUrl) {
      const filename = request.pdfUrl.split(/[?#]/)[0].split('/').pop() || 'document.pdf';
      attachments.push({ type: 'file', file: { filename, file_data: request.pdfUrl } });
    }

    if (attachments.length === 0) {
      messages.push({ role: 'user', content: question ?? '' });
    } else {
      const hasPdf = Boolean(request.pdfPath || request.pdfUrl);
      const text = question ?? (hasPdf ? 'Please analyze this PDF document.' : 'Please analyze this image.');
      messages.push({ role: 'user', content: [{ type: 'text', text }, ...attachments] });
    }

    this.logger.debug(
      { message_count: messages.length, attachments: attachments.length, format: request.format },
      'Built question messages',
    );
    return messages;
  }

  async buildPatternMessages(request: PatternRequest): Promise<Message[]> {
    const { pattern, inputs } = request;
    const messages = await this.contextMessages(request.terminalContext, request.fileInput);
    messages.push({ role: 'system', content: pattern.prompt });

    if (Object.keys(inputs).length > 0) {
      messages.push({ role: 'system', content: `Available inputs:\n${JSON.stringify(inputs, null, 2)}` });
    }

    const template = buildOutputFormatTemplate(pattern.outputs);
    messages.push({ role: 'system', content: template ?? buildFormatInstruction('rawtext') });

    const attachments: ContentPart[] = [];
    for (const input of pattern.inputs) {
      const value = inputs[input.name];
      if (typeof value !== 'string' || !value) continue;
      if (input.type === 'image_file') {
        const url = await encodeFileToDataUrl(value, imageMimeType(value));
        attachments.push({ type: 'image_url', image_url: { url } });
      } else if (input.type === 'pdf_file') {
        const fileData = await encodeFileToDataUrl(value, 'application/pdf');
        attachments.push({ type: 'file', file: { filename: basename(value), file_data: fileData } });
      }
    }

    messages.push({
      role: 'user',
      content: attachments.length > 0 ? [{ type: 'text', text: PATTERN_USER_MESSAGE }, ...attachments] : PATTERN_USER_MESSAGE,
    });

    this.logger.debug(
      { pattern_id: pattern.id, message_count: messages.length, attachments: attachments.length },
      'Built pattern messages',
    );
    return messages;
  }
}
