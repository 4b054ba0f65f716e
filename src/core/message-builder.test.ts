import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { PatternDefinition } from '../patterns/types.js';
import { makeTempDir, removeTempDir, silentLogger } from '../test-utils.js';
import { ValidationError } from './errors.js';
import { MessageBuilder, PATTERN_USER_MESSAGE } from './message-builder.js';

describe('MessageBuilder', () => {
  let dir: string;
  const builder = new MessageBuilder(silentLogger());

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('buildQuestionMessages', () => {
    it('puts the format instruction before the question', async () => {
      expect(await builder.buildQuestionMessages({ question: 'What is a monad?', format: 'md' })).toEqual([
        { role: 'system', content: 'Please format the response as GitHub-flavored Markdown.' },
        { role: 'user', content: 'What is a monad?' },
      ]);
    });

    it('adds piped output and file content as context', async () => {
      const file = join(dir, 'notes.txt');
      await writeFile(file, 'hello');

      const messages = await builder.buildQuestionMessages({
        question: 'Summarize',
        fileInput: file,
        terminalContext: 'ls output',
        format: 'rawtext',
      });

      expect(messages.map((m) => m.content)).toEqual([
        'Previous terminal output:\nls output',
        `The file content of ${file} to work with:\nhello`,
        'Please provide your response as plain text.',
        'Summarize',
      ]);
    });

    it('rewrites the question for a URL', async () => {
      const alone = await builder.buildQuestionMessages({ url: 'https://example.com', format: 'rawtext' });
      expect(alone[1].content).toBe('Please analyze and summarize the content from this URL: https://example.com');

      const withQuestion = await builder.buildQuestionMessages({
        question: 'Who wrote it?',
        url: 'https://example.com',
        format: 'rawtext',
      });
      expect(withQuestion[1].content).toBe(
        'Please analyze the content from this URL: https://example.com\n\nQuestion: Who wrote it?',
      );
    });

    it('attaches a local image as a data url', async () => {
      const image = join(dir, 'pic.png');
      await writeFile(image, Buffer.from([1, 2, 3]));

      const messages = await builder.buildQuestionMessages({ imagePath: image, format: 'rawtext' });

      expect(messages[1]).toEqual({
        role: 'user',
        content: [
          { type: 'text', text: 'Please analyze this image.' },
          { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
        ],
      });
    });

    it('attaches a pdf url under its file name', async () => {
      const messages = await builder.buildQuestionMessages({
        pdfUrl: 'https://example.com/docs/report.pdf?download=1',
        format: 'rawtext',
      });
      expect(messages[1].content).toEqual([
        { type: 'text', text: 'Please analyze this PDF document.' },
        {
          type: 'file',
          file: { filename: 'report.pdf', file_data: 'https://example.com/docs/report.pdf?download=1' },
        },
      ]);
    });

    it('rejects unsupported images and missing files', async () => {
      await expect(
        builder.buildQuestionMessages({ imagePath: join(dir, 'pic.tiff'), format: 'rawtext' }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        builder.buildQuestionMessages({ question: 'x', fileInput: join(dir, 'missing.txt'), format: 'rawtext' }),
      ).rejects.toThrow(`File not found: ${join(dir, 'missing.txt')}`);
    });
  });

  describe('buildPatternMessages', () => {
    const pattern: PatternDefinition = {
      id: 'topic_facts',
      name: 'Topic Facts',
      filePath: '/patterns/topic_facts.md',
      source: 'built-in',
      purpose: 'List facts.',
      prompt: '## Purpose\n\nList facts.',
      inputs: [
        {
          name: 'topic',
          description: '',
          type: 'text',
          required: true,
          ignore_undefined: false,
        },
      ],
      inputGroups: [],
      outputs: [],
      execution: { handler: 'default', prompt_for_confirmation: true, show_visual_output_first: false },
    };

    it('sends the prompt, the inputs and the format instruction', async () => {
      expect(await builder.buildPatternMessages({ pattern, inputs: { topic: 'cats' } })).toEqual([
        { role: 'system', content: '## Purpose\n\nList facts.' },
        { role: 'system', content: 'Available inputs:\n{\n  "topic": "cats"\n}' },
        { role: 'system', content: 'Please provide your response as plain text.' },
        { role: 'user', content: PATTERN_USER_MESSAGE },
      ]);
    });

    it('puts piped output and file content before the prompt', async () => {
      const notes = join(dir, 'notes.txt');
      await writeFile(notes, 'cats sleep a lot');

      const messages = await builder.buildPatternMessages({
        pattern,
        inputs: {},
        terminalContext: 'ls output',
        fileInput: notes,
      });

      expect(messages.map((m) => m.content)).toEqual([
        'Previous terminal output:\nls output',
        `The file content of ${notes} to work with:\ncats sleep a lot`,
        '## Purpose\n\nList facts.',
        'Please provide your response as plain text.',
        PATTERN_USER_MESSAGE,
      ]);
    });

    it('attaches image and pdf inputs to the user message', async () => {
      const image = join(dir, 'chart.png');
      const pdf = join(dir, 'report.pdf');
      await writeFile(image, 'png-bytes');
      await writeFile(pdf, 'pdf-bytes');
      const withFiles: PatternDefinition = {
        ...pattern,
        inputs: [
          { name: 'chart', description: '', type: 'image_file', required: true, ignore_undefined: false },
          { name: 'report', description: '', type: 'pdf_file', required: true, ignore_undefined: false },
        ],
      };

      const messages = await builder.buildPatternMessages({
        pattern: withFiles,
        inputs: { chart: image, report: pdf },
      });

      const imageData = (await readFile(image)).toString('base64');
      const pdfData = (await readFile(pdf)).toString('base64');
      expect(messages[messages.length - 1]).toEqual({
        role: 'user',
        content: [
          { type: 'text', text: PATTERN_USER_MESSAGE },
          { type: 'image_url', image_url: { url: `data:image/png;base64,${imageData}` } },
          { type: 'file', file: { filename: 'report.pdf', file_data: `data:application/pdf;base64,${pdfData}` } },
        ],
      });
    });
  });
});
