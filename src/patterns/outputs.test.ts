import { describe, expect, it } from 'vitest';
import { fileExtensionFor, outputFileName, resolveOutputAction, shouldPromptForExecution } from './outputs.js';
import type { PatternOutput } from './types.js';

function output(partial: Partial<PatternOutput> & Pick<PatternOutput, 'name' | 'type'>): PatternOutput {
  return { description: '', required: true, auto_run: false, ...partial };
}

describe('pattern outputs', () => {
  it('maps types to file extensions', () => {
    expect(fileExtensionFor('markdown')).toBe('.md');
    expect(fileExtensionFor('table')).toBe('.csv');
    expect(fileExtensionFor('list')).toBe('.txt');
  });

  it('infers the action when none is given', () => {
    expect(resolveOutputAction(output({ name: 'page', type: 'html', write_to_file: 'index.html' }))).toBe('write');
    expect(resolveOutputAction(output({ name: 'cmd', type: 'command', auto_run: true }))).toBe('execute');
    expect(resolveOutputAction(output({ name: 'cmd', type: 'command' }))).toBe('display');
    expect(resolveOutputAction(output({ name: 'x', type: 'text', action: 'none' }))).toBe('none');
  });

  it('only offers code and commands for execution', () => {
    expect(shouldPromptForExecution(output({ name: 'a', type: 'code', auto_run: true }))).toBe(true);
    expect(shouldPromptForExecution(output({ name: 'a', type: 'text', auto_run: true }))).toBe(false);
  });

  it('adds the extension to bare file names', () => {
    expect(outputFileName(output({ name: 'styles', type: 'css', write_to_file: 'theme' }))).toBe('theme.css');
    expect(outputFileName(output({ name: 'page', type: 'html', write_to_file: 'home.htm' }))).toBe('home.htm');
    expect(outputFileName(output({ name: 'report', type: 'markdown' }))).toBe('report.md');
  });
});
