/**
 * Command execution
 *
 * Commands produced by a pattern only run after the user has seen them
 * and confirmed. Commands that need a shell are confirmed twice.
 */

import { spawn } from 'child_process';
import chalk from 'chalk';
import type { Logger } from 'pino';
import { parseArgsStringToArgv } from 'string-argv';
import { errorMessage } from '../core/errors.js';
import { formatError, formatWarning } from '../utils/console.js';
import type { Prompter } from '../utils/prompt.js';
import { stripCodeFences } from './common.js';

const SHELL_CHARACTERS = /[|&;$`]/;

/** Resolves with the exit code */
export type CommandRunner = (command: string, args: string[], useShell: boolean) => Promise<number>;

export const spawnRunner: CommandRunner = (command, args, useShell) =>
  new Promise((resolve, reject) => {
    const child = useShell
      ? spawn(command, { shell: true, stdio: 'inherit' })
      : spawn(command, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code ?? 1));
  });

export function needsShell(command: string): boolean {
  return SHELL_CHARACTERS.test(command);
}

export function securityBanner(command: string, outputName: string): string {
  const rule = '='.repeat(70);
  return [
    chalk.yellow(rule),
    chalk.bold.yellow(`COMMAND FROM OUTPUT '${outputName}'`),
    chalk.yellow('Review it carefully. It runs with your permissions.'),
    chalk.yellow(rule),
    command,
    chalk.yellow(rule),
  ].join('\n');
}

export interface ExecutionResult {
  command: string;
  executed: boolean;
  exitCode?: number;
}

export class CommandExecutor {
  private logger: Logger;
  private prompter: Prompter | undefined;
  private runner: CommandRunner;

  constructor(logger: Logger, prompter?: Prompter, runner: CommandRunner = spawnRunner) {
    this.logger = logger;
    this.prompter = prompter;
    this.runner = runner;
  }

  async execute(rawCommand: string, outputName: string): Promise<ExecutionResult> {
    const command = stripCodeFences(rawCommand);
    if (!command) {
      return { command, executed: false };
    }

    console.log(securityBanner(command, outputName));

    if (!this.prompter) {
      console.log(formatWarning('No interactive terminal, command not executed'));
      return { command, executed: false };
    }
    if (!(await this.prompter.confirm('Execute this command?', false))) {
      console.log('Command execution cancelled');
      return { command, executed: false };
    }

    const useShell = needsShell(command);
    if (useShell) {
      console.log(formatWarning('This command uses shell features (pipes, redirects, variables or chaining)'));
      if (!(await this.prompter.confirm('Run it through the shell?', false))) {
        console.log('Command execution cancelled');
        return { command, executed: false };
      }
    }

    const [program = '', ...args] = useShell ? [command] : parseArgsStringToArgv(command);
    this.logger.info({ command, shell: useShell, output: outputName }, 'Executing command');
    let exitCode: number;
    try {
      exitCode = await this.runner(program, args, useShell);
    } catch (error) {
      this.logger.error({ command, error: errorMessage(error) }, 'Command could not be started');
      console.error(formatError(`Could not run command: ${errorMessage(error)}`));
      return { command, executed: false };
    }
    this.logger.info({ command, exit_code: exitCode }, 'Command finished');
    if (exitCode !== 0) {
      console.log(formatWarning(`Command exited with code ${exitCode}`));
    }
    return { command, executed: true, exitCode };
  }
}
