/**
 * File logging
 *
 * JSON lines written with pino. The file is rotated when it is opened
 * and has grown past 5 MB.
 */

import pino, { type Logger } from 'pino';
import { existsSync } from 'fs';
import { mkdir, rename, stat } from 'fs/promises';
import { dirname } from 'path';
import type { AskAIConfig } from '../config/index.js';

export type { Logger } from 'pino';

export const MAX_LOG_BYTES = 5 * 1024 * 1024;

type LogSettings = Pick<AskAIConfig, 'enable_logging' | 'log_path' | 'log_level' | 'log_rotation'>;

export interface LoggerOptions {
  /** Force debug level regardless of config */
  debug?: boolean;
}

/**
 * Shift askai.log -> askai.log.1 -> askai.log.2 ... keeping `keep` old files.
 * Returns true when a rotation happened.
 */
export async function rotateLogs(logPath: string, keep: number, maxBytes = MAX_LOG_BYTES): Promise<boolean> {
  if (!existsSync(logPath)) return false;

  const { size } = await stat(logPath);
  if (size < maxBytes) return false;

  for (let i = keep - 1; i >= 1; i--) {
    const source = `${logPath}.${i}`;
    if (existsSync(source)) {
      await rename(source, `${logPath}.${i + 1}`);
    }
  }
  await rename(logPath, `${logPath}.1`);
  return true;
}

export async function setupLogger(config: LogSettings, options: LoggerOptions = {}): Promise<Logger> {
  if (!config.enable_logging) {
    return pino({ enabled: false });
  }

  await mkdir(dirname(config.log_path), { recursive: true });
  await rotateLogs(config.log_path, config.log_rotation);

  const destination = pino.destination({ dest: config.log_path, sync: true, mkdir: true });
  return pino(
    {
      level: options.debug ? 'debug' : config.log_level,
      messageKey: 'log_message',
      base: null,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ log_level: label.toUpperCase() }),
      },
    },
    destination,
  );
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
