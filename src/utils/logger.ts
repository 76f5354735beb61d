import pino, { type LevelWithSilent, type Logger, type TransportTargetOptions } from 'pino';
import { env } from '../config/env.js';

export type { Logger };

export interface LoggerOptions {
  /** Extra destination; standard error is always written. */
  logFile?: string;
  level?: LevelWithSilent;
  pretty?: boolean;
}

const STDERR = 2;

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? env.LOG_LEVEL;
  const pretty = options.pretty ?? env.NODE_ENV === 'development';

  const targets: TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true, destination: STDERR } }
      : { target: 'pino/file', level, options: { destination: STDERR } },
  ];

  if (options.logFile) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: options.logFile, mkdir: true },
    });
  }

  return pino({ level }, pino.transport({ targets }));
}

export const silentLogger: Logger = pino({ level: 'silent' });
