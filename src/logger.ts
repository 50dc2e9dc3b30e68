import pino from 'pino';
import type { LoggerOptions, TransportTargetOptions } from 'pino';
import type { LoggingConfig } from './config';

export type Logger = pino.Logger;

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: 'HH:MM:ss',
  ignore: 'pid,hostname,name',
};

/**
 * Pretty output on stdout; with `file` set the same records are also
 * appended to that file as JSON lines.
 */
export function createLogger(config: LoggingConfig, name = 'bridge'): Logger {
  const targets: TransportTargetOptions[] = [
    { target: 'pino-pretty', level: config.level, options: PRETTY_OPTIONS },
  ];
  if (config.file) {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: config.file, mkdir: true },
    });
  }

  const options: LoggerOptions = {
    name,
    level: config.level,
    transport: { targets },
  };
  return pino(options);
}
