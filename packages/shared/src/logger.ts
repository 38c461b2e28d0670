import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

/**
 * Structured logger. Outside production the output is pretty-printed to stderr
 * so it does not interleave with the CLI summary on stdout.
 */
export function createLogger(name: string, level: LogLevel = 'info') {
  return pino({
    name,
    level,
    transport:
      process.env.NODE_ENV !== 'production'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, destination: 2, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
          }
        : undefined,
  });
}

export type Logger = pino.Logger;
