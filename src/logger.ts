import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function createLogger(
  options: {
    name?: string;
    level?: LogLevel;
  } = {},
): Logger {
  return pino({
    name: options.name || 'chat-tasks',
    level: options.level || 'info',
    base: {},
    formatters: {
      level: (label: string, _number: number) => ({
        level: label,
      }),
    },
    timestamp: () => `,"time":"${new Date(Date.now()).toISOString()}"`,
  });
}
