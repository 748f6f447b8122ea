import { clock } from './clock.js';

export type LogLevel = 'debug' | 'info' | 'error';

export type Logger = (message: string, source?: string, level?: LogLevel) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, error: 2 };

/** Messages below `threshold` are dropped. */
export function createLogger(threshold: LogLevel = 'info'): Logger {
  return (message, source = 'exporter', level = 'info') => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

    const logMessage = `${clock.isoNow()} [${source}] ${message}`;

    if (level === 'error') {
      console.error(logMessage);
    } else {
      console.log(logMessage);
    }
  };
}

export const log: Logger = createLogger();
