export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

// 2024-05-01 13:04:05
export function timestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLine(level: LogLevel, message: string, date?: Date): string {
  return `${timestamp(date)} - ${level.toUpperCase()} - ${message}`;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Console-backed logger. Warnings and errors go to stderr so that stdout
 * stays usable for command output.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (lineLevel: LogLevel, message: string) => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    const line = formatLine(lineLevel, message);
    if (LEVEL_ORDER[lineLevel] >= LEVEL_ORDER.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
