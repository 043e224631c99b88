type LogLevel = 'info' | 'warn' | 'error';

export type Logger = Record<LogLevel, (message: string) => void>;

function write(scope: string, level: LogLevel, message: string): void {
  const line = `[${scope}] ${message}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    info: (message) => write(scope, 'info', message),
    warn: (message) => write(scope, 'warn', message),
    error: (message) => write(scope, 'error', message),
  };
}
