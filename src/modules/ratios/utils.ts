export type RatioLogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly RatioLogLevel[] = ['debug', 'info', 'warn', 'error'];

let minimumLevel: RatioLogLevel = 'info';

export function setLogLevel(level: RatioLogLevel): void {
  minimumLevel = level;
}

export function isLogLevel(value: string): value is RatioLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export const ratioLogger = {
  debug(message: string, context?: Record<string, unknown>) {
    writeLog('debug', message, context);
  },
  info(message: string, context?: Record<string, unknown>) {
    writeLog('info', message, context);
  },
  warn(message: string, context?: Record<string, unknown>) {
    writeLog('warn', message, context);
  },
  error(message: string, context?: Record<string, unknown>) {
    writeLog('error', message, context);
  }
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function writeLog(level: RatioLogLevel, message: string, context?: Record<string, unknown>) {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(minimumLevel)) {
    return;
  }

  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context
  };

  const output = JSON.stringify(payload);
  if (level === 'error') {
    console.error(output);
    return;
  }
  if (level === 'warn') {
    console.warn(output);
    return;
  }
  console.log(output);
}
