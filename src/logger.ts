import type { LogLevelName } from './models.js';

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let minLevel: Level = 'info';

export function setLogLevel(level: LogLevelName | Level): void {
  switch (level) {
    case 'DEBUG':
    case 'debug':
      minLevel = 'debug';
      break;
    case 'INFO':
    case 'info':
      minLevel = 'info';
      break;
    case 'WARNING':
    case 'warn':
      minLevel = 'warn';
      break;
    case 'ERROR':
    case 'CRITICAL':
    case 'error':
      minLevel = 'error';
      break;
  }
}

export interface Logger {
  debug: (msg: string, meta?: object) => void;
  info: (msg: string, meta?: object) => void;
  warn: (msg: string, meta?: object) => void;
  error: (msg: string, meta?: object) => void;
}

export function createLogger(service: string): Logger {
  const log = (level: Level, msg: string, meta?: object) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        service,
        message: msg,
        ...meta,
      })
    );
  };
  return {
    debug: (msg: string, meta?: object) => log('debug', msg, meta),
    info: (msg: string, meta?: object) => log('info', msg, meta),
    warn: (msg: string, meta?: object) => log('warn', msg, meta),
    error: (msg: string, meta?: object) => log('error', msg, meta),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
