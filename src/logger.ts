export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

const ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Leveled logger writing to stderr, so stdout stays usable for output
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const minIdx = ORDER.indexOf(level);

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (ORDER.indexOf(lvl) < minIdx) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : '';
    const ts = new Date().toISOString();
    console.error(`${ts} [${lvl}] ${msg}${payload}`);
  }

  return {
    debug: (msg, ctx) => log('debug', msg, ctx),
    info: (msg, ctx) => log('info', msg, ctx),
    warn: (msg, ctx) => log('warn', msg, ctx),
    error: (msg, ctx) => log('error', msg, ctx),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
