export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  child(scope: string): Logger;
}

/**
 * Writes `[scope] message` lines to stderr. stdout is left for the JSON
 * result the CLI prints.
 */
export function createLogger(
  scope: string,
  level: LogLevel = 'info',
  sink: (line: string) => void = (line) => console.error(line),
): Logger {
  const threshold = LOG_LEVEL_ORDER[level];

  const write = (msgLevel: LogLevel, msg: string) => {
    if (LOG_LEVEL_ORDER[msgLevel] < threshold) return;
    const tag = msgLevel === 'info' ? '' : ` ${msgLevel.toUpperCase()}`;
    sink(`[${scope}]${tag} ${msg}`);
  };

  return {
    debug: (msg) => write('debug', msg),
    info: (msg) => write('info', msg),
    warn: (msg) => write('warn', msg),
    error: (msg) => write('error', msg),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level, sink),
  };
}

/** Discards everything; the default where callers pass no logger. */
export const silentLogger: Logger = createLogger('silent', 'error', () => {});
