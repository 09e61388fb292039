export type LogFields = Record<string, unknown>;

export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

type ConsoleSink = Pick<Console, 'log' | 'warn' | 'error'>;

function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? JSON.stringify(value) : String(value)}`);
  return parts.length ? ` ${parts.join(' ')}` : '';
}

export function createLogger(scope: string, sink: ConsoleSink = console): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message, fields) => sink.log(`INFO ${prefix} ${message}${formatFields(fields)}`),
    warn: (message, fields) => sink.warn(`WARN ${prefix} ${message}${formatFields(fields)}`),
    error: (message, fields) => sink.error(`ERROR ${prefix} ${message}${formatFields(fields)}`),
    child: (child) => createLogger(`${scope}:${child}`, sink),
  };
}

/** Discards everything; handy where a component needs a logger but output is noise. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
