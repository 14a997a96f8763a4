export type LogLevel = 'debug' | 'warn';

export type LogFields = Record<string, string | number | boolean | null>;

/**
 * Diagnostics for the CLI. `warn` is always written; `debug` only with
 * `--verbose`. Everything goes to stderr so stdout carries command output only.
 */
export interface Logger {
  debug(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
}

export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => {
    process.stderr.write(data);
  },
  now: () => new Date(),
};

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === 'string' && /^[^\s"=]+$/.test(value)) return value;
  return JSON.stringify(value);
}

/** `2025-01-15T10:00:00.000Z WARN event key=value key="two words"` */
export function formatLogLine(at: Date, level: LogLevel, event: string, fields: LogFields = {}): string {
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=${formatValue(value)}`);
  return [at.toISOString(), level.toUpperCase(), event, ...pairs].join(' ') + '\n';
}

export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStderr, now } = { ...defaultDeps, ...deps };

  return {
    debug(event: string, fields?: LogFields): void {
      if (verbose) writeStderr(formatLogLine(now(), 'debug', event, fields));
    },
    warn(event: string, fields?: LogFields): void {
      writeStderr(formatLogLine(now(), 'warn', event, fields));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
