export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prefix for every message, e.g. `analyzer`. */
  scope?: string;
  /** Defaults to process.stderr; stdout is reserved for summaries. */
  stream?: NodeJS.WritableStream;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  /** Same sink and level, messages tagged with `scope`. */
  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}:${scope}` : scope });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const stream = this.opts.stream ?? process.stderr;
    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;

    if (this.opts.json) {
      stream.write(`${JSON.stringify({ timestamp, level, scope, message, data })}\n`);
      return;
    }

    const text = scope ? `[${scope}] ${message}` : message;
    const line = data === undefined ? `${timestamp} ${level} ${text}` : `${timestamp} ${level} ${text} ${safeJson(data)}`;
    stream.write(`${line}\n`);
  }
}

/** Logger for a CLI run: debug under --verbose, JSON lines under --quiet. */
export function createLogger(
  flags: { verbose?: boolean; quiet?: boolean; stream?: NodeJS.WritableStream } = {},
): Logger {
  return new Logger({ level: flags.verbose ? 'debug' : 'warn', json: !!flags.quiet, stream: flags.stream });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
