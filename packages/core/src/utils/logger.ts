import { Logger, LogLevel } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

/**
 * Receives one formatted log line.
 */
export type LogSink = (line: string) => void;

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const PREFIXES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

/** Shared by a logger and all of its children */
interface LoggerState {
  level: LogLevel;
  sink: LogSink;
}

/**
 * Console logger with levels and optional scopes.
 *
 * Lines go to stderr, so command output on stdout can be piped. Children
 * created with child() share the parent's level and sink.
 */
export class ConsoleLogger implements Logger {
  private readonly state: LoggerState;
  private readonly scope: string | undefined;

  constructor(state: LoggerState, scope?: string) {
    this.state = state;
    this.scope = scope;
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.state.level);
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (this.isEnabled(level)) {
      this.state.sink(this.format(level, message, meta));
    }
  }

  private format(level: LogLevel, message: string, meta: unknown): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    let formatted = `${new Date().toISOString()} ${PREFIXES[level]}${scope} ${message}`;

    if (meta instanceof Error) {
      // JSON.stringify(new Error()) is {}
      formatted += `\n${JSON.stringify({ name: meta.name, message: meta.message, stack: meta.stack }, null, 2)}`;
    } else if (meta !== null && typeof meta === 'object') {
      formatted += `\n${JSON.stringify(meta, null, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }
}

export function createLogger(level: LogLevel, sink: LogSink = line => console.error(line)): ConsoleLogger {
  return new ConsoleLogger({ level, sink });
}

/**
 * Default log level from the environment:
 * PKGFORMULA_VERBOSE=1 enables debug, NODE_ENV=development enables info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env[ENV_VARS.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = createLogger(resolveLogLevel());
