import { isLexNormError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  /** One JSON object per line instead of the human-readable form */
  structuredOutput: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[lexnorm]",
  minLevel: "info",
  structuredOutput: false,
};

// Looked up per call so tests can spy on the console.
const CONSOLE: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** What the pipeline logs through: the root logger, a child, or a test double. */
export interface LogSink {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: unknown): void;
  error(message: string, context?: LogContext, error?: unknown): void;
}

function describeError(error: unknown): string | undefined {
  if (isLexNormError(error)) return error.toLogMessage();
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return undefined;
}

function renderContext(context: LogContext): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(" ");
}

export class Logger implements LogSink {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    this.write("warn", message, context, error);
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    this.write("error", message, context, error);
  }

  child(context: LogContext): ContextualLogger {
    return new ContextualLogger(this, context);
  }

  private write(level: LogLevel, message: string, context: LogContext = {}, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) return;

    const detail = describeError(error);
    if (this.config.structuredOutput) {
      CONSOLE[level](
        JSON.stringify({
          level,
          message,
          timestamp: new Date().toISOString(),
          context: Object.keys(context).length > 0 ? context : undefined,
          error: detail === undefined ? undefined : {
            code: isLexNormError(error) ? error.code : undefined,
            detail,
          },
        })
      );
      return;
    }

    const parts = [this.config.prefix, `[${level.toUpperCase()}]`, message];
    if (Object.keys(context).length > 0) parts.push(`| ${renderContext(context)}`);
    if (detail !== undefined) parts.push(`| ${detail}`);
    CONSOLE[level](parts.join(" "));
  }
}

/**
 * Logger that stamps a fixed context (the document being converted, the
 * batch directory) onto every entry.
 */
export class ContextualLogger implements LogSink {
  constructor(
    private readonly parent: LogSink,
    private readonly context: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.context, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.context, ...context });
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    this.parent.warn(message, { ...this.context, ...context }, error);
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    this.parent.error(message, { ...this.context, ...context }, error);
  }

  child(context: LogContext): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...context });
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Settings from LOG_LEVEL and LEXNORM_STRUCTURED_LOGS. Unknown levels are
 * ignored.
 */
export function loggerConfigFromEnv(env: Record<string, string | undefined> = process.env): Partial<LoggerConfig> {
  const config: Partial<LoggerConfig> = {};
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(level)) config.minLevel = level;
  if (env.LEXNORM_STRUCTURED_LOGS === "true") config.structuredOutput = true;
  return config;
}

export const logger = new Logger(loggerConfigFromEnv());

export function createLogger(context: LogContext): ContextualLogger {
  return logger.child(context);
}
