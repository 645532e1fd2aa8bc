/**
 * Log level type
 */
export type LogLevel = "info" | "warn" | "error";

/**
 * Engine stages that tag log entries
 */
export type LogStage =
  | "plan"
  | "lock"
  | "execute"
  | "precheck"
  | "dry-run"
  | "schema";

/**
 * Log data input structure (without level, which is determined by the method called)
 */
export interface LogDataInput {
  /** Migration unit id the entry belongs to */
  unit?: string;
  stage?: LogStage;
  message: string;
  error?: unknown;
}

/**
 * Complete log data structure (with level)
 */
export interface LogData extends LogDataInput {
  level: LogLevel;
}

/**
 * Logger interface used by every engine component
 */
export interface Logger {
  info: (data: LogDataInput) => void;
  error: (data: LogDataInput) => void;
  warn: (data: LogDataInput) => void;
}

/**
 * Build a log prefix from structured log data
 */
export function buildLogPrefix(data: LogData): string {
  const parts: string[] = [];

  if (data.unit) {
    parts.push(`[${data.unit}]`);
  }

  if (data.stage) {
    parts.push(`[${data.stage}]`);
  }

  return parts.length > 0 ? `${parts.join(" ")} ` : "";
}

/**
 * Render an unknown thrown value as a single line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
}

/**
 * Abstract base logger class that implements the Logger interface
 */
export abstract class BaseLogger implements Logger {
  abstract info(data: LogDataInput): void;

  abstract error(data: LogDataInput): void;

  abstract warn(data: LogDataInput): void;

  /**
   * Create a prefixed logger that fills in unit and stage when the entry has none
   */
  createPrefixed(prefix: { unit?: string; stage?: LogStage }): Logger {
    return new PrefixedLogger(this, prefix);
  }
}

/**
 * Console logger implementation
 */
export class ConsoleLogger extends BaseLogger {
  info(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "info" };
    // eslint-disable-next-line no-console
    console.log(`${buildLogPrefix(logData)}${logData.message}`);
  }

  error(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "error" };
    const prefix = buildLogPrefix(logData);

    if (logData.error === undefined) {
      // eslint-disable-next-line no-console
      console.error(`${prefix}${logData.message}`);
      return;
    }

    // eslint-disable-next-line no-console
    console.error(`${prefix}${logData.message}`, logData.error);
  }

  warn(data: LogDataInput): void {
    const logData: LogData = { ...data, level: "warn" };
    // eslint-disable-next-line no-console
    console.warn(`${buildLogPrefix(logData)}${logData.message}`);
  }
}

/**
 * Mutable logger that can be toggled on/off for unit tests
 */
export class MutableLogger extends BaseLogger {
  private baseLogger: Logger;
  private verbose: boolean;

  /**
   * @param baseLogger The underlying logger to use when verbose is true
   * @param verbose Whether to output logs (defaults to true)
   */
  constructor(baseLogger: Logger, verbose: boolean = true) {
    super();
    this.baseLogger = baseLogger;
    this.verbose = verbose;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }

  info(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.info(data);
    }
  }

  error(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.error(data);
    }
  }

  warn(data: LogDataInput): void {
    if (this.verbose) {
      this.baseLogger.warn(data);
    }
  }
}

/**
 * Prefixed logger that adds unit and stage information to log entries
 * @internal This class is intended for internal use only
 */
export class PrefixedLogger extends BaseLogger {
  private baseLogger: Logger;
  private prefix: { unit?: string; stage?: LogStage };

  constructor(
    baseLogger: Logger,
    prefix: { unit?: string; stage?: LogStage },
  ) {
    super();
    this.baseLogger = baseLogger;
    this.prefix = prefix;
  }

  private fill(data: LogDataInput): LogDataInput {
    return {
      ...data,
      unit: data.unit || this.prefix.unit,
      stage: data.stage || this.prefix.stage,
    };
  }

  info(data: LogDataInput): void {
    this.baseLogger.info(this.fill(data));
  }

  error(data: LogDataInput): void {
    this.baseLogger.error(this.fill(data));
  }

  warn(data: LogDataInput): void {
    this.baseLogger.warn(this.fill(data));
  }
}

/**
 * Default console logger instance
 */
export const consoleLogger: Logger = new ConsoleLogger();

/**
 * Create a unit-specific logger that prefills unit and stage information
 */
export function createPrefixedLogger(
  baseLogger: Logger,
  prefix: { unit?: string; stage?: LogStage },
): Logger {
  if (baseLogger instanceof BaseLogger) {
    return baseLogger.createPrefixed(prefix);
  }

  return new PrefixedLogger(baseLogger, prefix);
}
