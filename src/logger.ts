/**
 * Structured logging using Pino
 *
 * JSON lines on stderr, one child logger per component. Level and pretty
 * printing come from `getConfig` (`METADATA_LOG_LEVEL`, `METADATA_LOG_PRETTY`).
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from "pino";
import { getConfig, type LogLevel } from "./config.js";

export interface LogContext {
  component?: string;
  rowIndex?: number;
  field?: string;
  resourceKind?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

const defaultLoggerConfig = (): LoggerConfig => {
  const { logLevel, logPretty } = getConfig();
  return { level: logLevel, prettyPrint: logPretty };
};

function createBaseLogger(config: LoggerConfig): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: "research-metadata-core" },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname,service", destination: 2 },
      },
    });
  }

  return pino(options, process.stderr);
}

let baseLogger: PinoLogger | undefined;

const currentBase = (): PinoLogger => {
  if (!baseLogger) baseLogger = createBaseLogger(defaultLoggerConfig());
  return baseLogger;
};

/** Replace the base logger, e.g. to silence output in tests. */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...defaultLoggerConfig(), ...config });
}

export function getLogger(): PinoLogger {
  return currentBase();
}

/**
 * Component logger. Resolves the base logger on every call so that
 * `configureLogger` takes effect for loggers created earlier.
 */
export class Logger {
  private readonly component: string;
  private readonly context: LogContext;

  constructor(component: string, context: LogContext = {}) {
    this.component = component;
    this.context = context;
  }

  private get logger(): PinoLogger {
    return currentBase().child({ component: this.component, ...this.context });
  }

  child(context: LogContext): Logger {
    return new Logger(this.component, { ...this.context, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  // `error` accepts unknown since catch blocks provide unknown
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error !== undefined) {
      const err =
        context.error instanceof Error
          ? { message: context.error.message, name: context.error.name, stack: context.error.stack }
          : { message: String(context.error) };
      this.logger.error({ ...context, err }, message);
      return;
    }
    this.logger.error(context ?? {}, message);
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

export const logger = {
  reader: new Logger("TabularReader"),
  assembler: new Logger("MetadataAssembler"),
  enhancer: new Logger("Enhancer"),
  validator: new Logger("RowValidator"),
  transport: new Logger("Transport"),
  create: (component: string) => new Logger(component),
};

export default logger;
