import pino from "pino";
import { ILogger, LogContext } from "./ILogger";

/**
 * Pino logger implementation
 */
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor(
    name: string | pino.Logger = "orthodox-prompt-api",
    level = process.env.LOG_LEVEL || "info",
  ) {
    if (typeof name !== "string") {
      this.logger = name;
      return;
    }

    this.logger = pino({
      name,
      level,
      transport:
        process.env.NODE_ENV !== "production"
          ? {
              target: "pino-pretty",
              options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:standard",
              },
            }
          : undefined,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  child(bindings: LogContext): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }
}
