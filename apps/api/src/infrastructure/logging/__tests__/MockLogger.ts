import { ILogger, LogContext } from "../ILogger";

type LogCall = { message: string; context?: LogContext };
type ErrorLogCall = { message: string; error?: Error; context?: LogContext };

/**
 * Mock logger for testing
 *
 * Captures all log calls for assertion in tests
 */
export class MockLogger implements ILogger {
  public debugCalls: LogCall[] = [];
  public infoCalls: LogCall[] = [];
  public warnCalls: LogCall[] = [];
  public errorCalls: ErrorLogCall[] = [];
  public fatalCalls: ErrorLogCall[] = [];

  debug(message: string, context?: LogContext): void {
    this.debugCalls.push({ message, context });
  }

  info(message: string, context?: LogContext): void {
    this.infoCalls.push({ message, context });
  }

  warn(message: string, context?: LogContext): void {
    this.warnCalls.push({ message, context });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.errorCalls.push({ message, error, context });
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.fatalCalls.push({ message, error, context });
  }

  child(_bindings: LogContext): ILogger {
    return this;
  }

  clear(): void {
    this.debugCalls = [];
    this.infoCalls = [];
    this.warnCalls = [];
    this.errorCalls = [];
    this.fatalCalls = [];
  }
}
