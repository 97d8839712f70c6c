import pino from "pino";
import { inject, injectable } from "tsyringe";
import { ILogger, LogContext } from "./ILogger";
import { IConfig } from "../../shared/config/IConfig";
import { TYPES } from "../../di/types";

/**
 * ILogger over an existing pino instance
 */
class PinoLoggerAdapter implements ILogger {
  constructor(protected readonly logger: pino.Logger) {}

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
    return new PinoLoggerAdapter(this.logger.child(bindings));
  }
}

/**
 * Pino logger implementation
 *
 * Pretty-prints in development, plain JSON lines everywhere else
 */
@injectable()
export class PinoLogger extends PinoLoggerAdapter {
  constructor(@inject(TYPES.Config) config: IConfig) {
    super(
      pino({
        name: "commentary-api",
        level: config.logLevel,
        transport:
          config.nodeEnv === "development"
            ? {
                target: "pino-pretty",
                options: {
                  colorize: true,
                  ignore: "pid,hostname",
                  translateTime: "SYS:standard",
                },
              }
            : undefined,
      }),
    );
  }
}
