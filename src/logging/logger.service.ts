import { ConfigService } from '@config/config.service';
import { Injectable, LoggerService } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';

/**
 * Nest logger backed by winston: colourised console output plus daily log files
 */
@Injectable()
export class CustomLoggerService implements LoggerService {
  private readonly winstonLogger: winston.Logger;
  private readonly logDirectory: string;
  private readonly context = 'CustomLogger';

  constructor(configService: ConfigService) {
    const { level, directory, enableFileLogging } = configService.getLoggingConfig();
    this.logDirectory = path.resolve(process.cwd(), directory);
    this.winstonLogger = winston.createLogger({
      level,
      transports: this.createTransports(level, enableFileLogging),
      exitOnError: false,
    });

    this.log(`Logger initialized with level: ${level}`, this.context);
    if (enableFileLogging) {
      this.log(`Logs root directory: ${this.logDirectory}`, this.context);
    }
  }

  private createTransports(level: string, enableFileLogging: boolean): winston.transport[] {
    const printLine = (info: winston.Logform.TransformableInfo): string => {
      const { timestamp, level: infoLevel, message, context, stack, ...meta } = info;
      const contextStr = context ? `[${String(context)}] ` : '';
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `${String(timestamp)} ${infoLevel} ${contextStr}${String(message)}${metaStr}${stackStr}`;
    };

    const consoleFormat = winston.format.combine(
      winston.format.colorize({ all: true }),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(printLine),
    );

    const transports: winston.transport[] = [new winston.transports.Console({ level, format: consoleFormat })];

    if (!enableFileLogging) {
      return transports;
    }

    // logs/YYYY-MM-DD/
    const today = new Date().toISOString().split('T')[0];
    const dailyLogDirectory = path.join(this.logDirectory, today);
    fs.mkdirSync(dailyLogDirectory, { recursive: true });

    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.uncolorize(),
      winston.format.printf(info => printLine({ ...info, level: `[${info.level.toUpperCase()}]` })),
    );

    transports.push(
      new winston.transports.File({
        filename: path.join(dailyLogDirectory, 'combined.log'),
        level,
        format: fileFormat,
      }),
      new winston.transports.File({
        filename: path.join(dailyLogDirectory, 'error.log'),
        level: 'error',
        format: fileFormat,
      }),
    );

    return transports;
  }

  log(message: unknown, context?: string): void {
    this.winstonLogger.info(this.stringify(message), { context: context || this.context });
  }

  error(message: unknown, stack?: string, context?: string): void {
    const contextName = context || this.context;

    if (message instanceof Error) {
      this.winstonLogger.error(message.message, { context: contextName, stack: stack || message.stack });
    } else if (stack) {
      this.winstonLogger.error(this.stringify(message), { context: contextName, stack });
    } else {
      this.winstonLogger.error(this.stringify(message), { context: contextName });
    }
  }

  warn(message: unknown, context?: string): void {
    this.winstonLogger.warn(this.stringify(message), { context: context || this.context });
  }

  debug(message: unknown, context?: string): void {
    this.winstonLogger.debug(this.stringify(message), { context: context || this.context });
  }

  verbose(message: unknown, context?: string): void {
    this.winstonLogger.verbose(this.stringify(message), { context: context || this.context });
  }

  /**
   * Get the Winston logger instance for advanced usage
   */
  getWinstonLogger(): winston.Logger {
    return this.winstonLogger;
  }

  /**
   * Log application startup information
   */
  logStartupInfo(port: number, environment: string): void {
    this.log('='.repeat(60), this.context);
    this.log('🚀 NODE SYNC MONITOR STARTED', this.context);
    this.log('='.repeat(60), this.context);
    this.log(`📍 Port: ${port}`, this.context);
    this.log(`🌍 Environment: ${environment}`, this.context);
    this.log(`📊 Log Level: ${this.winstonLogger.level}`, this.context);
    this.log(`⏰ Started at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  /**
   * Log application shutdown information
   */
  logShutdownInfo(): void {
    this.log('='.repeat(60), this.context);
    this.log('🛑 NODE SYNC MONITOR SHUTTING DOWN', this.context);
    this.log(`⏰ Shutdown at: ${new Date().toISOString()}`, this.context);
    this.log('='.repeat(60), this.context);
  }

  private stringify(message: unknown): string {
    return typeof message === 'string' ? message : JSON.stringify(message);
  }
}
