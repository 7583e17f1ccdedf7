import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { GatewayError } from '../errors/index.js';

/**
 * Logger module using Winston
 *
 * stdout belongs to the stdio MCP transport, so the console transport
 * writes every level to stderr.
 */

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (instance) {
      this.logger = instance;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  private ensureLogDirectory(): void {
    if (this.config.dir && !existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      silent: this.config.silent,
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ALL_LEVELS,
      }),
    ];

    if (this.config.dir) {
      transports.push(
        new winston.transports.File({
          filename: join(this.config.dir, 'docs-gateway-combined.log'),
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        }),
        new winston.transports.File({
          filename: join(this.config.dir, 'docs-gateway-error.log'),
          level: 'error',
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  /**
   * Parse size string ("10m", "512k") to bytes
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    if (!match || !match[1] || !match[2]) {
      return 10 * 1024 * 1024;
    }

    return parseInt(match[1], 10) * (units[match[2]] ?? 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log error message; accepts anything a catch clause hands over
   */
  error(message: string, error?: unknown, metadata?: object): void {
    let errorMetadata: object | undefined = metadata;
    if (error instanceof Error) {
      errorMetadata = {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error instanceof GatewayError ? { code: error.code, severity: error.severity } : {}),
        },
        ...metadata,
      };
    } else if (error !== undefined) {
      errorMetadata = { error: { message: String(error) }, ...metadata };
    }

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
