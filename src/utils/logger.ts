import { LoggerConfig, LogLevel } from '../types/Config';

const LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  private constructor(config: LoggerConfig) {
    this.config = config;
  }

  public static getInstance(config?: LoggerConfig): Logger {
    if (!Logger.instance) {
      const envLevel = (process.env.LOG_LEVEL ?? '').toUpperCase();
      Logger.instance = new Logger(
        config || {
          level: isLogLevel(envLevel) ? envLevel : 'INFO',
          maskSensitiveData: true,
        }
      );
    }
    return Logger.instance;
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.config.level);
  }

  private maskSensitiveData(message: string): string {
    if (!this.config.maskSensitiveData) {
      return message;
    }

    // Dev.to sends its key as an `api-key` header
    let masked = message.replace(
      /"api-key"\s*:\s*"[^"]*"/gi,
      '"api-key":"***"'
    );

    masked = masked.replace(/Bearer\s+[\w-]+/gi, 'Bearer ***');
    masked = masked.replace(/(token|apiKey|secret)([\s=:"]+)[\w-]+/gi, '$1$2***');

    return masked;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = this.getTimestamp();
    const maskedMessage = this.maskSensitiveData(message);
    return `[${timestamp}] [${level}] ${maskedMessage}`;
  }

  public format(level: LogLevel, message: string): string {
    return this.formatMessage(level, message);
  }

  public debug(message: string, data?: unknown): void {
    if (this.shouldLog('DEBUG')) {
      const fullMessage = data ? `${message} ${JSON.stringify(data)}` : message;
      console.log(this.formatMessage('DEBUG', fullMessage));
    }
  }

  public info(message: string, data?: unknown): void {
    if (this.shouldLog('INFO')) {
      const fullMessage = data ? `${message} ${JSON.stringify(data)}` : message;
      console.log(this.formatMessage('INFO', fullMessage));
    }
  }

  public warn(message: string, data?: unknown): void {
    if (this.shouldLog('WARN')) {
      const fullMessage =
        data instanceof Error
          ? `${message} ${data.name}: ${data.message}`
          : data
            ? `${message} ${JSON.stringify(data)}`
            : message;
      console.warn(this.formatMessage('WARN', fullMessage));
    }
  }

  public error(message: string, error?: Error | unknown): void {
    if (this.shouldLog('ERROR')) {
      let fullMessage = message;
      if (error instanceof Error) {
        fullMessage += ` Error: ${error.message}`;
        if (error.stack) {
          fullMessage += `\nStack: ${error.stack}`;
        }
      } else if (error) {
        fullMessage += ` ${JSON.stringify(error)}`;
      }
      console.error(this.formatMessage('ERROR', fullMessage));
    }
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  public setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  public setMaskSensitiveData(mask: boolean): void {
    this.config.maskSensitiveData = mask;
  }
}

export const logger = Logger.getInstance();
export { Logger };
