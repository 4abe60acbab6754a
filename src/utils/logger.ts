import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfigManager, type LogLevel } from '../core/config';

// 로그 포맷 정의
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${stack}`;
    }
    return log;
  })
);

// 콘솔용 컬러 포맷
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `[${timestamp}] ${level}: ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  })
);

// stdout은 그래프 출력 전용이므로 모든 레벨을 stderr로 보냄
function createConsoleTransport(): winston.transport {
  return new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  });
}

export interface LoggerOptions {
  level: LogLevel;
  /** logs 디렉토리에 일별 로그 파일 기록 */
  logToFile?: boolean;
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = winston.createLogger({
      level: 'warn',
      format: logFormat,
      transports: [createConsoleTransport()],
    });
  }

  /**
   * 로거를 초기화합니다. 파일 로그는 ConfigManager의 로그 경로를 사용합니다.
   */
  async initialize(options: LoggerOptions): Promise<void> {
    if (this.initialized) return;

    const transports: winston.transport[] = [createConsoleTransport()];

    if (options.logToFile) {
      const configManager = getConfigManager();
      await configManager.ensureDirectories();
      const logsDir = configManager.getLogsDir();

      transports.push(
        new DailyRotateFile({
          dirname: logsDir,
          filename: 'app-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          format: logFormat,
        }),
        new DailyRotateFile({
          dirname: logsDir,
          filename: 'error-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { level: options.level, logToFile: options.logToFile ?? false });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * 에러 객체를 로깅합니다.
   */
  logError(error: Error, context?: string): void {
    this.error(context ? `${context}: ${error.message}` : error.message, {
      stack: error.stack,
      name: error.name,
    });
  }
}

// 싱글톤 인스턴스
const logger = new Logger();

export { logger, Logger };
export default logger;
