import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import type { LogLevel } from '../types';
import { getConfigManager } from '../core/config';

// 개발 모드 여부
const isDev = process.env.NODE_ENV === 'development';

// 환경 변수로 지정한 로그 레벨
const envLevel = process.env.BLPACK_LOG_LEVEL;

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

export interface LoggerOptions {
  /** 파일 로그 레벨 */
  level?: LogLevel;
  /** 로그 디렉토리 (기본: ~/.blpack/logs) */
  logsDir?: string;
}

class Logger {
  private logger: winston.Logger;
  private initialized = false;

  constructor() {
    // 기본 로거 생성 (초기화 전 사용)
    this.logger = winston.createLogger({
      level: envLevel || (isDev ? 'debug' : 'warn'),
      format: logFormat,
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
        }),
      ],
    });
  }

  /**
   * 로거를 초기화합니다. ConfigManager에서 로그 경로를 가져옵니다.
   */
  async initialize(options: LoggerOptions = {}): Promise<void> {
    if (this.initialized) return;

    let logsDir = options.logsDir;
    if (!logsDir) {
      const configManager = getConfigManager();
      await configManager.ensureDirectories();
      logsDir = configManager.getLogsDir();
    }
    const level = envLevel || options.level || 'info';

    // 파일 로테이션 트랜스포트 설정
    const fileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d', // 30일 보관
      format: logFormat,
    });

    // 에러 전용 파일 트랜스포트
    const errorFileTransport = new DailyRotateFile({
      dirname: logsDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: logFormat,
    });

    // CLI 출력과 섞이지 않도록 콘솔은 경고 이상만 (개발 모드는 전체)
    const transports: winston.transport[] = [
      fileTransport,
      errorFileTransport,
      new winston.transports.Console({
        level: isDev ? 'debug' : 'warn',
        format: consoleFormat,
      }),
    ];

    // 로거 재설정
    this.logger = winston.createLogger({
      level: isDev ? 'debug' : level,
      format: logFormat,
      transports,
    });

    this.initialized = true;
    this.debug('로거 초기화 완료', { logsDir, level });
  }

  /**
   * 에러 로그
   */
  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  /**
   * 경고 로그
   */
  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * 정보 로그
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  /**
   * 디버그 로그
   */
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
