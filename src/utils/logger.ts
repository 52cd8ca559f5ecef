import { appendFileSync } from 'fs';

/**
 * 優先度付きのログレベル
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * ロガー設定
 */
export interface LoggerConfig {
  context: string;
  logFile?: string | undefined;
  minLevel?: LogLevel | undefined;
}

/**
 * 設定ファイルのレベル名をLogLevelに変換
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

/**
 * ファイル出力とDEBUG環境変数サポートを備えたロガー
 * stdioトランスポートを汚さないよう、出力はすべてstderrに書き込む
 */
export class Logger {
  private static defaults: { logFile?: string | undefined; minLevel?: LogLevel | undefined } = {};

  /**
   * 以後に生成されるロガーの既定値を設定（起動時に設定ファイルから）
   */
  static configure(defaults: { logFile?: string | undefined; minLevel?: LogLevel | undefined }): void {
    Logger.defaults = { ...defaults };
  }

  private readonly context: string;
  private readonly logFile: string | undefined;
  private readonly minLevel: LogLevel;

  constructor(config: string | LoggerConfig) {
    if (typeof config === 'string') {
      this.context = config;
      this.logFile = Logger.defaults.logFile;
      this.minLevel = this.getMinLevelFromEnv();
    } else {
      this.context = config.context;
      this.logFile = config.logFile ?? Logger.defaults.logFile;
      this.minLevel = config.minLevel ?? this.getMinLevelFromEnv();
    }
  }

  /**
   * DEBUG環境変数から最小ログレベルを取得
   * DEBUG=debug|info|warn|error、未設定なら既定値、それもなければINFO
   */
  private getMinLevelFromEnv(): LogLevel {
    return parseLogLevel(process.env.DEBUG) ?? Logger.defaults.minLevel ?? LogLevel.INFO;
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, 'INFO', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, 'WARN', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, 'DEBUG', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, 'ERROR', message, meta);
  }

  private log(
    level: LogLevel,
    levelName: string,
    message: string,
    meta?: Record<string, unknown>
  ): void {
    if (level < this.minLevel) {
      return;
    }

    const timestamp = new Date().toISOString();
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
    const logMessage = `[${timestamp}] [${levelName}] [${this.context}] ${message}${metaStr}`;

    console.error(logMessage);

    if (this.logFile) {
      try {
        appendFileSync(this.logFile, logMessage + '\n', 'utf-8');
      } catch (error) {
        console.error(
          `Failed to write to log file: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
  }
}
