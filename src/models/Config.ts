/**
 * wiki-logentriesの設定モデル
 */

/**
 * ログ設定
 */
export interface LoggingConfig {
  /** ログレベル */
  level: 'error' | 'warn' | 'info' | 'debug';
  /** ログファイルのパス（未指定ならstderrのみ） */
  logFile?: string | undefined;
}

/**
 * 非推奨アクセサの通知設定
 */
export interface DeprecationsConfig {
  /** 通知を記録する */
  enabled: boolean;
  /** アクセサごとに最初の1回だけ記録する */
  warnOnce: boolean;
}

/**
 * 名前空間テーブルの1行
 */
export interface NamespaceConfig {
  id: number;
  canonicalName: string;
  aliases?: string[] | undefined;
}

/**
 * サイト設定
 */
export interface SiteConfig {
  /** サイト識別子 */
  name: string;
  /** 名前空間テーブル */
  namespaces: NamespaceConfig[];
}

/**
 * 完全な設定
 */
export interface LogEntriesConfig {
  /** 設定バージョン */
  version: string;
  logging: LoggingConfig;
  deprecations: DeprecationsConfig;
  site: SiteConfig;
}

/**
 * 更新用の部分的な設定
 */
export type PartialLogEntriesConfig = Partial<LogEntriesConfig>;

/**
 * 設定検証エラー
 */
export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}
