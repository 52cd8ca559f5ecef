/**
 * ログエントリ処理のエラー分類
 */

export type LogEntryErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PARSE_ERROR'
  | 'FIELD_ABSENT'
  | 'SOURCE_EXHAUSTED';

/**
 * すべてのログエントリエラーの基底クラス
 */
export class LogEntryError extends Error {
  constructor(
    message: string,
    public readonly code: LogEntryErrorCode
  ) {
    super(message);
    this.name = 'LogEntryError';
  }
}

/**
 * 起動時の設定ミス（種別の二重登録、凍結後の登録など）
 */
export class ConfigurationError extends LogEntryError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * 1レコード単位の解析エラー。呼び出し側はレコードをスキップして続行できる
 */
export class ParseError extends LogEntryError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly logid?: number
  ) {
    super(message, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/**
 * レコード自体は正しいが、任意フィールドが存在しない
 */
export class FieldAbsentError extends LogEntryError {
  constructor(
    public readonly field: string,
    public readonly logid: number
  ) {
    super(`Log entry (${logid}) has no '${field}' field`, 'FIELD_ABSENT');
    this.name = 'FieldAbsentError';
  }
}

/**
 * レコードソースに該当するレコードが残っていない
 */
export class RecordSourceExhaustedError extends LogEntryError {
  constructor(logtype: string | undefined) {
    super(
      logtype ? `No log entries of type '${logtype}' available` : 'No log entries available',
      'SOURCE_EXHAUSTED'
    );
    this.name = 'RecordSourceExhaustedError';
  }
}
