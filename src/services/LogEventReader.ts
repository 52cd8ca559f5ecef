/**
 * レコードソースからログエントリを読み出すサービス
 * 1レコードの解析エラーはそのレコードだけに閉じ込め、バッチ全体は止めない
 */

import type { RawRecord, RecordFilter, RecordSource } from '../models/LogEntry.js';
import type { SiteContext } from '../models/Site.js';
import type { AnyLogEntry } from '../entries/index.js';
import { ParseError, RecordSourceExhaustedError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { LogEntryFactory } from './LogEntryFactory.js';

/**
 * 構築に失敗したレコード
 */
export interface RecordFailure {
  /** バッチ内の位置 */
  index: number;
  record: RawRecord;
  error: ParseError;
}

export interface BatchResult {
  entries: AnyLogEntry[];
  failures: RecordFailure[];
}

/**
 * メモリ上のレコード配列をソースとして扱う
 */
export class InMemoryRecordSource implements RecordSource {
  constructor(private readonly records: readonly RawRecord[]) {}

  *fetch(filter: RecordFilter): Iterable<RawRecord> {
    let count = 0;
    for (const record of this.records) {
      if (filter.total !== undefined && count >= filter.total) return;
      if (filter.logtype !== undefined && record.type !== filter.logtype) continue;
      count++;
      yield record;
    }
  }
}

export class LogEventReader {
  /** 直近の読み出しでスキップしたレコードのみ保持する */
  private failures: RecordFailure[] = [];
  private logger: Logger;

  constructor(
    private readonly source: RecordSource,
    private readonly site: SiteContext,
    private readonly factory: LogEntryFactory = new LogEntryFactory()
  ) {
    this.logger = new Logger('LogEventReader');
  }

  /**
   * 条件に合うエントリを順に返す。ParseErrorのレコードは記録してスキップ
   */
  *read(filter: RecordFilter = {}): Generator<AnyLogEntry> {
    this.failures = [];
    let index = 0;
    for (const record of this.source.fetch(filter)) {
      const entry = this.tryCreate(record, index++);
      if (entry) yield entry;
    }
  }

  /**
   * 指定種別の最初のエントリ
   * @throws {RecordSourceExhaustedError} 該当するエントリがない場合
   */
  first(logtype?: string): AnyLogEntry {
    for (const entry of this.read({ logtype })) {
      return entry;
    }
    throw new RecordSourceExhaustedError(logtype);
  }

  /**
   * ソースのレコードをすべて構築し、成功と失敗に分けて返す
   */
  collect(filter: RecordFilter = {}): BatchResult {
    const entries = [...this.read(filter)];
    return { entries, failures: this.getFailures() };
  }

  /**
   * ソースを経由せず、レコード配列をまとめて構築する
   */
  parseBatch(records: readonly RawRecord[]): BatchResult {
    this.failures = [];
    const entries: AnyLogEntry[] = [];
    records.forEach((record, index) => {
      const entry = this.tryCreate(record, index);
      if (entry) entries.push(entry);
    });
    return { entries, failures: this.getFailures() };
  }

  /**
   * 直近のread / collect / parseBatchでスキップしたレコード
   */
  getFailures(): RecordFailure[] {
    return [...this.failures];
  }

  private tryCreate(record: RawRecord, index: number): AnyLogEntry | undefined {
    try {
      return this.factory.create(record, this.site);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      this.logger.warn('Skipping unparsable log entry', {
        index,
        logid: error.logid,
        field: error.field,
        error: error.message,
      });
      this.failures.push({ index, record, error });
      return undefined;
    }
  }
}
