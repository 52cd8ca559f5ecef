/**
 * ログエントリの唯一の構築口
 * レコードの種別からレジストリでビルダーを選び、エントリを構築する
 */

import type { EntryKind, RawRecord } from '../models/LogEntry.js';
import type { SiteContext } from '../models/Site.js';
import { createDefaultRegistry, type AnyLogEntry } from '../entries/index.js';
import { createDeprecationReporter, type DeprecationHook } from '../utils/deprecation.js';
import type { EntryBuilder, EntryTypeRegistry } from './EntryTypeRegistry.js';
import { ConfigManager } from './ConfigManager.js';
import { Logger } from '../utils/logger.js';

export interface LogEntryFactoryOptions {
  /** 省略時はデフォルトのレジストリ */
  registry?: EntryTypeRegistry | undefined;
  /** 指定した場合、すべてのレコードをこの種別のビルダーで構築する */
  logtype?: EntryKind | undefined;
  /** 互換用アクセサの使用通知。省略時は設定に従ってLoggerに記録 */
  onDeprecated?: DeprecationHook | undefined;
}

export class LogEntryFactory {
  private readonly registry: EntryTypeRegistry;
  private readonly pinned: EntryBuilder | undefined;
  private readonly onDeprecated: DeprecationHook;
  private logger: Logger;

  constructor(options: LogEntryFactoryOptions = {}) {
    this.logger = new Logger('LogEntryFactory');
    this.registry = options.registry ?? createDefaultRegistry();
    this.pinned = options.logtype !== undefined ? this.registry.resolve(options.logtype) : undefined;
    this.onDeprecated = options.onDeprecated ?? LogEntryFactory.defaultDeprecationHook();
  }

  private static defaultDeprecationHook(): DeprecationHook {
    const config = ConfigManager.getInstance().get('deprecations');
    return createDeprecationReporter({ enabled: config.enabled, warnOnce: config.warnOnce });
  }

  /**
   * 生レコードからエントリを構築する
   * @throws {ParseError} 必須フィールドの欠落や不正な形式
   */
  create(record: RawRecord, site: SiteContext): AnyLogEntry {
    const builder = this.pinned ?? this.registry.resolve(this.typeOf(record));
    const entry = builder({ record, site, onDeprecated: this.onDeprecated });

    if (entry.kind === null) {
      this.logger.debug('No specialized representation for log type', { type: entry.type() });
    }
    return entry;
  }

  /**
   * 種別が文字列でなければ汎用ビルダーに任せ、検証はエントリ側で行う
   */
  private typeOf(record: RawRecord): EntryKind {
    return typeof record.type === 'string' ? record.type : '';
  }
}
