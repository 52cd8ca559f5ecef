/**
 * ログ種別からエントリのビルダーを引くレジストリ
 * 起動時に構築してfreeze()し、以後は読み取り専用として共有する
 */

import type { EntryKind } from '../models/LogEntry.js';
import type { EntryInit } from '../entries/LogEntry.js';
import type { AnyLogEntry } from '../entries/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export type EntryBuilder = (init: EntryInit) => AnyLogEntry;

export class EntryTypeRegistry {
  private readonly builders = new Map<EntryKind, EntryBuilder>();
  private frozen = false;
  private logger: Logger;

  /**
   * @param fallback - 未登録の種別に使う汎用ビルダー
   */
  constructor(private readonly fallback: EntryBuilder) {
    this.logger = new Logger('EntryTypeRegistry');
  }

  /**
   * @throws {ConfigurationError} 種別が登録済み、またはレジストリが凍結済みの場合
   */
  register(kind: EntryKind, builder: EntryBuilder): this {
    if (this.frozen) {
      throw new ConfigurationError(`Cannot register '${kind}': registry is frozen`);
    }
    if (this.builders.has(kind)) {
      throw new ConfigurationError(`Log type '${kind}' is already registered`);
    }
    this.builders.set(kind, builder);
    this.logger.debug('Log type registered', { kind });
    return this;
  }

  /**
   * 構築フェーズを終了する
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  has(kind: EntryKind): boolean {
    return this.builders.has(kind);
  }

  /**
   * 登録されたビルダー、なければ汎用ビルダー。失敗しない
   */
  resolve(kind: EntryKind): EntryBuilder {
    return this.builders.get(kind) ?? this.fallback;
  }

  /**
   * 専用ビルダーを持つ種別の集合
   */
  knownKinds(): ReadonlySet<EntryKind> {
    return new Set(this.builders.keys());
  }
}
