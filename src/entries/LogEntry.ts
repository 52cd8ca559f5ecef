/**
 * ログエントリの基底クラス
 * すべての種別に共通するアクセサを提供する
 */

import { z } from 'zod';
import type {
  EntryKind,
  LogEntrySummary,
  RawRecord,
  RecordShape,
  SpecializedKind,
} from '../models/LogEntry.js';
import type { Page, SiteContext } from '../models/Site.js';
import type { DeprecationHook } from '../utils/deprecation.js';
import { FieldAbsentError, ParseError } from '../utils/errors.js';
import { Timestamp } from '../utils/timestamp.js';
import { parseOrThrow, splitRecord } from './params.js';

/**
 * エントリのコンストラクタに渡す入力
 */
export interface EntryInit {
  record: RawRecord;
  site: SiteContext;
  onDeprecated: DeprecationHook;
}

const CommonFieldsSchema = z.object({
  logid: z.number().int().nonnegative(),
  type: z.string().min(1),
  action: z.string().optional(),
  timestamp: z.string(),
  ns: z.number().int().min(-2).optional(),
  pageid: z.number().int().nonnegative().optional(),
  title: z.string().optional(),
  user: z.string().optional(),
  comment: z.string().optional(),
});

type CommonFields = z.infer<typeof CommonFieldsSchema>;

/**
 * 1件のログレコードを包む不変オブジェクト
 */
export abstract class LogEntry {
  /** 専用表現の種別。汎用表現ではnull */
  abstract readonly kind: SpecializedKind | null;

  readonly shape: RecordShape;
  readonly site: SiteContext;

  protected readonly params: RawRecord;
  protected readonly onDeprecated: DeprecationHook;

  private readonly fields: CommonFields;
  private readonly genericData: RawRecord;
  private readonly parsedTimestamp: Timestamp;
  private cachedPage: Page | undefined;

  protected constructor(init: EntryInit, expected: SpecializedKind | null) {
    const rawLogid = init.record.logid;
    const fields = parseOrThrow(
      CommonFieldsSchema,
      init.record,
      typeof rawLogid === 'number' ? rawLogid : undefined
    );

    if (expected !== null && expected !== fields.type) {
      throw new ParseError(
        `Wrong log type! Expecting ${expected}, received ${fields.type} instead.`,
        'type',
        fields.logid
      );
    }

    const parsedTimestamp = Timestamp.parse(fields.timestamp);
    if (!parsedTimestamp) {
      throw new ParseError(
        `Log entry (${fields.logid}) has an invalid 'timestamp' field: ${fields.timestamp}`,
        'timestamp',
        fields.logid
      );
    }

    const split = splitRecord(init.record, fields.type);
    this.fields = fields;
    this.parsedTimestamp = parsedTimestamp;
    this.shape = split.shape;
    this.genericData = split.data;
    this.params = split.params;
    this.site = init.site;
    this.onDeprecated = init.onDeprecated;
  }

  /**
   * サーバーが宣言した種別（そのまま）
   */
  type(): EntryKind {
    return this.fields.type;
  }

  /**
   * より細かいアクション（例: type="rights" に対して "rights" や "autopromote"）
   * 古いサーバーが省略した場合は種別と同じ
   */
  action(): string {
    return this.fields.action ?? this.fields.type;
  }

  /**
   * 専用表現として認識された場合はその種別、汎用表現ではundefined
   */
  expectedKind(): SpecializedKind | undefined {
    return this.kind ?? undefined;
  }

  logid(): number {
    return this.fields.logid;
  }

  /**
   * @throws {FieldAbsentError} ページを伴わないエントリの場合
   */
  ns(): number {
    if (this.fields.ns === undefined) {
      throw new FieldAbsentError('ns', this.fields.logid);
    }
    return this.fields.ns;
  }

  /**
   * 0はページなしを意味する
   */
  pageid(): number {
    return this.fields.pageid ?? 0;
  }

  /**
   * 利用者名（秘匿されたレコードでは空文字列）
   */
  user(): string {
    return this.fields.user ?? '';
  }

  comment(): string {
    return this.fields.comment ?? '';
  }

  timestamp(): Timestamp {
    return this.parsedTimestamp;
  }

  hasTitle(): boolean {
    return this.fields.title !== undefined;
  }

  /**
   * @throws {FieldAbsentError} タイトルを持たないエントリの場合
   */
  title(): string {
    if (this.fields.title === undefined) {
      throw new FieldAbsentError('title', this.fields.logid);
    }
    return this.fields.title;
  }

  /**
   * 対象ページ（初回アクセス時に構築してキャッシュ）
   */
  page(): Page {
    if (!this.cachedPage) {
      this.cachedPage = this.buildPage(this.ns(), this.title());
    }
    return this.cachedPage;
  }

  isUserHidden(): boolean {
    return 'userhidden' in this.genericData;
  }

  isCommentHidden(): boolean {
    return 'commenthidden' in this.genericData;
  }

  isActionHidden(): boolean {
    return 'actionhidden' in this.genericData;
  }

  /**
   * 種別固有のコンテナを取り除いた汎用フィールド
   */
  data(): RawRecord {
    return this.genericData;
  }

  /**
   * 同じサイトの同じlogidなら等しい
   */
  equals(other: LogEntry): boolean {
    return this.site.name === other.site.name && this.logid() === other.logid();
  }

  toJSON(): LogEntrySummary {
    return {
      logid: this.logid(),
      type: this.type(),
      action: this.action(),
      expectedKind: this.kind,
      timestamp: this.timestamp().toISOString(),
      user: this.user(),
      comment: this.comment(),
      title: this.fields.title ?? null,
      details: this.details(),
    };
  }

  /**
   * 要約に含める種別固有の値
   */
  protected details(): Record<string, unknown> {
    return {};
  }

  /**
   * 名前空間を確認してからサイトにページ参照を作らせる
   */
  protected buildPage(namespaceId: number, title: string): Page {
    if (!this.site.namespace(namespaceId)) {
      throw new ParseError(
        `Log entry (${this.logid()}) refers to unknown namespace ${namespaceId}`,
        'ns',
        this.logid()
      );
    }
    return this.site.page(namespaceId, title);
  }
}

/**
 * 専用表現を持たない種別のエントリ
 */
export class GenericLogEntry extends LogEntry {
  readonly kind = null;

  constructor(init: EntryInit) {
    super(init, null);
  }
}
