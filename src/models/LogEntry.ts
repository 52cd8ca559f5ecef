/**
 * ログエントリモデル
 * トランスポート層から受け取る生レコードとその種別を定義
 */

/**
 * logeventsの1件分の生レコード。読み取り専用として扱い、変更しない
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * サーバーが宣言するログ種別（例: "block", "rights", "move"）
 * 未知の種別も受け付けるため開いた文字列型
 */
export type EntryKind = string;

/**
 * 専用の表現を持つログ種別
 */
export const SPECIALIZED_KINDS = [
  'block',
  'rights',
  'move',
  'patrol',
  'upload',
  'protect',
  'delete',
  'import',
  'newusers',
] as const;

export type SpecializedKind = (typeof SPECIALIZED_KINDS)[number];

/**
 * レコードの形式
 * - current: 種別固有データが "params" の下にある
 * - legacy-nested: 種別固有データが種別名のキーの下にある（MediaWiki 1.19以前）
 * - legacy-flat: 種別固有データがトップレベルにある
 */
export type RecordShape = 'current' | 'legacy-nested' | 'legacy-flat';

/**
 * レコードソースへの問い合わせ条件
 */
export interface RecordFilter {
  /** ログ種別でフィルター */
  logtype?: EntryKind | undefined;
  /** 取得する最大件数 */
  total?: number | undefined;
}

/**
 * 生レコードの供給元（APIクライアントなど）
 */
export interface RecordSource {
  fetch(filter: RecordFilter): Iterable<RawRecord>;
}

/**
 * エントリのJSON要約
 */
export interface LogEntrySummary {
  logid: number;
  type: EntryKind;
  action: string;
  expectedKind: EntryKind | null;
  timestamp: string;
  user: string;
  comment: string;
  title: string | null;
  details: Record<string, unknown>;
}
