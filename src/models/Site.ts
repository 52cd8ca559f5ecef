/**
 * サイトコンテキストのモデル定義
 * 名前空間の解決とページ参照の構築をエントリに提供する
 */

/**
 * ウィキの名前空間
 */
export interface Namespace {
  /** 名前空間ID（仮想名前空間は負の値: -1 Special, -2 Media） */
  id: number;
  /** 正規名（標準名前空間は空文字列） */
  canonicalName: string;
  /** 別名 */
  aliases: string[];
}

/**
 * 名前空間と名前空間プレフィックスなしのタイトルで識別されるページ参照
 */
export interface Page {
  namespace(): Namespace;
  /** プレフィックス付きの完全なタイトル（例: "User:Example"） */
  title(): string;
  /** プレフィックスなしのタイトル */
  titleWithoutNamespace(): string;
  equals(other: Page): boolean;
}

/**
 * エントリが参照するサイト（ウィキ）
 */
export interface SiteContext {
  /** サイト識別子（例: "en.wikipedia"） */
  readonly name: string;
  /** IDから名前空間を解決する。未知のIDはundefined */
  namespace(id: number): Namespace | undefined;
  /**
   * (名前空間, タイトル) からページ参照を構築する
   * タイトルに同じ名前空間のプレフィックスが含まれていても良い
   */
  page(namespaceId: number, title: string): Page;
}
