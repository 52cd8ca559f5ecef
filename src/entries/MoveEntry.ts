import { z } from 'zod';
import type { Namespace, Page } from '../models/Site.js';
import { ParseError } from '../utils/errors.js';
import { LogEntry, type EntryInit } from './LogEntry.js';
import { IntLikeSchema, parseOrThrow } from './params.js';

const CurrentMoveSchema = z.object({
  target_ns: IntLikeSchema,
  target_title: z.string(),
  suppressed: z.boolean().optional(),
});

/** 1.19以前のキー名 */
const LegacyMoveSchema = z.object({
  new_ns: IntLikeSchema,
  new_title: z.string(),
});

/**
 * ページ移動（move / move_redir）のログエントリ
 */
export class MoveEntry extends LogEntry {
  readonly kind = 'move';

  private readonly targetNamespaceId: number;
  private readonly targetTitleText: string;
  private readonly redirectSuppressed: boolean;
  private cachedTargetNamespace: Namespace | undefined;
  private cachedTargetPage: Page | undefined;

  constructor(init: EntryInit) {
    super(init, 'move');

    if (this.shape === 'current') {
      const params = parseOrThrow(CurrentMoveSchema, this.params, this.logid());
      this.targetNamespaceId = params.target_ns;
      this.targetTitleText = params.target_title;
      this.redirectSuppressed =
        this.hasFlag('suppressredirect') ||
        this.hasFlag('suppressedredirect') ||
        params.suppressed === true;
    } else {
      const params = parseOrThrow(LegacyMoveSchema, this.params, this.logid());
      this.targetNamespaceId = params.new_ns;
      this.targetTitleText = params.new_title;
      // トップレベルの "suppressed" はエントリ自体の秘匿を意味するので見ない
      this.redirectSuppressed = this.hasFlag('suppressedredirect');
    }
  }

  /**
   * 値が空文字列のフラグ（formatversion=1）も立っているとみなす
   */
  private hasFlag(key: string): boolean {
    const value = this.params[key];
    return key in this.params && value !== false && value !== 0 && value !== '0' && value != null;
  }

  /**
   * @throws {ParseError} サイトが知らない名前空間の場合
   */
  targetNamespace(): Namespace {
    if (!this.cachedTargetNamespace) {
      const ns = this.site.namespace(this.targetNamespaceId);
      if (!ns) {
        throw new ParseError(
          `Log entry (${this.logid()}) refers to unknown namespace ${this.targetNamespaceId}`,
          'target_ns',
          this.logid()
        );
      }
      this.cachedTargetNamespace = ns;
    }
    return this.cachedTargetNamespace;
  }

  targetTitle(): string {
    return this.targetTitleText;
  }

  /**
   * 移動先ページ。名前空間は常にtargetNamespace()と一致する
   */
  targetPage(): Page {
    if (!this.cachedTargetPage) {
      this.cachedTargetPage = this.buildPage(this.targetNamespace().id, this.targetTitle());
    }
    return this.cachedTargetPage;
  }

  /**
   * 移動元にリダイレクトを残さなかったか
   */
  suppressedRedirect(): boolean {
    return this.redirectSuppressed;
  }

  /**
   * @deprecated targetNamespace().id を使用
   */
  newNamespaceId(): number {
    this.onDeprecated({
      name: 'MoveEntry.newNamespaceId',
      replacement: 'MoveEntry.targetNamespace().id',
      logid: this.logid(),
    });
    return this.targetNamespace().id;
  }

  /**
   * @deprecated targetPage() を使用
   */
  newTitle(): Page {
    this.onDeprecated({
      name: 'MoveEntry.newTitle',
      replacement: 'MoveEntry.targetPage()',
      logid: this.logid(),
    });
    return this.targetPage();
  }

  protected override details(): Record<string, unknown> {
    return {
      targetNamespace: this.targetNamespaceId,
      targetTitle: this.targetTitle(),
      suppressedRedirect: this.suppressedRedirect(),
    };
  }
}
