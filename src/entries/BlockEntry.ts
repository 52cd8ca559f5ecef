import { z } from 'zod';
import { Duration, Timestamp } from '../utils/timestamp.js';
import { ParseError } from '../utils/errors.js';
import { LogEntry, type EntryInit } from './LogEntry.js';
import { StringListSchema, parseOrThrow } from './params.js';

/** 無期限を表すexpiryの値 */
const INFINITE_EXPIRIES = new Set(['', 'infinity', 'infinite', 'indefinite', 'never']);

const BlockParamsSchema = z.object({
  flags: StringListSchema.optional(),
  duration: z.string().optional(),
  expiry: z.string().optional(),
});

/**
 * ブロック（block / reblock / unblock）のログエントリ
 */
export class BlockEntry extends LogEntry {
  readonly kind = 'block';

  private readonly blockFlags: string[];
  private readonly durationText: string | undefined;
  private readonly parsedExpiry: Timestamp | undefined;
  private readonly autoblockId: number | undefined;
  private cachedDuration: { value: Duration | undefined } | undefined;

  constructor(init: EntryInit) {
    super(init, 'block');

    const params = parseOrThrow(BlockParamsSchema, this.params, this.logid());
    this.blockFlags = this.action() === 'unblock' ? [] : params.flags ?? [];
    this.durationText = params.duration;
    this.parsedExpiry = this.parseExpiry(params.expiry);

    // 自動ブロックの解除ではタイトルが "User:#<ブロックID>" になる
    const match = this.hasTitle() ? /#(\d+)$/.exec(this.title()) : null;
    this.autoblockId = match?.[1] !== undefined ? Number(match[1]) : undefined;
  }

  private parseExpiry(expiry: string | undefined): Timestamp | undefined {
    if (expiry === undefined || INFINITE_EXPIRIES.has(expiry.toLowerCase())) {
      return undefined;
    }
    const parsed = Timestamp.parse(expiry);
    if (!parsed) {
      throw new ParseError(
        `Log entry (${this.logid()}) has an invalid 'expiry' field: ${expiry}`,
        'expiry',
        this.logid()
      );
    }
    return parsed;
  }

  /**
   * ブロックの修飾フラグ（例: "nocreate", "noautoblock"）。空文字列は含まない
   */
  flags(): string[] {
    return [...this.blockFlags];
  }

  /**
   * 期限（無期限ならundefined）
   */
  expiry(): Timestamp | undefined {
    return this.parsedExpiry;
  }

  /**
   * expiry - timestamp。期限がなければundefined
   */
  duration(): Duration | undefined {
    if (!this.cachedDuration) {
      const expiry = this.expiry();
      this.cachedDuration = { value: expiry ? expiry.diff(this.timestamp()) : undefined };
    }
    return this.cachedDuration.value;
  }

  /**
   * サーバーが表示用に返した期間（例: "1 week", "indefinite"）
   */
  rawDuration(): string | undefined {
    return this.durationText;
  }

  isAutoblockRemoval(): boolean {
    return this.action() === 'unblock' && this.autoblockId !== undefined;
  }

  /**
   * 解除された自動ブロックのID
   */
  blockId(): number | undefined {
    return this.isAutoblockRemoval() ? this.autoblockId : undefined;
  }

  protected override details(): Record<string, unknown> {
    return {
      flags: this.flags(),
      expiry: this.expiry()?.toISOString() ?? null,
      durationSeconds: this.duration()?.toSeconds() ?? null,
    };
  }
}
