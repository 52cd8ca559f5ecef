import { z } from 'zod';
import { LogEntry, type EntryInit } from './LogEntry.js';
import { IntLikeSchema, parseOrThrow } from './params.js';

const AutoSchema = z.union([z.boolean(), z.number(), z.string()]).optional();

/** キー名は1.19で "cur"/"prev" から "curid"/"previd" に変わった */
const CurrentPatrolSchema = z.object({
  curid: IntLikeSchema,
  previd: IntLikeSchema,
  auto: AutoSchema,
});

const LegacyPatrolSchema = z.object({
  cur: IntLikeSchema,
  prev: IntLikeSchema,
  auto: AutoSchema,
});

/**
 * 巡回（patrol）のログエントリ
 */
export class PatrolEntry extends LogEntry {
  readonly kind = 'patrol';

  private readonly currentId: number;
  private readonly previousId: number;
  private readonly auto: boolean;

  constructor(init: EntryInit) {
    super(init, 'patrol');

    if ('curid' in this.params) {
      const params = parseOrThrow(CurrentPatrolSchema, this.params, this.logid());
      this.currentId = params.curid;
      this.previousId = params.previd;
      this.auto = isSet(params.auto);
    } else {
      const params = parseOrThrow(LegacyPatrolSchema, this.params, this.logid());
      this.currentId = params.cur;
      this.previousId = params.prev;
      this.auto = isSet(params.auto);
    }
  }

  currentRevisionId(): number {
    return this.currentId;
  }

  previousRevisionId(): number {
    return this.previousId;
  }

  /**
   * 自動巡回か
   */
  automatic(): boolean {
    return this.auto;
  }

  protected override details(): Record<string, unknown> {
    return {
      currentRevisionId: this.currentId,
      previousRevisionId: this.previousId,
      automatic: this.auto,
    };
  }
}

/**
 * "auto" はキーが存在し、0/false でなければ真
 */
function isSet(value: boolean | number | string | undefined): boolean {
  return value !== undefined && value !== false && value !== 0 && value !== '0';
}
