import { z } from 'zod';
import { LogEntry, type EntryInit } from './LogEntry.js';
import { StringListSchema, parseOrThrow } from './params.js';

/** MediaWiki 1.20以降 */
const CurrentRightsSchema = z.object({
  oldgroups: StringListSchema,
  newgroups: StringListSchema,
});

/** 1.19以前はカンマ区切りの "old" / "new" */
const LegacyRightsSchema = z.object({
  old: StringListSchema,
  new: StringListSchema,
});

/**
 * 利用者グループ変更（rights / autopromote）のログエントリ
 */
export class RightsEntry extends LogEntry {
  readonly kind = 'rights';

  private readonly groupsBefore: string[];
  private readonly groupsAfter: string[];

  constructor(init: EntryInit) {
    super(init, 'rights');

    if (this.shape === 'current') {
      const params = parseOrThrow(CurrentRightsSchema, this.params, this.logid());
      this.groupsBefore = params.oldgroups;
      this.groupsAfter = params.newgroups;
    } else {
      const params = parseOrThrow(LegacyRightsSchema, this.params, this.logid());
      this.groupsBefore = params.old;
      this.groupsAfter = params.new;
    }
  }

  oldGroups(): string[] {
    return [...this.groupsBefore];
  }

  newGroups(): string[] {
    return [...this.groupsAfter];
  }

  /**
   * 追加されたグループ
   */
  addedGroups(): string[] {
    return this.groupsAfter.filter((group) => !this.groupsBefore.includes(group));
  }

  /**
   * 削除されたグループ
   */
  removedGroups(): string[] {
    return this.groupsBefore.filter((group) => !this.groupsAfter.includes(group));
  }

  protected override details(): Record<string, unknown> {
    return { oldGroups: this.oldGroups(), newGroups: this.newGroups() };
  }
}
