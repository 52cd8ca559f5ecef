import { LogEntry, type EntryInit } from './LogEntry.js';

/**
 * 専用のアクセサは持たないが、種別としては認識されるログ
 */
export type MarkerKind = 'protect' | 'delete' | 'import' | 'newusers';

export class MarkerEntry extends LogEntry {
  constructor(
    init: EntryInit,
    readonly kind: MarkerKind
  ) {
    super(init, kind);
  }
}
