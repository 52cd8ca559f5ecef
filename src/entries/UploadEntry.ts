import type { Page } from '../models/Site.js';
import { LogEntry, type EntryInit } from './LogEntry.js';

/** ファイル名前空間 */
const FILE_NAMESPACE = 6;

/**
 * アップロード（upload / overwrite / revert）のログエントリ
 */
export class UploadEntry extends LogEntry {
  readonly kind = 'upload';

  private cachedFilePage: Page | undefined;

  constructor(init: EntryInit) {
    super(init, 'upload');
  }

  /**
   * アップロードされたファイルのページ（常にファイル名前空間）
   */
  filePage(): Page {
    if (!this.cachedFilePage) {
      this.cachedFilePage = this.buildPage(FILE_NAMESPACE, this.title());
    }
    return this.cachedFilePage;
  }
}
