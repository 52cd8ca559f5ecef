import { Logger } from './logger.js';

/**
 * 互換用アクセサが使われたことを表す通知。例外として投げることはない
 */
export interface DeprecatedUsageWarning {
  /** 使われた非推奨アクセサ（例: "MoveEntry.newTitle"） */
  name: string;
  /** 代わりに使うべきアクセサ */
  replacement: string;
  /** 呼び出し元エントリのlogid */
  logid: number;
}

export type DeprecationHook = (warning: DeprecatedUsageWarning) => void;

export interface DeprecationReporterOptions {
  /** 同じアクセサについては最初の1回だけ記録する */
  warnOnce?: boolean | undefined;
  /** falseの場合は何も記録しない */
  enabled?: boolean | undefined;
  logger?: Logger | undefined;
}

/**
 * Logger.warnに非推奨通知を流すデフォルトのフックを作成
 */
export function createDeprecationReporter(options: DeprecationReporterOptions = {}): DeprecationHook {
  const logger = options.logger ?? new Logger('Deprecation');
  const enabled = options.enabled ?? true;
  const seen = new Set<string>();

  return (warning) => {
    if (!enabled) return;
    if (options.warnOnce) {
      if (seen.has(warning.name)) return;
      seen.add(warning.name);
    }
    logger.warn(`${warning.name} is deprecated; use ${warning.replacement} instead`, {
      logid: warning.logid,
    });
  };
}
