/**
 * wiki-logentries用の設定マネージャー
 * 設定の読み込み、検証、管理を処理
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type {
  LogEntriesConfig,
  PartialLogEntriesConfig,
  ConfigValidationError,
} from '../models/Config.js';
import { Logger, parseLogLevel, type LogLevel } from '../utils/logger.js';

/**
 * デフォルト設定値（名前空間はMediaWikiの組み込み名前空間）
 */
const DEFAULT_CONFIG: LogEntriesConfig = {
  version: '1.0.0',
  logging: {
    level: 'info',
  },
  deprecations: {
    enabled: true,
    warnOnce: true,
  },
  site: {
    name: 'wiki',
    namespaces: [
      { id: -2, canonicalName: 'Media' },
      { id: -1, canonicalName: 'Special' },
      { id: 0, canonicalName: '' },
      { id: 1, canonicalName: 'Talk' },
      { id: 2, canonicalName: 'User' },
      { id: 3, canonicalName: 'User talk' },
      { id: 4, canonicalName: 'Project' },
      { id: 5, canonicalName: 'Project talk' },
      { id: 6, canonicalName: 'File', aliases: ['Image'] },
      { id: 7, canonicalName: 'File talk', aliases: ['Image talk'] },
      { id: 8, canonicalName: 'MediaWiki' },
      { id: 9, canonicalName: 'MediaWiki talk' },
      { id: 10, canonicalName: 'Template' },
      { id: 11, canonicalName: 'Template talk' },
      { id: 12, canonicalName: 'Help' },
      { id: 13, canonicalName: 'Help talk' },
      { id: 14, canonicalName: 'Category' },
      { id: 15, canonicalName: 'Category talk' },
    ],
  },
};

/**
 * 設定ファイルの構造（すべてのセクションは省略可能）
 */
const ConfigFileSchema = z.object({
  version: z.string().optional(),
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).optional(),
      logFile: z.string().optional(),
    })
    .optional(),
  deprecations: z
    .object({
      enabled: z.boolean().optional(),
      warnOnce: z.boolean().optional(),
    })
    .optional(),
  site: z
    .object({
      name: z.string().optional(),
      namespaces: z
        .array(
          z.object({
            id: z.number().int(),
            canonicalName: z.string(),
            aliases: z.array(z.string()).optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * ConfigManagerクラス - シングルトンパターン
 * 設定の読み込み、検証、更新を管理
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: LogEntriesConfig;
  private configPath: string;
  private logger: Logger;

  private constructor(configPath?: string) {
    this.logger = new Logger('ConfigManager');
    this.configPath = configPath || this.getDefaultConfigPath();
    this.config = this.loadConfig();
  }

  /**
   * ConfigManagerのシングルトンインスタンスを取得
   */
  public static getInstance(configPath?: string): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(configPath);
    }
    return ConfigManager.instance;
  }

  /**
   * シングルトンインスタンスをリセット（テスト用）
   */
  public static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  /**
   * WIKI_LOGENTRIES_CONFIG環境変数、なければカレントディレクトリの既定パス
   */
  private getDefaultConfigPath(): string {
    return (
      process.env.WIKI_LOGENTRIES_CONFIG ??
      path.join(process.cwd(), '.wiki-logentries', 'config.json')
    );
  }

  /**
   * ファイルから設定を読み込むか、デフォルトを使用
   */
  private loadConfig(): LogEntriesConfig {
    try {
      if (!fs.existsSync(this.configPath)) {
        this.logger.debug('Config file not found, using defaults', { path: this.configPath });
        return ConfigManager.getDefaults();
      }

      const fileContent = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = ConfigFileSchema.safeParse(JSON.parse(fileContent));
      if (!parsed.success) {
        this.logger.warn('Invalid config file, using defaults', {
          path: this.configPath,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        return ConfigManager.getDefaults();
      }

      const mergedConfig = this.mergeWithDefaults(parsed.data);

      const errors = ConfigManager.validate(mergedConfig);
      if (errors.length > 0) {
        // 警告があってもマージされた設定で続行
        this.logger.warn('Configuration validation warnings', { errors });
      }

      return mergedConfig;
    } catch (error) {
      this.logger.error('Error loading config, using defaults', {
        error: error instanceof Error ? error.message : String(error),
      });
      return ConfigManager.getDefaults();
    }
  }

  /**
   * 読み込んだ設定をデフォルトとマージして必要なフィールドが存在することを保証
   */
  private mergeWithDefaults(loaded: ConfigFile | PartialLogEntriesConfig): LogEntriesConfig {
    return {
      version: loaded.version || DEFAULT_CONFIG.version,
      logging: { ...DEFAULT_CONFIG.logging, ...loaded.logging },
      deprecations: { ...DEFAULT_CONFIG.deprecations, ...loaded.deprecations },
      site: {
        name: loaded.site?.name ?? DEFAULT_CONFIG.site.name,
        namespaces: loaded.site?.namespaces ?? DEFAULT_CONFIG.site.namespaces,
      },
    };
  }

  /**
   * 完全な設定を取得
   */
  public getConfig(): LogEntriesConfig {
    return { ...this.config };
  }

  /**
   * 特定の設定セクションを取得
   */
  public get<K extends keyof LogEntriesConfig>(key: K): LogEntriesConfig[K] {
    return this.config[key];
  }

  /**
   * 部分的な値で設定を更新
   */
  public update(updates: PartialLogEntriesConfig): void {
    const next = this.mergeWithDefaults({ ...this.config, ...updates });

    const errors = ConfigManager.validate(next);
    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${JSON.stringify(errors)}`);
    }
    this.config = next;
  }

  /**
   * 設定されたログレベル
   */
  public getLogLevel(): LogLevel | undefined {
    return parseLogLevel(this.config.logging.level);
  }

  /**
   * デフォルト設定を取得
   */
  public static getDefaults(): LogEntriesConfig {
    return {
      ...DEFAULT_CONFIG,
      logging: { ...DEFAULT_CONFIG.logging },
      deprecations: { ...DEFAULT_CONFIG.deprecations },
      site: { ...DEFAULT_CONFIG.site, namespaces: [...DEFAULT_CONFIG.site.namespaces] },
    };
  }

  /**
   * 設定値を検証
   */
  public static validate(config: LogEntriesConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (config.site.name.trim() === '') {
      errors.push({
        field: 'site.name',
        message: 'Must not be empty',
        value: config.site.name,
      });
    }

    const seen = new Set<number>();
    for (const ns of config.site.namespaces) {
      if (ns.id < -2) {
        errors.push({
          field: 'site.namespaces',
          message: 'Namespace ids must be -2 or greater',
          value: ns.id,
        });
      }
      if (seen.has(ns.id)) {
        errors.push({
          field: 'site.namespaces',
          message: 'Duplicate namespace id',
          value: ns.id,
        });
      }
      seen.add(ns.id);
    }

    if (!seen.has(0)) {
      errors.push({
        field: 'site.namespaces',
        message: 'The main namespace (0) must be defined',
      });
    }

    return errors;
  }
}
