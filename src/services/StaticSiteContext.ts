/**
 * 名前空間テーブルから構築するSiteContext実装
 */

import type { Namespace, Page, SiteContext } from '../models/Site.js';
import type { SiteConfig } from '../models/Config.js';
import { ConfigManager } from './ConfigManager.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * SiteContextが構築するページ参照
 */
export class WikiPage implements Page {
  constructor(
    private readonly ns: Namespace,
    private readonly bareTitle: string
  ) {}

  namespace(): Namespace {
    return this.ns;
  }

  title(): string {
    return this.ns.canonicalName ? `${this.ns.canonicalName}:${this.bareTitle}` : this.bareTitle;
  }

  titleWithoutNamespace(): string {
    return this.bareTitle;
  }

  equals(other: Page): boolean {
    return (
      this.ns.id === other.namespace().id &&
      this.bareTitle === other.titleWithoutNamespace()
    );
  }

  toString(): string {
    return `[[${this.title()}]]`;
  }
}

/**
 * 固定の名前空間テーブルを持つサイト
 */
export class StaticSiteContext implements SiteContext {
  private readonly byId = new Map<number, Namespace>();

  constructor(
    public readonly name: string,
    namespaces: Namespace[]
  ) {
    for (const ns of namespaces) {
      if (this.byId.has(ns.id)) {
        throw new ConfigurationError(`Duplicate namespace id ${ns.id} for site ${name}`);
      }
      this.byId.set(ns.id, ns);
    }
    if (!this.byId.has(0)) {
      throw new ConfigurationError(`Site ${name} has no main namespace (0)`);
    }
  }

  /**
   * サイト設定から構築（未指定ならConfigManagerの設定を使用）
   */
  static fromConfig(site?: SiteConfig): StaticSiteContext {
    const config = site ?? ConfigManager.getInstance().get('site');
    return new StaticSiteContext(
      config.name,
      config.namespaces.map((ns) => ({
        id: ns.id,
        canonicalName: ns.canonicalName,
        aliases: ns.aliases ?? [],
      }))
    );
  }

  namespace(id: number): Namespace | undefined {
    return this.byId.get(id);
  }

  namespaces(): Namespace[] {
    return [...this.byId.values()];
  }

  page(namespaceId: number, title: string): Page {
    const ns = this.byId.get(namespaceId);
    if (!ns) {
      throw new ConfigurationError(`Unknown namespace ${namespaceId} on site ${this.name}`);
    }
    return new WikiPage(ns, this.stripPrefix(ns, title.replace(/_/g, ' ').trim()));
  }

  /**
   * タイトルが名前空間名（または別名）で始まっていれば取り除く
   */
  private stripPrefix(ns: Namespace, title: string): string {
    const colon = title.indexOf(':');
    if (ns.id === 0 || colon < 0) return title;

    const prefix = title.slice(0, colon).trim().toLowerCase();
    const names = [ns.canonicalName, ...ns.aliases].map((name) => name.toLowerCase());
    return names.includes(prefix) ? title.slice(colon + 1).trim() : title;
  }
}
