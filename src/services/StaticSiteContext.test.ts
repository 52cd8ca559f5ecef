import { describe, it, expect } from 'vitest';
import { StaticSiteContext } from './StaticSiteContext.js';
import { ConfigManager } from './ConfigManager.js';
import { ConfigurationError } from '../utils/errors.js';

describe('StaticSiteContext', () => {
  const site = StaticSiteContext.fromConfig(ConfigManager.getDefaults().site);

  it('resolves namespaces by id', () => {
    expect(site.namespace(2)?.canonicalName).toBe('User');
    expect(site.namespace(-2)?.canonicalName).toBe('Media');
    expect(site.namespace(100)).toBeUndefined();
  });

  it('builds pages and strips a matching namespace prefix', () => {
    const page = site.page(2, 'User:Example/Sandbox');

    expect(page.namespace().id).toBe(2);
    expect(page.titleWithoutNamespace()).toBe('Example/Sandbox');
    expect(page.title()).toBe('User:Example/Sandbox');
  });

  it('accepts namespace aliases and underscores', () => {
    const page = site.page(6, 'Image:Some_picture.png');

    expect(page.title()).toBe('File:Some picture.png');
  });

  it('keeps colons that are not a namespace prefix', () => {
    expect(site.page(0, 'Star Wars: A New Hope').title()).toBe('Star Wars: A New Hope');
  });

  it('compares pages by namespace and title', () => {
    expect(site.page(2, 'User:Example').equals(site.page(2, 'Example'))).toBe(true);
    expect(site.page(2, 'Example').equals(site.page(3, 'Example'))).toBe(false);
  });

  it('rejects namespace tables without a main namespace', () => {
    expect(() => new StaticSiteContext('broken', [{ id: 1, canonicalName: 'Talk', aliases: [] }])).toThrow(
      ConfigurationError
    );
  });

  it('rejects unknown namespaces when building pages', () => {
    expect(() => site.page(100, 'Portal:Main')).toThrow(ConfigurationError);
  });
});
