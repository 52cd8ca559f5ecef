import { describe, it, expect, vi } from 'vitest';
import { GenericLogEntry } from './LogEntry.js';
import { UploadEntry } from './UploadEntry.js';
import { FieldAbsentError, ParseError } from '../utils/errors.js';
import { StaticSiteContext } from '../services/StaticSiteContext.js';
import type { RawRecord } from '../models/LogEntry.js';
import { record, site } from './__fixtures__/records.js';

function generic(raw: RawRecord): GenericLogEntry {
  return new GenericLogEntry({ record: raw, site, onDeprecated: vi.fn() });
}

describe('LogEntry', () => {
  describe('common accessors', () => {
    it('returns typed values from the record', () => {
      const entry = generic(
        record({
          logid: 42,
          type: 'delete',
          action: 'delete',
          ns: 1,
          title: 'Talk:Spam',
          pageid: 0,
          user: 'Cleaner',
          comment: 'spam',
        })
      );

      expect(entry.logid()).toBe(42);
      expect(entry.ns()).toBe(1);
      expect(entry.pageid()).toBe(0);
      expect(entry.user()).toBe('Cleaner');
      expect(entry.comment()).toBe('spam');
      expect(entry.title()).toBe('Talk:Spam');
      expect(entry.page().titleWithoutNamespace()).toBe('Spam');
      expect(entry.page().namespace().id).toBe(1);
    });

    it('defaults the action to the type', () => {
      const entry = generic({ logid: 1, type: 'thanks', timestamp: '2020-01-01T00:00:00Z' });

      expect(entry.action()).toBe('thanks');
    });

    it('accepts virtual namespaces', () => {
      expect(generic(record({ type: 'thanks', ns: -1, title: 'Special:Log' })).ns()).toBe(-1);
    });

    it('caches the page reference', () => {
      const entry = generic(record({ type: 'thanks', title: 'Main Page' }));

      expect(entry.page()).toBe(entry.page());
    });
  });

  describe('optional fields', () => {
    const bare = { logid: 3, type: 'thanks', timestamp: '2020-01-01T00:00:00Z' };

    it('fails title access when the entry has no title', () => {
      const entry = generic(bare);

      expect(entry.hasTitle()).toBe(false);
      expect(() => entry.title()).toThrow(FieldAbsentError);
      expect(() => entry.page()).toThrow("Log entry (3) has no 'title' field");
    });

    it('fails namespace access when the entry has no namespace', () => {
      expect(() => generic(bare).ns()).toThrow("Log entry (3) has no 'ns' field");
    });

    it('treats a missing pageid as no page', () => {
      expect(generic(bare).pageid()).toBe(0);
    });

    it('returns empty strings for redacted user and comment', () => {
      const entry = generic({ ...bare, userhidden: '', commenthidden: '' });

      expect(entry.user()).toBe('');
      expect(entry.comment()).toBe('');
      expect(entry.isUserHidden()).toBe(true);
      expect(entry.isCommentHidden()).toBe(true);
      expect(entry.isActionHidden()).toBe(false);
    });
  });

  describe('validation', () => {
    it.each([
      { field: 'logid', override: { logid: -1 } },
      { field: 'ns', override: { ns: -3 } },
      { field: 'pageid', override: { pageid: 1.5 } },
      { field: 'user', override: { user: 12 } },
      { field: 'title', override: { title: ['Main Page'] } },
    ])('rejects an ill-shaped $field field', ({ field, override }) => {
      try {
        generic(record({ type: 'thanks', ...override }));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.field).toBe(field);
        }
      }
    });

    it('rejects unparsable timestamps', () => {
      expect(() => generic(record({ type: 'thanks', timestamp: 'yesterday' }))).toThrow(
        "Log entry (1) has an invalid 'timestamp' field: yesterday"
      );
    });

    it('rejects timestamps that are not ISO 8601 or MediaWiki form', () => {
      expect(() => generic(record({ type: 'thanks', timestamp: '1' }))).toThrow(
        "Log entry (1) has an invalid 'timestamp' field: 1"
      );
    });

    it('rejects an empty type', () => {
      expect(() => generic(record({ type: '' }))).toThrow(ParseError);
    });

    it('reports unknown namespaces as parse errors', () => {
      const entry = generic(record({ type: 'thanks', ns: 100, title: 'Portal:Main' }));

      expect(() => entry.page()).toThrow(ParseError);
    });
  });

  describe('equals', () => {
    it('matches entries with the same logid on the same site', () => {
      const a = generic(record({ logid: 8, type: 'thanks' }));
      const b = generic(record({ logid: 8, type: 'thanks', comment: 'other' }));
      const c = generic(record({ logid: 9, type: 'thanks' }));

      expect(a.equals(b)).toBe(true);
      expect(a.equals(c)).toBe(false);
    });

    it('does not match entries from another site', () => {
      const other = new StaticSiteContext('other', [{ id: 0, canonicalName: '', aliases: [] }]);
      const a = generic(record({ logid: 8, type: 'thanks' }));
      const b = new GenericLogEntry({
        record: record({ logid: 8, type: 'thanks' }),
        site: other,
        onDeprecated: vi.fn(),
      });

      expect(a.equals(b)).toBe(false);
    });
  });
});

describe('UploadEntry', () => {
  it('places the uploaded file in the file namespace', () => {
    const entry = new UploadEntry({
      record: record({ type: 'upload', action: 'upload', ns: 6, title: 'Image:Example.png' }),
      site,
      onDeprecated: vi.fn(),
    });

    expect(entry.filePage().namespace().id).toBe(6);
    expect(entry.filePage().title()).toBe('File:Example.png');
  });
});
