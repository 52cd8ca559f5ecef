import { describe, it, expect, vi } from 'vitest';
import { PatrolEntry } from './PatrolEntry.js';
import { ParseError } from '../utils/errors.js';
import type { RawRecord } from '../models/LogEntry.js';
import { record, site } from './__fixtures__/records.js';

function patrol(raw: RawRecord): PatrolEntry {
  return new PatrolEntry({ record: raw, site, onDeprecated: vi.fn() });
}

describe('PatrolEntry', () => {
  it('reads current revision ids', () => {
    const entry = patrol(record({ type: 'patrol', params: { curid: 100, previd: 99, auto: 0 } }));

    expect(entry.currentRevisionId()).toBe(100);
    expect(entry.previousRevisionId()).toBe(99);
    expect(entry.automatic()).toBe(false);
  });

  it('accepts revision ids sent as strings', () => {
    const entry = patrol(record({ type: 'patrol', params: { curid: '100', previd: '0' } }));

    expect(entry.currentRevisionId()).toBe(100);
    expect(entry.previousRevisionId()).toBe(0);
  });

  it('treats a missing auto key as manual patrol', () => {
    const entry = patrol(record({ type: 'patrol', params: { curid: 1, previd: 0 } }));

    expect(entry.automatic()).toBe(false);
  });

  it('treats any non-zero auto value as automatic', () => {
    expect(patrol(record({ type: 'patrol', params: { curid: 1, previd: 0, auto: 1 } })).automatic()).toBe(
      true
    );
    expect(patrol(record({ type: 'patrol', params: { curid: 1, previd: 0, auto: true } })).automatic()).toBe(
      true
    );
  });

  it('reads the legacy key names', () => {
    const entry = patrol(record({ type: 'patrol', patrol: { cur: '5', prev: '4', auto: '' } }));

    expect(entry.currentRevisionId()).toBe(5);
    expect(entry.previousRevisionId()).toBe(4);
    expect(entry.automatic()).toBe(true);
  });

  it('rejects non-numeric revision ids', () => {
    expect(() => patrol(record({ type: 'patrol', params: { curid: 'abc', previd: 1 } }))).toThrow(
      ParseError
    );
  });

  it('summarizes patrol details', () => {
    const entry = patrol(record({ type: 'patrol', params: { curid: 3, previd: 2, auto: 1 } }));

    expect(entry.toJSON().details).toEqual({
      currentRevisionId: 3,
      previousRevisionId: 2,
      automatic: true,
    });
  });
});
