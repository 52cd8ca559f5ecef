import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryRecordSource, LogEventReader } from './LogEventReader.js';
import { LogEntryFactory } from './LogEntryFactory.js';
import { EntryTypeRegistry } from './EntryTypeRegistry.js';
import { RecordSourceExhaustedError } from '../utils/errors.js';
import { SAMPLE_RECORDS, record, site } from '../entries/__fixtures__/records.js';

describe('InMemoryRecordSource', () => {
  const source = new InMemoryRecordSource([
    SAMPLE_RECORDS.block,
    SAMPLE_RECORDS.move,
    SAMPLE_RECORDS.block,
  ]);

  it('filters by log type', () => {
    expect([...source.fetch({ logtype: 'block' })]).toHaveLength(2);
  });

  it('bounds the number of records', () => {
    expect([...source.fetch({ total: 1 })]).toEqual([SAMPLE_RECORDS.block]);
  });
});

describe('LogEventReader', () => {
  const broken = record({ type: 'rights', action: 'rights' });
  let factory: LogEntryFactory;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    factory = new LogEntryFactory({ onDeprecated: vi.fn() });
  });

  it('skips records that fail to parse and keeps reading', () => {
    const source = new InMemoryRecordSource([SAMPLE_RECORDS.block, broken, SAMPLE_RECORDS.move]);
    const reader = new LogEventReader(source, site, factory);

    const kinds = [...reader.read()].map((entry) => entry.kind);

    expect(kinds).toEqual(['block', 'move']);
    expect(reader.getFailures()).toHaveLength(1);
    expect(reader.getFailures()[0]?.index).toBe(1);
    expect(reader.getFailures()[0]?.error.field).toBe('old');
  });

  it('keeps only the failures of the latest read', () => {
    const source = new InMemoryRecordSource([broken, SAMPLE_RECORDS.block]);
    const reader = new LogEventReader(source, site, factory);

    [...reader.read()];
    [...reader.read({ logtype: 'block' })];

    expect(reader.getFailures()).toEqual([]);

    reader.parseBatch([SAMPLE_RECORDS.move, broken]);
    reader.parseBatch([broken]);

    expect(reader.getFailures().map((failure) => failure.index)).toEqual([0]);
  });

  it('collects entries and failures from the source', () => {
    const source = new InMemoryRecordSource([broken, SAMPLE_RECORDS.patrol]);
    const result = new LogEventReader(source, site, factory).collect();

    expect(result.entries.map((entry) => entry.kind)).toEqual(['patrol']);
    expect(result.failures.map((failure) => failure.index)).toEqual([0]);
  });

  it('parses batches without a source', () => {
    const reader = new LogEventReader(new InMemoryRecordSource([]), site, factory);
    const result = reader.parseBatch([SAMPLE_RECORDS.upload, broken, broken]);

    expect(result.entries).toHaveLength(1);
    expect(result.failures.map((failure) => failure.index)).toEqual([1, 2]);
    expect(result.failures[0]?.record).toBe(broken);
  });

  it('returns the first entry of a type', () => {
    const source = new InMemoryRecordSource([SAMPLE_RECORDS.block, SAMPLE_RECORDS.patrol]);

    expect(new LogEventReader(source, site, factory).first('patrol').kind).toBe('patrol');
  });

  it('signals exhaustion when no entry of the type exists', () => {
    const reader = new LogEventReader(new InMemoryRecordSource([SAMPLE_RECORDS.block]), site, factory);

    expect(() => reader.first('patrol')).toThrow(RecordSourceExhaustedError);
    expect(() => reader.first('patrol')).toThrow("No log entries of type 'patrol' available");
  });

  it('propagates errors other than parse errors', () => {
    const registry = new EntryTypeRegistry(() => {
      throw new TypeError('builder failed');
    }).freeze();
    const failing = new LogEntryFactory({ registry, onDeprecated: vi.fn() });
    const reader = new LogEventReader(new InMemoryRecordSource([SAMPLE_RECORDS.block]), site, failing);

    expect(() => [...reader.read()]).toThrow('builder failed');
  });
});
