import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EntryTypeRegistry } from './EntryTypeRegistry.js';
import {
  createDefaultRegistry,
  GenericLogEntry,
  PatrolEntry,
  type EntryInit,
} from '../entries/index.js';
import { SPECIALIZED_KINDS } from '../models/LogEntry.js';
import { ConfigurationError } from '../utils/errors.js';

describe('EntryTypeRegistry', () => {
  const generic = vi.fn((init: EntryInit) => new GenericLogEntry(init));
  let registry: EntryTypeRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    registry = new EntryTypeRegistry(generic);
  });

  it('resolves registered kinds to their builder', () => {
    const patrol = vi.fn((init: EntryInit) => new PatrolEntry(init));
    registry.register('patrol', patrol);

    expect(registry.resolve('patrol')).toBe(patrol);
    expect(registry.has('patrol')).toBe(true);
  });

  it('falls back to the generic builder for unregistered kinds', () => {
    expect(registry.resolve('newfeature')).toBe(generic);
    expect(registry.has('newfeature')).toBe(false);
  });

  it('rejects duplicate registrations', () => {
    registry.register('block', generic);

    expect(() => registry.register('block', generic)).toThrow(ConfigurationError);
    expect(() => registry.register('block', generic)).toThrow(
      "Log type 'block' is already registered"
    );
  });

  it('rejects registrations after freeze', () => {
    registry.freeze();

    expect(registry.isFrozen()).toBe(true);
    expect(() => registry.register('move', generic)).toThrow(
      "Cannot register 'move': registry is frozen"
    );
  });

  it('lists only the kinds with specialized builders', () => {
    registry.register('block', generic).register('move', generic);

    expect([...registry.knownKinds()]).toEqual(['block', 'move']);
  });

  it('default registry covers every specialized kind and is frozen', () => {
    const defaults = createDefaultRegistry();

    expect(new Set(defaults.knownKinds())).toEqual(new Set(SPECIALIZED_KINDS));
    expect(defaults.isFrozen()).toBe(true);
  });
});
