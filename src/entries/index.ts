import { EntryTypeRegistry } from '../services/EntryTypeRegistry.js';
import { BlockEntry } from './BlockEntry.js';
import { GenericLogEntry } from './LogEntry.js';
import { MarkerEntry } from './MarkerEntry.js';
import { MoveEntry } from './MoveEntry.js';
import { PatrolEntry } from './PatrolEntry.js';
import { RightsEntry } from './RightsEntry.js';
import { UploadEntry } from './UploadEntry.js';

export { LogEntry, GenericLogEntry, type EntryInit } from './LogEntry.js';
export { BlockEntry } from './BlockEntry.js';
export { RightsEntry } from './RightsEntry.js';
export { MoveEntry } from './MoveEntry.js';
export { PatrolEntry } from './PatrolEntry.js';
export { UploadEntry } from './UploadEntry.js';
export { MarkerEntry, type MarkerKind } from './MarkerEntry.js';

/**
 * ファクトリが返すエントリ。kindで判別する
 */
export type AnyLogEntry =
  | BlockEntry
  | RightsEntry
  | MoveEntry
  | PatrolEntry
  | UploadEntry
  | MarkerEntry
  | GenericLogEntry;

/**
 * すべての専用種別を登録して凍結したレジストリ
 */
export function createDefaultRegistry(): EntryTypeRegistry {
  return new EntryTypeRegistry((init) => new GenericLogEntry(init))
    .register('block', (init) => new BlockEntry(init))
    .register('rights', (init) => new RightsEntry(init))
    .register('move', (init) => new MoveEntry(init))
    .register('patrol', (init) => new PatrolEntry(init))
    .register('upload', (init) => new UploadEntry(init))
    .register('protect', (init) => new MarkerEntry(init, 'protect'))
    .register('delete', (init) => new MarkerEntry(init, 'delete'))
    .register('import', (init) => new MarkerEntry(init, 'import'))
    .register('newusers', (init) => new MarkerEntry(init, 'newusers'))
    .freeze();
}
