import type { RawRecord, SpecializedKind } from '../../models/LogEntry.js';
import { ConfigManager } from '../../services/ConfigManager.js';
import { StaticSiteContext } from '../../services/StaticSiteContext.js';

export const site = StaticSiteContext.fromConfig(ConfigManager.getDefaults().site);

export function record(fields: Record<string, unknown>): RawRecord {
  return {
    logid: 1,
    ns: 0,
    pageid: 0,
    user: 'Example',
    comment: '',
    timestamp: '2020-01-01T00:00:00Z',
    ...fields,
  };
}

/**
 * 専用種別ごとに、その種別として構築できる最小のレコード
 */
export const SAMPLE_RECORDS: Record<SpecializedKind, RawRecord> = {
  block: record({ type: 'block', action: 'block', ns: 2, title: 'User:Vandal', params: { flags: [] } }),
  rights: record({
    type: 'rights',
    action: 'rights',
    ns: 2,
    title: 'User:Helper',
    params: { oldgroups: [], newgroups: ['sysop'] },
  }),
  move: record({
    type: 'move',
    action: 'move',
    title: 'Old',
    params: { target_ns: 0, target_title: 'New' },
  }),
  patrol: record({
    type: 'patrol',
    action: 'patrol',
    title: 'Some page',
    params: { curid: 20, previd: 19, auto: 0 },
  }),
  upload: record({ type: 'upload', action: 'upload', ns: 6, title: 'File:Example.png' }),
  protect: record({ type: 'protect', action: 'protect', title: 'Main Page' }),
  delete: record({ type: 'delete', action: 'delete', title: 'Spam' }),
  import: record({ type: 'import', action: 'upload', title: 'Imported' }),
  newusers: record({ type: 'newusers', action: 'create', ns: 2, title: 'User:Newcomer' }),
};
