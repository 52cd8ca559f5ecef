/**
 * MCP型定義
 * Model Context Protocolサーバーのツール入力スキーマ
 */

import { z } from 'zod';

/**
 * MCPツールの入力スキーマ（registerToolにはshapeを渡す）
 */
export const ParseLogEntriesSchema = z.object({
  records: z
    .array(z.record(z.unknown()))
    .describe('Raw logevents records as returned by the action API (list=logevents)'),
  logtype: z
    .string()
    .optional()
    .describe('Build every record as this log type; mismatched records are reported as failures'),
});

export type ParseLogEntriesArgs = z.infer<typeof ParseLogEntriesSchema>;

/**
 * parse_log_entriesの失敗レコード
 */
export interface FailureReport {
  index: number;
  logid: number | null;
  field: string | null;
  message: string;
}
