/**
 * MCPサーバー実装
 * 生のlogeventsレコードを型付きのログエントリとして解析するツールを提供します
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createDefaultRegistry } from '../entries/index.js';
import type { EntryTypeRegistry } from '../services/EntryTypeRegistry.js';
import { LogEntryFactory } from '../services/LogEntryFactory.js';
import { InMemoryRecordSource, LogEventReader } from '../services/LogEventReader.js';
import { StaticSiteContext } from '../services/StaticSiteContext.js';
import { ConfigManager } from '../services/ConfigManager.js';
import { createDeprecationReporter, type DeprecationHook } from '../utils/deprecation.js';
import { Logger } from '../utils/logger.js';
import type { SiteContext } from '../models/Site.js';
import type { FailureReport, ParseLogEntriesArgs } from './types.js';
import { ParseLogEntriesSchema } from './types.js';

export class MCPServer {
  private mcpServer: McpServer;
  private registry: EntryTypeRegistry;
  private site: SiteContext;
  private onDeprecated: DeprecationHook;
  private logger: Logger;

  constructor(site: SiteContext = StaticSiteContext.fromConfig()) {
    this.mcpServer = new McpServer({
      name: 'wiki-logentries',
      version: '1.0.0',
    });

    this.logger = new Logger('MCPServer');
    this.registry = createDefaultRegistry();
    this.site = site;
    this.onDeprecated = createDeprecationReporter({
      ...ConfigManager.getInstance().get('deprecations'),
      logger: this.logger,
    });
  }

  /**
   * サーバーを起動します
   */
  async start(): Promise<void> {
    this.registerTools();

    const transport = new StdioServerTransport();
    await this.mcpServer.connect(transport);

    this.logger.info('MCP Server started', { site: this.site.name });
  }

  private registerTools(): void {
    this.mcpServer.registerTool(
      'parse_log_entries',
      {
        title: 'Parse Log Entries',
        description:
          'Parse raw wiki log events into typed entries. Returns common fields, the recognized log type and type-specific details for each record.',
        inputSchema: ParseLogEntriesSchema.shape,
      },
      ({ records, logtype }) => {
        this.logger.debug('Tool called: parse_log_entries', { count: records.length, logtype });
        return this.handleParseLogEntries({ records, ...(logtype !== undefined && { logtype }) });
      }
    );

    this.mcpServer.registerTool(
      'list_log_kinds',
      {
        title: 'List Log Kinds',
        description: 'List the log types that have a specialized representation.',
      },
      () => {
        this.logger.debug('Tool called: list_log_kinds');
        return this.handleListLogKinds();
      }
    );
  }

  /**
   * parse_log_entriesツールの処理
   */
  handleParseLogEntries(args: ParseLogEntriesArgs): CallToolResult {
    const factory = new LogEntryFactory({
      registry: this.registry,
      logtype: args.logtype,
      onDeprecated: this.onDeprecated,
    });
    const reader = new LogEventReader(new InMemoryRecordSource(args.records), this.site, factory);
    const { entries, failures } = reader.collect();

    const report: FailureReport[] = failures.map(({ index, error }) => ({
      index,
      logid: error.logid ?? null,
      field: error.field ?? null,
      message: error.message,
    }));

    this.logger.info('Parsed log entries', { parsed: entries.length, failed: report.length });

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({ entries, failures: report }, null, 2),
        },
      ],
      ...(report.length > 0 && entries.length === 0 && { isError: true }),
    };
  }

  /**
   * list_log_kindsツールの処理
   */
  handleListLogKinds(): CallToolResult {
    const kinds = [...this.registry.knownKinds()].sort();
    return {
      content: [
        {
          type: 'text',
          text: kinds.join('\n'),
        },
      ],
    };
  }

  async shutdown(): Promise<void> {
    this.logger.info('Shutting down MCP Server');
    await this.mcpServer.close();
  }
}
