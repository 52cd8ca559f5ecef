#!/usr/bin/env node
/**
 * wiki-logentries MCPサーバーのエントリーポイント
 * stdioトランスポートでサーバーを起動
 */

import { MCPServer } from './mcp/server.js';
import { ConfigManager } from './services/ConfigManager.js';
import { Logger } from './utils/logger.js';

async function main() {
  const config = ConfigManager.getInstance();
  Logger.configure({ logFile: config.get('logging').logFile, minLevel: config.getLogLevel() });
  const logger = new Logger('main');
  const server = new MCPServer();

  // グレースフルシャットダウンを処理
  process.on('SIGINT', () => {
    void server.shutdown().then(() => process.exit(0));
  });

  process.on('SIGTERM', () => {
    void server.shutdown().then(() => process.exit(0));
  });

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start MCP server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void main();
