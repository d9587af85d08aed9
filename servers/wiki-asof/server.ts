#!/usr/bin/env node
import { loadConfig } from '../../config/config.js';
import { AsOfReader } from '../../lib/asof-reader.js';
import { createLogger } from '../../obs/logger.js';
import { WikiAsOfServer } from './WikiAsOfServer.js';

const config = loadConfig();
const logger = createLogger(config);
const server = new WikiAsOfServer(AsOfReader.fromConfig(config, logger), config.content.defaultFormat, logger);

server.run().catch((error: unknown) => {
  logger.error('Failed to start MCP server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
