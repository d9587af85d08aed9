import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, Tool } from "@modelcontextprotocol/sdk/types.js";
import { TOOL_NAME } from '../lib/asof-reader.js';
import { Logger, silentLogger } from '../obs/logger.js';
import { ContentFormat, ToolResult } from '../types/wiki-asof.types.js';

export interface ReadAsOfArgs {
  queryOrUrl: string;
  asOfTimestamp?: string;
  format?: ContentFormat;
}

/**
 * Agent-side handle on a wiki-asof server. Tool failures come back as
 * `{ output: null, error }`, mirroring the server's own tool boundary.
 * Pass any SDK transport to `connect`, e.g. a `StdioClientTransport` that
 * spawns `wiki-asof-mcp`.
 */
export class McpClient {
  private client: Client;
  private isConnected = false;
  private availableTools: Tool[] = [];

  constructor(
    private readonly serverName: string,
    private readonly logger: Logger = silentLogger
  ) {
    this.client = new Client({
      name: `wiki-asof-client-${serverName}`,
      version: "0.1.0",
    }, {
      capabilities: {}
    });
  }

  async connect(transport: Transport, timeoutMs = 30000): Promise<void> {
    if (this.isConnected) {
      this.logger.warn(`MCP client ${this.serverName} is already connected`);
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Connection timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      await Promise.race([this.client.connect(transport), timeoutPromise]);
      this.isConnected = true;

      const { tools } = await this.client.listTools();
      this.availableTools = tools;
      this.logger.debug(`Connected to MCP server ${this.serverName}`, {
        tools: tools.map((tool) => tool.name),
      });
    } catch (error) {
      this.logger.error(`Failed to connect to MCP server ${this.serverName}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await this.close();
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  async readAsOf({ queryOrUrl, asOfTimestamp, format }: ReadAsOfArgs): Promise<ToolResult> {
    if (!this.isConnected) {
      throw new Error(`MCP client ${this.serverName} is not connected`);
    }
    if (!this.availableTools.some((tool) => tool.name === TOOL_NAME)) {
      const names = this.availableTools.map((tool) => tool.name);
      throw new Error(`Tool ${TOOL_NAME} not found in ${this.serverName}. Available tools: ${names.join(', ')}`);
    }

    const args: Record<string, string> = { query_or_url: queryOrUrl };
    if (asOfTimestamp !== undefined) args.t_query = asOfTimestamp;
    if (format !== undefined) args.format = format;

    const response = CallToolResultSchema.parse(
      await this.client.callTool({ name: TOOL_NAME, arguments: args })
    );

    const text = response.content
      .map((item) => (item.type === 'text' ? item.text : ''))
      .join('');

    return response.isError
      ? { output: null, error: text || `${TOOL_NAME} error: empty response` }
      : { output: text, error: null };
  }

  async close(): Promise<void> {
    try {
      await this.client.close();
    } catch (error) {
      this.logger.warn(`Error during client close for ${this.serverName}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.isConnected = false;
      this.availableTools = [];
    }
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get tools(): Tool[] {
    return [...this.availableTools];
  }
}
