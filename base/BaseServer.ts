import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  CallToolResult,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { Logger, silentLogger } from "../obs/logger.js";

export type ToolArguments = Record<string, unknown>;

export abstract class BaseServer {
  protected server: Server;

  constructor(
    protected readonly serverName: string,
    protected readonly serverVersion: string,
    protected readonly serverDescription: string,
    protected readonly logger: Logger = silentLogger
  ) {
    this.server = new Server(
      {
        name: serverName,
        version: serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions: serverDescription,
      }
    );
    this.setupHandlers();
  }

  protected abstract getTools(): Tool[];
  protected abstract handleToolCall(name: string, args: ToolArguments): Promise<CallToolResult>;

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return await this.handleToolCall(request.params.name, request.params.arguments ?? {});
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info(`${this.serverName} MCP server running on stdio`, { version: this.serverVersion });
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  protected throwMcpError(code: ErrorCode, message: string): never {
    throw new McpError(code, message);
  }
}
