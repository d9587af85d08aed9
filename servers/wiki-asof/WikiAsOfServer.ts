import { CallToolResult, ErrorCode, Tool } from "@modelcontextprotocol/sdk/types.js";
import { BaseServer, ToolArguments } from '../../base/BaseServer.js';
import { CONTENT_FORMATS } from '../../config/config.js';
import { AsOfReader, TOOL_NAME } from '../../lib/asof-reader.js';
import { Logger, silentLogger } from '../../obs/logger.js';
import { ContentFormat } from '../../types/wiki-asof.types.js';

export const SERVER_NAME = "wiki-asof-mcp";
export const SERVER_VERSION = "0.1.0";

function isContentFormat(value: unknown): value is ContentFormat {
  return typeof value === 'string' && CONTENT_FORMATS.some((format) => format === value);
}

export class WikiAsOfServer extends BaseServer {
  constructor(
    private readonly reader: AsOfReader,
    private readonly defaultFormat: ContentFormat,
    logger: Logger = silentLogger
  ) {
    super(
      SERVER_NAME,
      SERVER_VERSION,
      "Reads English Wikipedia pages as they stood at a given date, via revision ids",
      logger
    );
  }

  protected getTools(): Tool[] {
    return [
      {
        name: TOOL_NAME,
        description:
          "Reads English Wikipedia content as of time t. Resolves the latest revision at or before t_query " +
          "and returns that revision's id, timestamp, permalink and content. URLs carrying oldid are read directly.",
        inputSchema: {
          type: "object",
          properties: {
            query_or_url: {
              type: "string",
              description: "Page title or a Wikipedia URL",
            },
            t_query: {
              type: "string",
              description: "As-of date/time, e.g. 2024-04-15 (YYYY-MM-DD or ISO 8601). A bare date covers that whole UTC day.",
            },
            format: {
              type: "string",
              enum: [...CONTENT_FORMATS],
              description: "html returns rendered markup plus the section index; text returns a plain-text extract",
              default: this.defaultFormat,
            },
          },
          required: ["query_or_url"],
        },
      },
    ];
  }

  protected async handleToolCall(name: string, args: ToolArguments): Promise<CallToolResult> {
    switch (name) {
      case TOOL_NAME:
        return await this.handleReadAsOf(args);
      default:
        this.throwMcpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  private async handleReadAsOf(args: ToolArguments): Promise<CallToolResult> {
    const { query_or_url, t_query, format } = args;

    if (!query_or_url || typeof query_or_url !== 'string') {
      this.throwMcpError(ErrorCode.InvalidParams, "query_or_url is required and must be a string");
    }
    if (t_query != null && typeof t_query !== 'string') {
      this.throwMcpError(ErrorCode.InvalidParams, "t_query must be a string");
    }
    if (format != null && !isContentFormat(format)) {
      this.throwMcpError(ErrorCode.InvalidParams, `format must be one of: ${CONTENT_FORMATS.join(', ')}`);
    }

    const result = await this.reader.readAsOf(query_or_url, t_query ?? null, {
      format: format ?? this.defaultFormat,
    });

    if (result.error !== null || result.output === null) {
      return {
        content: [{ type: "text", text: result.error ?? `${TOOL_NAME} error: empty output` }],
        isError: true,
      };
    }

    return {
      content: [{ type: "text", text: result.output }],
    };
  }
}
