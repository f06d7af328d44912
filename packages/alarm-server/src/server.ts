/**
 * MCP server exposing the alarm tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { PACKAGE_NAME, VERSION } from './constants.js';
import { KillswitchError } from './errors.js';
import { getAlarmTools, handleAlarmTool, type AlarmToolContext, type ToolResult } from './tools/alarm-tools.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

/** Run one tool call; thrown errors become `isError` results. */
export async function callTool(
  name: string,
  args: Record<string, unknown>,
  ctx: AlarmToolContext,
  logger: Logger = rootLogger
): Promise<ToolResult> {
  try {
    return await handleAlarmTool(name, args, ctx);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof KillswitchError ? ` [${error.code}]` : '';
    logger.warn(`Tool error (${name}): ${message}`);
    return {
      content: [{ type: 'text', text: `Error${code}: ${message}` }],
      isError: true,
    };
  }
}

export function createMcpServer(ctx: AlarmToolContext, logger: Logger = rootLogger): Server {
  const log = logger.child('MCP');
  const tools = getAlarmTools();

  const server = new Server(
    {
      name: PACKAGE_NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args ?? {}, ctx, log);
  });

  return server;
}
