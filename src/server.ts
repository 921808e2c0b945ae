import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { readCredentialHeader, resolveClientConfig, describeClientConfig, type RequestHeaders } from './auth/credential-resolver.js';
import type { LakehouseClientFactory } from './clients/lakehouse-client.js';
import { SERVER_INSTRUCTIONS, SERVER_NAME, SERVER_VERSION } from './constants.js';
import { getErrorMessage, toMcpError } from './errors.js';
import type { ToolDefinition, ToolRegistry } from './tools/types.js';
import { ProtectedBranchGuard } from './validators/branch-guard.js';

export interface ServerDependencies {
  tools: ToolRegistry;
  clientFactory: LakehouseClientFactory;
  /** Profile used when a call carries no credential header. */
  profile?: string;
  guard?: ProtectedBranchGuard;
}

const LOG_PREFIX = `[${SERVER_NAME}]`;

export function toInputSchema(schema: z.ZodObject): Tool['inputSchema'] {
  const json = z.toJSONSchema(schema, { io: 'input' });
  return {
    type: 'object',
    properties: json.properties ?? {},
    required: json.required ?? [],
  };
}

function findTool(tools: ToolRegistry, name: string): ToolDefinition | undefined {
  return Object.hasOwn(tools, name) ? tools[name] : undefined;
}

function toText(result: unknown): string {
  return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
}

/**
 * Serves one tools/call. Validation, the protected-branch guard and
 * credential resolution all happen before a lakehouse client is built;
 * local tools never build one.
 */
export async function dispatchToolCall(
  deps: ServerDependencies,
  name: string,
  rawArgs: unknown,
  headers?: RequestHeaders
): Promise<CallToolResult> {
  const tool = findTool(deps.tools, name);
  if (!tool) {
    throw new McpError(ErrorCode.MethodNotFound, `Tool ${name} not found`);
  }

  let credentials = 'no credentials';
  try {
    const call = tool.prepare(rawArgs);
    let result: unknown;
    if (call.kind === 'local') {
      result = await call.run();
    } else {
      (deps.guard ?? new ProtectedBranchGuard()).check(name, call.targets);
      const config = resolveClientConfig(deps.profile, readCredentialHeader(headers));
      credentials = describeClientConfig(config);
      result = await call.run(deps.clientFactory(config));
    }
    return { content: [{ type: 'text', text: toText(result) }] };
  } catch (error) {
    console.error(`${LOG_PREFIX} Tool ${name} failed (${credentials}): ${getErrorMessage(error)}`);
    throw toMcpError(error);
  }
}

export function createServer(deps: ServerDependencies): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: Object.entries(deps.tools).map(([name, tool]) => ({
        name,
        description: tool.description,
        inputSchema: toInputSchema(tool.inputSchema),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    return dispatchToolCall(deps, request.params.name, request.params.arguments, extra.requestInfo?.headers);
  });

  return server;
}
