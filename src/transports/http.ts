import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SERVER_NAME } from '../constants.js';
import { getErrorMessage } from '../errors.js';

export type HttpTransportKind = 'sse' | 'streamable-http';

export interface HttpTransportOptions {
  kind: HttpTransportKind;
  host: string;
  port: number;
  /** Builds a fresh MCP server; called once per session or stateless request. */
  createMcpServer: () => Server;
}

export interface RunningHttpTransport {
  url: string;
  close(): Promise<void>;
}

const LOG_PREFIX = `[${SERVER_NAME}]`;

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': '*',
  'Access-Control-Expose-Headers': 'Mcp-Session-Id',
};

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain' });
  res.end(body);
}

function sendJsonRpcError(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ jsonrpc: '2.0', error: { code: -32000, message }, id: null }));
}

function logCloseFailure(what: string) {
  return (error: unknown) => console.error(`${LOG_PREFIX} Failed to close ${what}: ${getErrorMessage(error)}`);
}

type RouteHandler = (req: IncomingMessage, res: ServerResponse, url: URL) => Promise<boolean>;

/** Stateless: every POST gets its own server and transport. */
function streamableHttpRoutes(createMcpServer: () => Server): RouteHandler {
  return async (req, res, url) => {
    if (url.pathname !== '/mcp' && url.pathname !== '/mcp/') {
      return false;
    }
    if (req.method !== 'POST') {
      sendJsonRpcError(res, 405, 'Method not allowed.');
      return true;
    }

    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      transport.close().catch(logCloseFailure('transport'));
      server.close().catch(logCloseFailure('server'));
    });
    await server.connect(transport);
    await transport.handleRequest(req, res);
    return true;
  };
}

/** GET /sse opens a session; POST /messages?sessionId= feeds it. */
function sseRoutes(createMcpServer: () => Server, sessions: Map<string, SSEServerTransport>): RouteHandler {
  return async (req, res, url) => {
    if (req.method === 'GET' && url.pathname === '/sse') {
      const transport = new SSEServerTransport('/messages', res);
      const server = createMcpServer();
      sessions.set(transport.sessionId, transport);
      res.on('close', () => {
        sessions.delete(transport.sessionId);
        server.close().catch(logCloseFailure('server'));
      });
      await server.connect(transport);
      return true;
    }

    if (req.method === 'POST' && url.pathname === '/messages') {
      const sessionId = url.searchParams.get('sessionId');
      const transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!transport) {
        sendText(res, 400, `Unknown session: ${sessionId ?? '(missing sessionId)'}`);
        return true;
      }
      await transport.handlePostMessage(req, res);
      return true;
    }

    return false;
  };
}

/**
 * Serves MCP over HTTP. Both kinds answer GET /healthz and send permissive
 * CORS headers; request headers reach tool calls through the transports.
 */
export async function startHttpTransport(options: HttpTransportOptions): Promise<RunningHttpTransport> {
  const sessions = new Map<string, SSEServerTransport>();
  const routes =
    options.kind === 'sse' ? sseRoutes(options.createMcpServer, sessions) : streamableHttpRoutes(options.createMcpServer);

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    if (req.method === 'GET' && url.pathname === '/healthz') {
      sendText(res, 200, 'ok');
      return;
    }
    if (!(await routes(req, res, url))) {
      sendText(res, 404, 'Not found');
    }
  }

  const httpServer: HttpServer = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      console.error(`${LOG_PREFIX} HTTP request failed: ${getErrorMessage(error)}`);
      if (!res.headersSent) {
        sendJsonRpcError(res, 500, 'Internal server error');
      } else {
        res.end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  // Port 0 asks the OS for a free port; report the one actually bound.
  const address = httpServer.address();
  const port = typeof address === 'object' && address !== null ? address.port : options.port;
  const path = options.kind === 'sse' ? '/sse' : '/mcp';
  return {
    url: `http://${options.host}:${port}${path}`,
    async close() {
      await Promise.all([...sessions.values()].map((transport) => transport.close()));
      sessions.clear();
      const closed = new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      httpServer.closeAllConnections();
      await closed;
    },
  };
}
