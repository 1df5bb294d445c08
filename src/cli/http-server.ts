/**
 * HTTP Server Mode for remindctl-mcp
 *
 * Serves MCP over Streamable HTTP at /mcp, one MCP server and session
 * context per HTTP session, plus an unauthenticated GET /health.
 */

import { createHash, randomUUID, timingSafeEqual } from 'crypto';
import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { SessionContext } from '../core/session-context.js';
import { createMcpServer, type ServerServices } from '../server.js';
import { httpLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/mcp-response.js';
import { VERSION } from '../version.js';

/**
 * HTTP Server Configuration
 */
export interface HTTPServerConfig {
  /** HTTP server port */
  port: number;
  /** HTTP server host address */
  host: string;
  /** Bearer API key check */
  auth: {
    required: boolean;
    apiKey: string | null;
  };
  /** Largest accepted request body */
  maxBodyBytes?: number;
}

/**
 * Server information
 */
export interface ServerInfo {
  port: number;
  host: string;
  authRequired: boolean;
  sessions: number;
  startTime?: Date;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'ok' | 'error';
  uptime: number;
  version: string;
  timestamp: string;
  sessions: number;
}

/**
 * HTTP Server Instance interface
 */
export interface HTTPServerInstance {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  getPort(): number;
  getHost(): string;
  getServerInfo(): ServerInfo;
}

interface McpSession {
  transport: StreamableHTTPServerTransport;
  context: SessionContext;
}

const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;

// JSON-RPC error codes used before a request reaches the transport
const PARSE_ERROR = -32700;
const INVALID_REQUEST = -32600;
const INTERNAL_ERROR = -32603;
const UNAUTHORIZED = -32001;

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Check an Authorization header against the configured API key
 *
 * Both sides are hashed first so the comparison is constant-time regardless
 * of the presented token's length.
 */
export function isAuthorized(header: string | undefined, apiKey: string): boolean {
  if (!header) {
    return false;
  }
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  if (!match) {
    return false;
  }
  return timingSafeEqual(digest(match[1]), digest(apiKey));
}

function sessionIdOf(req: IncomingMessage): string | undefined {
  const header = req.headers['mcp-session-id'];
  return Array.isArray(header) ? header[0] : header;
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendRpcError(
  res: ServerResponse,
  statusCode: number,
  code: number,
  message: string
): void {
  sendJson(res, statusCode, { jsonrpc: '2.0', id: null, error: { code, message } });
}

class BodyTooLargeError extends Error {
  constructor() {
    super('request body too large');
    this.name = 'BodyTooLargeError';
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      // Past the limit the rest is drained and dropped so the 413 still reaches the client
      if (size > limit) {
        chunks.length = 0;
        reject(new BodyTooLargeError());
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

/**
 * HTTP Server implementation
 */
class HTTPServer implements HTTPServerInstance {
  private readonly config: HTTPServerConfig;
  private readonly services: ServerServices;
  private server: Server | null = null;
  private port: number;
  private running = false;
  private startTime: Date | null = null;
  private readonly sessions: Map<string, McpSession> = new Map();

  constructor(config: HTTPServerConfig, services: ServerServices) {
    this.config = config;
    this.services = services;
    this.port = config.port;
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        httpLogger.error({ err: getErrorMessage(error), url: req.url }, 'Request failed');
        if (!res.headersSent) {
          sendRpcError(res, 500, INTERNAL_ERROR, 'Internal server error');
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        // Port 0 asks the OS for a free port
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        this.running = true;
        this.startTime = new Date();
        httpLogger.info(
          {
            host: this.config.host,
            port: this.port,
            authRequired: this.config.auth.required,
          },
          'HTTP server listening'
        );
        resolve();
      });
    });
  }

  /**
   * Stop the server, closing every MCP session first
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }

    const open = [...this.sessions.values()];
    this.sessions.clear();
    for (const { transport, context } of open) {
      context.close();
      await transport.close();
    }

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this.running = false;
    this.startTime = null;
    this.server = null;
    httpLogger.info('HTTP server stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getPort(): number {
    return this.port;
  }

  getHost(): string {
    return this.config.host;
  }

  getServerInfo(): ServerInfo {
    return {
      port: this.port,
      host: this.config.host,
      authRequired: this.config.auth.required,
      sessions: this.sessions.size,
      startTime: this.startTime ?? undefined,
    };
  }

  /**
   * Handle incoming HTTP request
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = (req.url || '/').split('?')[0];
    const method = req.method || 'GET';

    for (const [key, value] of Object.entries(this.getCORSHeaders())) {
      res.setHeader(key, value);
    }

    // Handle preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (path === '/health' && method === 'GET') {
      this.handleHealthCheck(res);
      return;
    }

    if (path === '/mcp') {
      if (!this.checkAuth(req)) {
        sendRpcError(res, 401, UNAUTHORIZED, 'missing or invalid bearer token');
        return;
      }
      if (method === 'POST') {
        await this.handleMcpPost(req, res);
        return;
      }
      if (method === 'GET' || method === 'DELETE') {
        await this.handleMcpSessionRequest(req, res);
        return;
      }
    }

    sendJson(res, 404, { error: 'Not found' });
  }

  private getCORSHeaders(): Record<string, string> {
    return {
      'Access-Control-Allow-Origin': '*',
      'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization, Mcp-Session-Id',
      'Access-Control-Expose-Headers': 'Mcp-Session-Id',
      'Access-Control-Max-Age': '86400',
    };
  }

  private checkAuth(req: IncomingMessage): boolean {
    const { required, apiKey } = this.config.auth;
    if (!required) {
      return true;
    }
    return apiKey !== null && isAuthorized(req.headers.authorization, apiKey);
  }

  private handleHealthCheck(res: ServerResponse): void {
    const uptime = this.startTime ? Date.now() - this.startTime.getTime() : 0;
    const health: HealthCheckResponse = {
      status: this.running ? 'ok' : 'error',
      uptime,
      version: VERSION,
      timestamp: new Date().toISOString(),
      sessions: this.sessions.size,
    };
    sendJson(res, 200, health);
  }

  private async handleMcpPost(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      const raw = await readBody(req, this.config.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
      body = JSON.parse(raw);
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        sendRpcError(res, 413, INVALID_REQUEST, error.message);
      } else {
        sendRpcError(res, 400, PARSE_ERROR, 'Parse error');
      }
      return;
    }

    const sessionId = sessionIdOf(req);
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      await existing.transport.handleRequest(req, res, body);
      return;
    }

    if (sessionId || !isInitializeRequest(body)) {
      sendRpcError(res, 400, INVALID_REQUEST, 'Bad Request: no valid session id provided');
      return;
    }

    await this.openSession(req, res, body);
  }

  private async handleMcpSessionRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = sessionIdOf(req);
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!existing) {
      sendRpcError(res, 400, INVALID_REQUEST, 'Bad Request: no valid session id provided');
      return;
    }
    await existing.transport.handleRequest(req, res);
  }

  private async openSession(
    req: IncomingMessage,
    res: ServerResponse,
    body: unknown
  ): Promise<void> {
    const sessionId = randomUUID();
    const context = new SessionContext(sessionId);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => sessionId,
      onsessioninitialized: (id) => {
        this.sessions.set(id, { transport, context });
        httpLogger.info({ sessionId: id }, 'MCP session opened');
      },
    });

    transport.onclose = () => {
      context.close();
      if (this.sessions.delete(sessionId)) {
        httpLogger.info({ sessionId }, 'MCP session closed');
      }
    };

    const server = createMcpServer(this.services, context);
    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }
}

/**
 * Create and start an HTTP server
 */
export async function createHTTPServer(
  config: HTTPServerConfig,
  services: ServerServices
): Promise<HTTPServerInstance> {
  const server = new HTTPServer(config, services);
  await server.start();
  return server;
}
