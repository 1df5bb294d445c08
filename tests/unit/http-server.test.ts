/**
 * HTTP Server Mode Unit Tests
 *
 * Servers listen on an OS-assigned localhost port.
 */

import {
  createHTTPServer,
  isAuthorized,
  type HTTPServerConfig,
  type HTTPServerInstance,
} from '../../src/cli/http-server.js';
import type { PublicConfig } from '../../src/config/loader.js';
import { VERSION } from '../../src/version.js';
import { SAMPLE_SEED, createTestContext, type TestContext } from '../helpers/index.js';

const API_KEY = 'test-secret';

const PUBLIC_CONFIG: PublicConfig = {
  mode: 'http',
  host: '127.0.0.1',
  port: 0,
  authRequired: true,
  readTimeoutMs: 10000,
  writeTimeoutMs: 20000,
  workspace: 'test',
  queueEnabled: false,
  deleteAllowMissing: true,
  autoRouteLists: true,
};

const INITIALIZE = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

const MCP_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json, text/event-stream',
};

describe('isAuthorized', () => {
  it('should accept the configured bearer token', () => {
    expect(isAuthorized(`Bearer ${API_KEY}`, API_KEY)).toBe(true);
    expect(isAuthorized(`bearer   ${API_KEY}`, API_KEY)).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isAuthorized(undefined, API_KEY)).toBe(false);
    expect(isAuthorized('', API_KEY)).toBe(false);
    expect(isAuthorized(API_KEY, API_KEY)).toBe(false);
    expect(isAuthorized(`Basic ${API_KEY}`, API_KEY)).toBe(false);
    expect(isAuthorized('Bearer wrong-secret', API_KEY)).toBe(false);
    expect(isAuthorized(`Bearer ${API_KEY}x`, API_KEY)).toBe(false);
  });
});

describe('HTTP Server Mode', () => {
  let ctx: TestContext;
  let server: HTTPServerInstance | null = null;

  async function start(auth: HTTPServerConfig['auth']): Promise<string> {
    ctx = await createTestContext({ seed: SAMPLE_SEED });
    server = await createHTTPServer(
      { port: 0, host: '127.0.0.1', auth, maxBodyBytes: 1024 },
      { orchestrator: ctx.orchestrator, queue: null, publicConfig: PUBLIC_CONFIG }
    );
    return `http://127.0.0.1:${server.getPort()}`;
  }

  afterEach(async () => {
    if (server) {
      await server.stop();
      server = null;
    }
    await ctx.cleanup();
  });

  describe('lifecycle', () => {
    it('should listen on an assigned port and stop cleanly', async () => {
      await start({ required: false, apiKey: null });
      const running = server;

      expect(running?.isRunning()).toBe(true);
      expect(running?.getPort()).toBeGreaterThan(0);
      expect(running?.getServerInfo()).toMatchObject({
        host: '127.0.0.1',
        authRequired: false,
        sessions: 0,
      });

      await running?.stop();
      expect(running?.isRunning()).toBe(false);
    });
  });

  describe('routing', () => {
    it('should answer /health without credentials', async () => {
      const base = await start({ required: true, apiKey: API_KEY });

      const response = await fetch(`${base}/health`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toMatchObject({
        status: 'ok',
        version: VERSION,
        sessions: 0,
      });
    });

    it('should answer CORS preflight requests', async () => {
      const base = await start({ required: true, apiKey: API_KEY });

      const response = await fetch(`${base}/mcp`, { method: 'OPTIONS' });

      expect(response.status).toBe(204);
      expect(response.headers.get('access-control-allow-origin')).toBe('*');
    });

    it('should return 404 for unknown paths', async () => {
      const base = await start({ required: false, apiKey: null });

      const response = await fetch(`${base}/nowhere`);

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toEqual({ error: 'Not found' });
    });
  });

  describe('authentication', () => {
    it('should reject /mcp without a bearer token', async () => {
      const base = await start({ required: true, apiKey: API_KEY });

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: MCP_HEADERS,
        body: JSON.stringify(INITIALIZE),
      });

      expect(response.status).toBe(401);
      await expect(response.json()).resolves.toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32001, message: 'missing or invalid bearer token' },
      });
    });

    it('should reject a wrong bearer token', async () => {
      const base = await start({ required: true, apiKey: API_KEY });

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: { ...MCP_HEADERS, Authorization: 'Bearer wrong-secret' },
        body: JSON.stringify(INITIALIZE),
      });

      expect(response.status).toBe(401);
    });
  });

  describe('MCP endpoint', () => {
    it('should refuse a body that is not JSON', async () => {
      const base = await start({ required: false, apiKey: null });

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: MCP_HEADERS,
        body: '{not json',
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toMatchObject({ error: { code: -32700 } });
    });

    it('should refuse a body over the size limit', async () => {
      const base = await start({ required: false, apiKey: null });

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: MCP_HEADERS,
        body: JSON.stringify({ padding: 'x'.repeat(2048) }),
      });

      expect(response.status).toBe(413);
    });

    it('should refuse a request without a session that is not initialize', async () => {
      const base = await start({ required: false, apiKey: null });

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: MCP_HEADERS,
        body: JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'tools/list' }),
      });

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32600, message: 'Bad Request: no valid session id provided' },
      });
    });

    it('should open a session on initialize and close it on DELETE', async () => {
      const base = await start({ required: true, apiKey: API_KEY });
      const headers = { ...MCP_HEADERS, Authorization: `Bearer ${API_KEY}` };

      const response = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers,
        body: JSON.stringify(INITIALIZE),
      });
      const text = await response.text();
      const sessionId = response.headers.get('mcp-session-id');

      expect(response.status).toBe(200);
      expect(sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(text).toContain('"name":"remindctl-mcp"');
      expect(server?.getServerInfo().sessions).toBe(1);

      const closed = await fetch(`${base}/mcp`, {
        method: 'DELETE',
        headers: { ...headers, 'Mcp-Session-Id': sessionId ?? '' },
      });

      expect(closed.status).toBe(200);
      expect(server?.getServerInfo().sessions).toBe(0);
    });

    it('should refuse GET for an unknown session', async () => {
      const base = await start({ required: false, apiKey: null });

      const response = await fetch(`${base}/mcp`, {
        headers: { Accept: 'text/event-stream', 'Mcp-Session-Id': 'no-such-session' },
      });

      expect(response.status).toBe(400);
    });
  });
});
