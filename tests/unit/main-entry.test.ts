/**
 * Main Entry Point Unit Tests
 *
 * remindctl is never spawned: child_process is mocked, and so is the stdio
 * transport so the test runner's own stdin and stdout stay untouched.
 */

import { execFile } from 'child_process';
import { buildServices, startServer } from '../../src/cli/main-entry.js';
import { getHelpMessage, getVersion, parseArgs } from '../../src/cli/parser.js';
import { ConfigLoader } from '../../src/config/loader.js';
import { FakeRemindctl } from '../helpers/index.js';

jest.mock('child_process', () => ({
  ...jest.requireActual<typeof import('child_process')>('child_process'),
  execFile: jest.fn(),
}));

jest.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: jest.fn().mockImplementation(() => ({
    start: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined),
    send: jest.fn().mockResolvedValue(undefined),
  })),
}));

const { ChildProcess } = jest.requireActual<typeof import('child_process')>('child_process');
const mockExecFile = jest.mocked(execFile);

function respondWith(error: Error | null, stdout = ''): void {
  mockExecFile.mockImplementation((...args: unknown[]) => {
    const callback = args[args.length - 1];
    if (typeof callback === 'function') {
      process.nextTick(() => callback(error, stdout, ''));
    }
    return new ChildProcess();
  });
}

const AUTHORIZED = JSON.stringify({ authorized: true, status: 'authorized' });

describe('Main Entry Point', () => {
  beforeEach(() => {
    mockExecFile.mockReset();
  });

  describe('startServer', () => {
    it('should return the help text without starting anything', async () => {
      const result = await startServer(parseArgs(['--help'], {}), {});

      expect(result).toEqual({ mode: 'help', success: true, message: getHelpMessage() });
      expect(mockExecFile).not.toHaveBeenCalled();
    });

    it('should return the version', async () => {
      const result = await startServer(parseArgs(['--version'], {}), {});

      expect(result).toEqual({ mode: 'version', success: true, message: getVersion() });
    });

    it('should fail on invalid configuration before probing remindctl', async () => {
      const result = await startServer(parseArgs(['--remote'], {}), {});

      expect(result).toEqual({
        mode: 'http',
        success: false,
        error: 'API_KEY is required when AUTH_REQUIRED is true in remote mode',
      });
      expect(mockExecFile).not.toHaveBeenCalled();
    });

    it('should fail when remindctl cannot be spawned', async () => {
      respondWith(Object.assign(new Error('spawn remindctl ENOENT'), { code: 'ENOENT' }));

      const result = await startServer(parseArgs(['--no-queue'], {}), {});

      expect(result).toEqual({
        mode: 'stdio',
        success: false,
        error: 'remindctl is unavailable: spawn remindctl ENOENT',
      });
    });

    it('should start over stdio when remindctl answers', async () => {
      respondWith(null, AUTHORIZED);

      const result = await startServer(parseArgs(['--no-queue'], {}), {
        REMINDCTL_BIN: '/opt/bin/remindctl',
      });

      expect(result).toMatchObject({ mode: 'stdio', success: true });
      expect(mockExecFile.mock.calls[0][0]).toBe('/opt/bin/remindctl');
      await result.stop?.();
    });

    it('should still start when remindctl lacks permission', async () => {
      respondWith(null, JSON.stringify({ authorized: false, status: 'denied' }));

      const result = await startServer(parseArgs(['--no-queue'], {}), {});

      expect(result.success).toBe(true);
      await result.stop?.();
    });

    it('should start over HTTP on the requested host', async () => {
      respondWith(null, AUTHORIZED);

      const options = { ...parseArgs(['--remote', '--no-queue'], {}), port: 0 };

      const result = await startServer(options, { API_KEY: 'test-secret' });

      expect(result).toMatchObject({
        mode: 'http',
        success: true,
        host: '127.0.0.1',
        authRequired: true,
      });
      expect(result.port).toBeGreaterThan(0);
      await result.stop?.();
    });
  });

  describe('buildServices', () => {
    it('should create a queue for the configured workspace', () => {
      const config = ConfigLoader.load(
        parseArgs(['--workspace', 'desk', '--queue-dir', '/tmp/remindctl-mcp-q'], {}),
        {}
      );

      const services = buildServices(config, new FakeRemindctl());

      expect(services.queue?.workspace).toBe('desk');
      expect(services.queue?.getMutex()).toBe(services.mutex);
      expect(services.publicConfig).toEqual(ConfigLoader.toPublic(config));
    });

    it('should leave the queue out when it is disabled', () => {
      const config = ConfigLoader.load(parseArgs(['--no-queue'], {}), {});

      const services = buildServices(config, new FakeRemindctl());

      expect(services.queue).toBeNull();
      expect(services.orchestrator.getQueue()).toBeNull();
    });
  });
});
