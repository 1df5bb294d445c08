/**
 * Main Entry Point for remindctl-mcp
 *
 * Handles server startup based on CLI options: loads configuration, checks
 * that remindctl can be spawned, wires the services and opens a transport.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigLoader, type RuntimeConfig } from '../config/loader.js';
import { HealthMonitor } from '../core/health-monitor.js';
import { MutationOrchestrator } from '../core/mutation-orchestrator.js';
import { SessionContext } from '../core/session-context.js';
import { ReferenceResolver } from '../integrations/reference-resolver.js';
import { RemindctlRunner, type RemindctlExecutor } from '../integrations/remindctl-runner.js';
import { FileMutex } from '../queue/file-mutex.js';
import { PendingActionQueue } from '../queue/pending-action-queue.js';
import { createMcpServer, type ServerServices } from '../server.js';
import { ConfigError, fromRunnerFailure } from '../types/errors.js';
import { cliLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/mcp-response.js';
import { createHTTPServer } from './http-server.js';
import { CLIOptions, getHelpMessage, getVersion } from './parser.js';

/**
 * Server mode type
 */
export type ServerMode = 'stdio' | 'http' | 'help' | 'version';

/**
 * Server start result
 */
export interface ServerStartResult {
  /** Server mode */
  mode: ServerMode;
  /** Whether startup was successful */
  success: boolean;
  /** Error message if failed */
  error?: string;
  /** Message for help/version modes */
  message?: string;
  /** HTTP server port (for http mode) */
  port?: number;
  /** HTTP server host (for http mode) */
  host?: string;
  /** Whether the bearer API key is checked */
  authRequired?: boolean;
  /** Stop the transport and wait for queue writes */
  stop?: () => Promise<void>;
}

export interface AppServices extends ServerServices {
  mutex: FileMutex;
}

/**
 * Wire the shared services for one process
 */
export function buildServices(config: RuntimeConfig, runner: RemindctlExecutor): AppServices {
  const mutex = new FileMutex();
  const queue = config.queueEnabled
    ? new PendingActionQueue({ queueDir: config.queueDir, workspace: config.workspace, mutex })
    : null;

  const orchestrator = new MutationOrchestrator({
    runner,
    resolver: new ReferenceResolver(runner),
    health: new HealthMonitor(runner, config.healthCacheMs),
    queue,
    options: {
      deleteAllowMissing: config.deleteAllowMissing,
      autoRouteLists: config.autoRouteLists,
      authRequired: config.authRequired,
    },
  });

  return { orchestrator, queue, mutex, publicConfig: ConfigLoader.toPublic(config) };
}

/**
 * Probe remindctl once before serving
 * @returns error message when the binary cannot be spawned at all
 */
export async function preflight(runner: RemindctlRunner): Promise<string | null> {
  const result = await runner.preflight();
  if (!result.ok) {
    if (result.failure.kind === 'binary_unavailable') {
      return fromRunnerFailure(result.failure).message;
    }
    cliLogger.warn(
      { failure: result.failure.kind },
      'remindctl status check failed; continuing, writes may be queued'
    );
    return null;
  }
  if (!result.payload.authorized) {
    cliLogger.warn({ status: result.payload.status }, 'remindctl is not authorized');
  }
  return null;
}

/**
 * Start the server based on CLI options
 * @param options - Parsed CLI options
 * @returns Server start result
 */
export async function startServer(
  options: CLIOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<ServerStartResult> {
  // Handle help
  if (options.help) {
    return { mode: 'help', success: true, message: getHelpMessage() };
  }

  // Handle version
  if (options.version) {
    return { mode: 'version', success: true, message: getVersion() };
  }

  const mode = options.remote ? 'http' : 'stdio';

  let config: RuntimeConfig;
  try {
    config = ConfigLoader.load(options, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return { mode, success: false, error: error.message };
    }
    throw error;
  }

  const runner = new RemindctlRunner({
    binary: config.remindctlBin,
    readTimeoutMs: config.readTimeoutMs,
    writeTimeoutMs: config.writeTimeoutMs,
  });
  const unavailable = await preflight(runner);
  if (unavailable) {
    return { mode, success: false, error: unavailable };
  }

  const services = buildServices(config, runner);
  const waitForQueue = () => services.mutex.waitForPending();

  // Start in HTTP mode if remote flag is set
  if (config.mode === 'http') {
    try {
      const server = await createHTTPServer(
        {
          port: config.port,
          host: config.host,
          auth: { required: config.authRequired, apiKey: config.apiKey },
        },
        services
      );

      return {
        mode: 'http',
        success: true,
        port: server.getPort(),
        host: server.getHost(),
        authRequired: config.authRequired,
        stop: async () => {
          await server.stop();
          await waitForQueue();
        },
      };
    } catch (error) {
      return { mode: 'http', success: false, error: getErrorMessage(error) };
    }
  }

  // Start in Stdio mode (default)
  const session = new SessionContext();
  const server = createMcpServer(services, session);
  await server.connect(new StdioServerTransport());
  cliLogger.info(
    { workspace: config.workspace, queue: config.queueEnabled },
    'Stdio transport connected'
  );

  return {
    mode: 'stdio',
    success: true,
    stop: async () => {
      await server.close();
      session.close();
      await waitForQueue();
    },
  };
}
