/**
 * CLI Parser for remindctl-mcp
 *
 * Parses command line arguments and environment variables
 * to determine the server mode and queue location.
 */

import { SERVER_NAME, VERSION } from '../version.js';

/**
 * CLI Options interface
 */
export interface CLIOptions {
  /** Run in HTTP server mode (Remote MCP) */
  remote: boolean;
  /** HTTP server port */
  port: number;
  /** HTTP server host address */
  host: string;
  /** Workspace whose pending action queue this process owns */
  workspace: string;
  /** Directory holding queue files */
  queueDir?: string;
  /** Disable the pending action queue */
  noQueue: boolean;
  /** Show help message */
  help: boolean;
  /** Show version */
  version: boolean;
}

/** Default port for HTTP server */
export const DEFAULT_PORT = 8787;

/** Default host for HTTP server */
export const DEFAULT_HOST = '127.0.0.1';

/** Default workspace name */
export const DEFAULT_WORKSPACE = 'default';

/** Minimum valid port number */
const MIN_PORT = 1;

/** Maximum valid port number */
const MAX_PORT = 65535;

/**
 * Get the value of an argument that takes a parameter
 * @param longFlag - Long flag (e.g., '--port')
 * @param shortFlag - Short flag (e.g., '-p')
 */
function getArgValue(args: string[], longFlag: string, shortFlag?: string): string | undefined {
  for (const flag of shortFlag ? [longFlag, shortFlag] : [longFlag]) {
    const index = args.indexOf(flag);
    if (index !== -1 && index + 1 < args.length) {
      const value = args[index + 1];
      // Make sure it's not another flag
      if (!value.startsWith('-')) {
        return value;
      }
    }
  }

  // --flag=value form
  const prefix = `${longFlag}=`;
  const inline = args.find((arg) => arg.startsWith(prefix));
  return inline ? inline.slice(prefix.length) : undefined;
}

/**
 * Check if a boolean flag is present in the arguments
 */
function hasFlag(args: string[], longFlag: string, shortFlag?: string): boolean {
  return args.includes(longFlag) || (shortFlag ? args.includes(shortFlag) : false);
}

/**
 * Parse port number from string
 * @returns Valid port number, or the default when parsing fails
 */
function parsePort(portStr: string | undefined, defaultPort: number): number {
  if (!portStr) {
    return defaultPort;
  }

  const port = parseInt(portStr, 10);
  if (isNaN(port) || port < MIN_PORT || port > MAX_PORT) {
    return defaultPort;
  }

  return port;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Parse command line arguments and environment variables
 * @param args - Command line arguments (without node and script path)
 * @returns Parsed CLI options
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CLIOptions {
  // CLI takes precedence over environment variables
  const remote = hasFlag(args, '--remote', '-r') || env.REMINDCTL_MCP_REMOTE === 'true';

  const cliPort = getArgValue(args, '--port', '-p');
  const port = parsePort(cliPort ?? env.REMINDCTL_MCP_PORT, DEFAULT_PORT);

  const host =
    nonEmpty(getArgValue(args, '--host', '-H')) ?? nonEmpty(env.REMINDCTL_MCP_HOST) ?? DEFAULT_HOST;

  const workspace =
    nonEmpty(getArgValue(args, '--workspace', '-w')) ??
    nonEmpty(env.REMINDCTL_MCP_WORKSPACE) ??
    DEFAULT_WORKSPACE;

  const queueDir =
    nonEmpty(getArgValue(args, '--queue-dir')) ?? nonEmpty(env.REMINDCTL_MCP_QUEUE_DIR);

  return {
    remote,
    port,
    host,
    workspace,
    queueDir,
    noQueue: hasFlag(args, '--no-queue'),
    help: hasFlag(args, '--help', '-h'),
    version: hasFlag(args, '--version', '-v'),
  };
}

/**
 * Generate help message
 */
export function getHelpMessage(): string {
  return `
remindctl-mcp - MCP server for reminders managed through remindctl

Usage:
  remindctl-mcp [options]

Options:
  --remote, -r              Run in HTTP server mode (Remote MCP)
  --port, -p <number>       HTTP server port (default: ${DEFAULT_PORT})
  --host, -H <address>      HTTP server host (default: ${DEFAULT_HOST})
  --workspace, -w <name>    Workspace for the pending action queue (default: ${DEFAULT_WORKSPACE})
  --queue-dir <path>        Directory for queue files (default: ~/.remindctl-mcp/queue)
  --no-queue                Apply writes immediately, never queue them
  --help, -h                Show this help message
  --version, -v             Show version

Environment Variables:
  REMINDCTL_MCP_REMOTE          Set to 'true' to run in HTTP server mode
  REMINDCTL_MCP_PORT            HTTP server port
  REMINDCTL_MCP_HOST            HTTP server host
  REMINDCTL_MCP_WORKSPACE       Workspace name
  REMINDCTL_MCP_QUEUE_DIR       Queue directory
  REMINDCTL_BIN                 remindctl binary (default: remindctl)
  REMINDCTL_READ_TIMEOUT_SECS   Timeout for reads (default: 10)
  REMINDCTL_WRITE_TIMEOUT_SECS  Timeout for writes (default: 20)
  AUTH_REQUIRED                 Require a bearer API key in HTTP mode (default: true)
  API_KEY                       Bearer API key for HTTP mode
  DELETE_ALLOW_MISSING          Default for reminder_delete allowMissing (default: true)
  HEALTH_CACHE_MS               How long a health check is reused (default: 5000)
  AUTO_ROUTE_LISTS              Pick a list for new reminders by title (default: true)
  LOG_LEVEL                     trace, debug, info, warn, error, fatal or silent

Examples:
  remindctl-mcp                               # Run in Stdio mode (Local MCP)
  remindctl-mcp --remote                      # Run in HTTP mode (Remote MCP)
  remindctl-mcp --remote --port 9000          # Run in HTTP mode on port 9000
  remindctl-mcp --workspace laptop            # Keep a separate pending action queue
`.trim();
}

/**
 * Get version string
 */
export function getVersion(): string {
  return `${SERVER_NAME} v${VERSION}`;
}
