#!/usr/bin/env node
/**
 * remindctl-mcp - MCP server for reminders managed through remindctl
 *
 * Exposes reminder and list operations to MCP clients over stdio or
 * Streamable HTTP. Writes are deferred to a per-workspace queue while
 * remindctl is unavailable.
 */

import { startServer } from './cli/main-entry.js';
import { parseArgs } from './cli/parser.js';
import { setupSignalHandlers } from './cli/signal-handler.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from './utils/mcp-response.js';
import { SERVER_NAME, VERSION } from './version.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const result = await startServer(options);

  // Handle help and version
  if (result.mode === 'help' || result.mode === 'version') {
    console.log(result.message);
    process.exit(0);
  }

  if (!result.success) {
    logger.fatal({ mode: result.mode, err: result.error }, 'Failed to start server');
    console.error(`Failed to start ${SERVER_NAME}: ${result.error}`);
    process.exit(1);
  }

  const { stop } = result;
  if (stop) {
    setupSignalHandlers([{ name: result.mode, stop }]);
  }

  if (result.mode === 'http') {
    console.error(
      `${SERVER_NAME} v${VERSION} started in HTTP mode on ${result.host}:${result.port}`
    );
    return;
  }
  console.error(`${SERVER_NAME} v${VERSION} started in Stdio mode`);
}

main().catch((error: unknown) => {
  console.error(`Failed to start ${SERVER_NAME}:`, getErrorMessage(error));
  process.exit(1);
});
