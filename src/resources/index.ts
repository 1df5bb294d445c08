/**
 * MCP Resources: read-only views over remindctl state.
 *
 * Static resources for status, lists and the public server configuration;
 * templates for reminders by filter and by list. Failures surface as MCP
 * errors rather than error payloads.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PublicConfig } from '../config/loader.js';
import type { MutationOrchestrator } from '../core/mutation-orchestrator.js';
import { invalidInput, type OperationResult } from '../types/errors.js';
import { mcpLogger } from '../utils/logger.js';
import { toMcpError } from '../utils/mcp-response.js';

export interface ResourceDeps {
  orchestrator: MutationOrchestrator;
  publicConfig: PublicConfig;
}

const MIME_TYPE = 'application/json';

function jsonContents(uri: string, data: unknown) {
  return {
    contents: [{ uri, mimeType: MIME_TYPE, text: JSON.stringify(data, null, 2) }],
  };
}

function unwrap<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw toMcpError(result.error);
  }
  return result.data;
}

/**
 * Single template variable, percent-decoded
 *
 * The SDK splits comma-separated values into arrays; join them back so a
 * list name containing a comma stays one value.
 */
export function templateValue(value: string | string[] | undefined, name: string): string {
  const raw = Array.isArray(value) ? value.join(',') : value;
  if (raw === undefined || raw === '') {
    throw toMcpError(invalidInput(`${name} is required`, name));
  }
  try {
    return decodeURIComponent(raw);
  } catch {
    throw toMcpError(invalidInput(`${name} is not valid percent-encoding`, name));
  }
}

export function registerResources(server: McpServer, deps: ResourceDeps): void {
  const { orchestrator } = deps;

  // ── Static: remindctl status ───────────────────────────────────────────
  server.resource(
    'status',
    'remindctl://status',
    { description: 'remindctl availability, authorization and queue state', mimeType: MIME_TYPE },
    async (uri) => jsonContents(uri.href, unwrap(await orchestrator.serverHealth()))
  );

  // ── Static: lists ──────────────────────────────────────────────────────
  server.resource(
    'lists',
    'remindctl://lists',
    { description: 'All reminder lists with their ids', mimeType: MIME_TYPE },
    async (uri) => jsonContents(uri.href, unwrap(await orchestrator.listsList()))
  );

  // ── Static: server configuration ───────────────────────────────────────
  server.resource(
    'server-config',
    'remindctl://server/config',
    { description: 'Server configuration without secrets', mimeType: MIME_TYPE },
    async (uri) => jsonContents(uri.href, deps.publicConfig)
  );

  // ── Template: reminders by filter ──────────────────────────────────────
  server.resource(
    'reminders-by-filter',
    new ResourceTemplate('remindctl://reminders/{filter}', { list: undefined }),
    {
      description: 'Reminders matching a filter (pending, today, week, overdue, all, ...)',
      mimeType: MIME_TYPE,
    },
    async (uri, { filter }) => {
      const value = templateValue(filter, 'filter');
      mcpLogger.debug({ uri: uri.href }, 'Reading reminders resource');
      return jsonContents(uri.href, unwrap(await orchestrator.remindersList({ filter: value })));
    }
  );

  // ── Template: reminders of a list, by reference ────────────────────────
  server.resource(
    'list-reminders',
    new ResourceTemplate('remindctl://lists/{listRef}/reminders', { list: undefined }),
    {
      description: 'Pending reminders of a list given by id, id prefix or name',
      mimeType: MIME_TYPE,
    },
    async (uri, { listRef }) => {
      const reference = templateValue(listRef, 'listRef');
      return jsonContents(
        uri.href,
        unwrap(await orchestrator.remindersList({ listId: reference }))
      );
    }
  );

  // ── Template: reminders of a list, by exact name ───────────────────────
  server.resource(
    'list-reminders-by-name',
    new ResourceTemplate('remindctl://lists/by-name/{listName}/reminders', { list: undefined }),
    { description: 'Pending reminders of a list given by exact name', mimeType: MIME_TYPE },
    async (uri, { listName }) => {
      const name = templateValue(listName, 'listName');
      return jsonContents(uri.href, unwrap(await orchestrator.remindersList({ listName: name })));
    }
  );
}
