import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  LoggingLevel,
  LoggingMessageNotificationParams,
} from '@modelcontextprotocol/sdk/types.js';

import { formatUnknownErrorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/type-guards.js';

export const MCP_LOGGER_NAME = 'sandbox-grep';

export const LOG_LEVEL_ORDER: Readonly<Record<LoggingLevel, number>> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

export function isLoggingLevel(value: string): value is LoggingLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

function canSendMcpLogs(server: McpServer): boolean {
  const capabilities = server.server.getClientCapabilities();
  if (!isRecord(capabilities)) return false;
  if (!('logging' in capabilities)) return false;
  return capabilities['logging'] !== null;
}

/**
 * Sends a log notification to the connected client, or writes to stderr
 * when no initialized client declared logging support. Messages below `minLevel` are
 * dropped.
 */
export function logToMcp(
  server: McpServer | undefined,
  level: LoggingLevel,
  data: string,
  minLevel: LoggingLevel = 'debug'
): void {
  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
    return;
  }
  if (!server || !canSendMcpLogs(server)) {
    console.error(`[${level.toUpperCase()}] ${data}`);
    return;
  }

  const params: LoggingMessageNotificationParams = {
    level,
    logger: MCP_LOGGER_NAME,
    data,
  };

  void server.sendLoggingMessage(params).catch((error: unknown) => {
    console.error(
      `Failed to send MCP log: ${level} | ${data}`,
      formatUnknownErrorMessage(error)
    );
  });
}
