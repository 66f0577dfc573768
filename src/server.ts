import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

import { MAX_MATCHES } from './lib/constants.js';
import { createSandboxResolver } from './lib/sandbox/resolver.js';
import { pkgInfo } from './pkg-info.js';
import { logToMcp } from './server/logging.js';
import { registerAllTools } from './tools/index.js';

const { name: SERVER_NAME, version: SERVER_VERSION } = pkgInfo;

const SERVER_INSTRUCTIONS =
  'sandbox-grep: regex search over a per-session sandbox at ' +
  '<workspaces>/<workspace_id>/<agent_id>/<session_id>. ' +
  'Call grep_search with a path relative to the session root ("." for the root). ' +
  'Patterns use JavaScript RegExp syntax without flags. ' +
  `At most ${MAX_MATCHES} matches are returned per call.`;

export interface ServerOptions {
  workspacesDir: string;
  minLogLevel?: LoggingLevel;
}

export interface RunningServer {
  server: McpServer;
  options: ServerOptions;
}

export function createServer(options: ServerOptions): RunningServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        logging: {},
      },
    }
  );

  registerAllTools(server, {
    resolver: createSandboxResolver({ workspacesDir: options.workspacesDir }),
    logServer: server,
    ...(options.minLogLevel ? { minLogLevel: options.minLogLevel } : {}),
  });

  return { server, options };
}

export async function startServer(running: RunningServer): Promise<void> {
  const { server, options } = running;
  const transport = new StdioServerTransport();

  await server.connect(transport);

  logToMcp(
    server,
    'info',
    `${SERVER_NAME} ${SERVER_VERSION} serving sandboxes under ${options.workspacesDir}`,
    options.minLogLevel
  );
}
