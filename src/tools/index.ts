import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerGrepSearchTool } from './grep-search.js';
import type { ToolRegistrationOptions } from './shared.js';

export function registerAllTools(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  registerGrepSearchTool(server, options);
}
