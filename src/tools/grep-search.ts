import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { z } from 'zod';

import { ErrorCode } from '../lib/errors.js';
import { grepSearch } from '../lib/grep.js';
import {
  GrepSearchInputSchema,
  GrepSearchOutputSchema,
} from '../schemas/index.js';
import { logToMcp } from '../server/logging.js';
import {
  buildToolErrorResponse,
  buildToolErrorText,
  buildToolResponse,
  executeToolWithDiagnostics,
  READ_ONLY_TOOL_ANNOTATIONS,
  type ToolRegistrationOptions,
  type ToolResult,
  withValidatedArgs,
} from './shared.js';
import { buildTextResult } from './shared/search-formatting.js';

export const GREP_SEARCH_TOOL_NAME = 'grep_search';

type GrepSearchArgs = z.infer<typeof GrepSearchInputSchema>;
type GrepSearchStructuredResult = z.infer<typeof GrepSearchOutputSchema>;

const GREP_SEARCH_TOOL = {
  title: 'Grep Search',
  description:
    'Search for a regex pattern in a file or directory within the session sandbox. ' +
    'Returns matching lines as { file, line_number, line_content } records. ' +
    'Set recursive=true to search subdirectories. ' +
    'Binary files (by extension) and dependency, VCS, build and cache directories are skipped. ' +
    'Results stop at 1000 matches; a warning is included when that happens.',
  inputSchema: GrepSearchInputSchema,
  outputSchema: GrepSearchOutputSchema,
  annotations: READ_ONLY_TOOL_ANNOTATIONS,
} as const;

async function handleGrepSearch(
  args: GrepSearchArgs,
  options: ToolRegistrationOptions
): Promise<ToolResult<GrepSearchStructuredResult>> {
  const { logServer, minLogLevel } = options;
  const result = await grepSearch(
    {
      path: args.path,
      pattern: args.pattern,
      sandbox: {
        workspaceId: args.workspace_id,
        agentId: args.agent_id,
        sessionId: args.session_id,
      },
      recursive: args.recursive,
    },
    { resolver: options.resolver }
  );

  if ('error' in result) {
    logToMcp(
      logServer,
      'warning',
      `${GREP_SEARCH_TOOL_NAME} failed: ${result.error}`,
      minLogLevel
    );
    return buildToolErrorText(result.error);
  }

  if (result.warning !== undefined) {
    logToMcp(
      logServer,
      'notice',
      `${GREP_SEARCH_TOOL_NAME} /${result.pattern}/ in ${result.path}: ${result.warning}`,
      minLogLevel
    );
  }

  const structured: GrepSearchStructuredResult = result;
  return buildToolResponse(buildTextResult(result), structured);
}

export function createGrepSearchHandler(
  options: ToolRegistrationOptions
): (args: unknown) => Promise<ToolResult<GrepSearchStructuredResult>> {
  const validated = withValidatedArgs(GrepSearchInputSchema, (args) =>
    handleGrepSearch(args, options)
  );

  return (args) =>
    executeToolWithDiagnostics({
      toolName: GREP_SEARCH_TOOL_NAME,
      run: () => validated(args),
      onError: (error) =>
        buildToolErrorResponse(error, ErrorCode.E_INVALID_INPUT),
    });
}

export function registerGrepSearchTool(
  server: McpServer,
  options: ToolRegistrationOptions
): void {
  server.registerTool(
    GREP_SEARCH_TOOL_NAME,
    GREP_SEARCH_TOOL,
    createGrepSearchHandler(options)
  );
}
