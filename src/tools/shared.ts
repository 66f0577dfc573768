import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  ContentBlock,
  LoggingLevel,
} from '@modelcontextprotocol/sdk/types.js';

import { z } from 'zod';

import {
  createDetailedError,
  ErrorCode,
  formatDetailedError,
  getSuggestion,
  McpError,
} from '../lib/errors.js';
import { withToolDiagnostics } from '../lib/observability.js';
import type { SandboxPathResolver } from '../lib/sandbox/resolver.js';

export const READ_ONLY_TOOL_ANNOTATIONS = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: false,
} as const;

export interface ToolRegistrationOptions {
  resolver: SandboxPathResolver;
  minLogLevel?: LoggingLevel;
  /** MCP server used for log notifications; omitted in tests. */
  logServer?: McpServer;
}

export interface ToolExtra {
  signal?: AbortSignal;
}

export function buildToolResponse<T>(
  text: string,
  structuredContent: T
): {
  content: ContentBlock[];
  structuredContent: T;
} {
  return {
    content: [{ type: 'text', text }],
    structuredContent,
  };
}

export type ToolResponse<T> = ReturnType<typeof buildToolResponse<T>> &
  Record<string, unknown>;

interface ToolErrorResponse extends Record<string, unknown> {
  content: ContentBlock[];
  structuredContent: { error: string };
  isError: true;
}

export type ToolResult<T> = ToolResponse<T> | ToolErrorResponse;

export function buildToolErrorText(message: string): ToolErrorResponse {
  return {
    content: [{ type: 'text', text: message }],
    structuredContent: { error: message },
    isError: true,
  };
}

export function buildToolErrorResponse(
  error: unknown,
  defaultCode: ErrorCode,
  path?: string
): ToolErrorResponse {
  const detailed = createDetailedError(error, path);
  if (detailed.code === ErrorCode.E_UNKNOWN) {
    detailed.code = defaultCode;
    detailed.suggestion = getSuggestion(defaultCode);
  }

  return {
    ...buildToolErrorText(detailed.message),
    content: [{ type: 'text', text: formatDetailedError(detailed) }],
  };
}

function parseToolArgs<Schema extends z.ZodType>(
  schema: Schema,
  args: unknown
): z.infer<Schema> {
  const candidate = args === undefined ? {} : args;
  const parsed = schema.safeParse(candidate);
  if (parsed.success) {
    return parsed.data;
  }

  throw new McpError(
    ErrorCode.E_INVALID_INPUT,
    `Invalid tool arguments: ${z.prettifyError(parsed.error)}`,
    undefined,
    { errors: z.treeifyError(parsed.error) }
  );
}

export function withValidatedArgs<Args, Result>(
  schema: z.ZodType<Args>,
  handler: (args: Args, extra: ToolExtra) => Promise<ToolResult<Result>>
): (args: unknown, extra?: ToolExtra) => Promise<ToolResult<Result>> {
  return async (args, extra = {}) => {
    const normalizedArgs = parseToolArgs(schema, args);
    return handler(normalizedArgs, extra);
  };
}

async function withToolErrorHandling<T>(
  run: () => Promise<ToolResult<T>>,
  onError: (error: unknown) => ToolResult<T>
): Promise<ToolResult<T>> {
  try {
    return await run();
  } catch (error) {
    return onError(error);
  }
}

export async function executeToolWithDiagnostics<T>(options: {
  toolName: string;
  run: () => Promise<ToolResult<T>>;
  onError: (error: unknown) => ToolResult<T>;
}): Promise<ToolResult<T>> {
  return withToolDiagnostics(options.toolName, () =>
    withToolErrorHandling(options.run, options.onError)
  );
}
