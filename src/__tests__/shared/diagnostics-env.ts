import * as diagnosticsChannel from 'node:diagnostics_channel';
import assert from 'node:assert/strict';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { SandboxPathResolver } from '../../lib/sandbox/resolver.js';
import { registerAllTools } from '../../tools/index.js';

export interface DiagnosticsEnvSnapshot {
  diagnostics?: string;
  logToolErrors?: string;
}

export const restoreEnv = (key: string, previous: string | undefined): void => {
  if (previous === undefined) {
    Reflect.deleteProperty(process.env, key);
    return;
  }
  process.env[key] = previous;
};

export function enableDiagnosticsEnv(): DiagnosticsEnvSnapshot {
  const previousEnabled = process.env['SANDBOX_GREP_DIAGNOSTICS'];
  const previousLogErrors = process.env['SANDBOX_GREP_TOOL_LOG_ERRORS'];
  process.env['SANDBOX_GREP_DIAGNOSTICS'] = '1';
  process.env['SANDBOX_GREP_TOOL_LOG_ERRORS'] = '0';
  return {
    diagnostics: previousEnabled,
    logToolErrors: previousLogErrors,
  };
}

export function restoreDiagnosticsEnv(snapshot: DiagnosticsEnvSnapshot): void {
  restoreEnv('SANDBOX_GREP_DIAGNOSTICS', snapshot.diagnostics);
  restoreEnv('SANDBOX_GREP_TOOL_LOG_ERRORS', snapshot.logToolErrors);
}

export interface DiagnosticsSubscription {
  published: unknown[];
  unsubscribe: () => void;
}

export function subscribeDiagnostics(channel: string): DiagnosticsSubscription {
  const published: unknown[] = [];
  const onMessage = (message: unknown): void => {
    published.push(message);
  };

  diagnosticsChannel.subscribe(channel, onMessage);

  return {
    published,
    unsubscribe: () => {
      diagnosticsChannel.unsubscribe(channel, onMessage);
    },
  };
}

export type ToolHandler = (args?: unknown, extra?: unknown) => Promise<unknown>;

export function createNamedToolCapture(): {
  fakeServer: McpServer;
  getHandler: (name: string) => ToolHandler;
} {
  const handlers = new Map<string, ToolHandler>();

  const fakeServer = {
    registerTool: (name: string, _definition: unknown, handler: unknown) => {
      handlers.set(name, handler as ToolHandler);
    },
  } as const;

  return {
    fakeServer: fakeServer as unknown as McpServer,
    getHandler: (name: string) => {
      const handler = handlers.get(name);
      assert.ok(handler, `Expected tool handler to be registered: ${name}`);
      return handler;
    },
  };
}

export function registerToolsForTest(
  resolver: SandboxPathResolver
): (name: string) => ToolHandler {
  const { fakeServer, getHandler } = createNamedToolCapture();
  registerAllTools(fakeServer, { resolver });
  return getHandler;
}
