#!/usr/bin/env node
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { CliExitError, parseArgs } from './cli.js';
import { formatUnknownErrorMessage } from './lib/errors.js';
import { createServer, startServer } from './server.js';

const SHUTDOWN_TIMEOUT_MS = 5000;
let activeServer: McpServer | undefined;
let shutdownStarted = false;

async function shutdown(signal: string): Promise<void> {
  if (shutdownStarted) return;
  shutdownStarted = true;

  const timer = setTimeout(() => {
    process.exit(0);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    if (activeServer) {
      await activeServer.close();
    }
  } catch (error: unknown) {
    console.error(
      `Shutdown error (${signal}):`,
      formatUnknownErrorMessage(error)
    );
  } finally {
    clearTimeout(timer);
    process.exit(0);
  }
}

async function main(): Promise<void> {
  let args: ReturnType<typeof parseArgs>;
  try {
    args = parseArgs();
  } catch (error: unknown) {
    if (error instanceof CliExitError) {
      const write =
        error.exitCode === 0
          ? (text: string) => process.stdout.write(`${text}\n`)
          : (text: string) => process.stderr.write(`${text}\n`);
      write(error.message);
      process.exit(error.exitCode);
    }
    throw error;
  }

  const running = createServer({
    workspacesDir: args.workspacesDir,
    minLogLevel: args.logLevel,
  });
  activeServer = running.server;
  await startServer(running);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

main().catch((error: unknown) => {
  console.error('Fatal error:', formatUnknownErrorMessage(error));
  process.exit(1);
});
