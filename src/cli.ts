import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { getConfiguredWorkspacesDir } from './lib/constants.js';
import { normalizePath } from './lib/path-utils.js';
import { pkgInfo } from './pkg-info.js';
import { isLoggingLevel, LOG_LEVEL_ORDER } from './server/logging.js';

const { version: SERVER_VERSION } = pkgInfo;
const DEFAULT_LOG_LEVEL: LoggingLevel = 'info';

export class CliExitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = 'CliExitError';
    this.exitCode = exitCode;
  }
}

export interface ParsedArgs {
  workspacesDir: string;
  logLevel: LoggingLevel;
}

function parseWorkspacesDir(value: string): string {
  if (value.trim().length === 0) {
    throw new InvalidArgumentError('Directory cannot be empty.');
  }
  if (value.includes('\0')) {
    throw new InvalidArgumentError('Path contains null bytes.');
  }
  return normalizePath(value);
}

function parseLogLevel(value: string): LoggingLevel {
  const normalized = value.trim().toLowerCase();
  if (!isLoggingLevel(normalized)) {
    throw new InvalidArgumentError(
      `Expected one of: ${Object.keys(LOG_LEVEL_ORDER).join(', ')}.`
    );
  }
  return normalized;
}

function createCliProgram(output: string[]): Command {
  const cli = new Command();
  cli
    .name('sandbox-grep-mcp')
    .description(
      'MCP server exposing grep_search, a bounded regex search over per-session sandboxes.'
    )
    .option(
      '--workspaces-dir <dir>',
      'Root directory holding <workspace>/<agent>/<session> sandboxes (env: SANDBOX_GREP_WORKSPACES_DIR)',
      parseWorkspacesDir
    )
    .option(
      '--log-level <level>',
      `Minimum level for MCP log notifications (default: ${DEFAULT_LOG_LEVEL})`,
      parseLogLevel
    )
    .helpOption('-h, --help', 'Display command help')
    .version(SERVER_VERSION, '-v, --version', 'Display server version')
    .addHelpText(
      'after',
      `
Examples:
  $ sandbox-grep-mcp
  $ sandbox-grep-mcp --workspaces-dir /srv/agents/workspaces
  $ sandbox-grep-mcp --log-level warning
`
    );

  cli.allowUnknownOption(false);
  cli.allowExcessArguments(false);
  cli.showHelpAfterError('(run with --help for usage)');
  cli.exitOverride();
  cli.configureOutput({
    writeOut(text: string): void {
      output.push(text);
    },
    writeErr(text: string): void {
      output.push(text);
    },
    outputError(text: string, write: (str: string) => void): void {
      write(text);
    },
  });

  return cli;
}

function formatCliOutput(output: readonly string[], fallback: string): string {
  const joined = output.join('').trimEnd();
  if (joined.length > 0) return joined;
  return fallback.trimEnd();
}

export function parseArgs(argv: readonly string[] = process.argv): ParsedArgs {
  const output: string[] = [];
  const cli = createCliProgram(output);
  try {
    cli.parse([...argv], { from: 'node' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      throw new CliExitError(
        formatCliOutput(output, error.message),
        error.exitCode
      );
    }
    throw error;
  }

  const options = cli.opts<{ workspacesDir?: string; logLevel?: LoggingLevel }>();
  return {
    workspacesDir: options.workspacesDir ?? getConfiguredWorkspacesDir(),
    logLevel: options.logLevel ?? DEFAULT_LOG_LEVEL,
  };
}
