import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { CliExitError, parseArgs } from '../../cli.js';
import { getConfiguredWorkspacesDir } from '../../lib/constants.js';
import { normalizePath } from '../../lib/path-utils.js';
import { pkgInfo } from '../../pkg-info.js';

function argv(...args: string[]): string[] {
  return ['node', 'sandbox-grep-mcp', ...args];
}

function assertCliExit(args: string[], exitCode: number): CliExitError {
  let captured: unknown;
  try {
    parseArgs(argv(...args));
  } catch (error) {
    captured = error;
  }
  assert.ok(captured instanceof CliExitError);
  assert.equal(captured.exitCode, exitCode);
  return captured;
}

void describe('parseArgs', () => {
  void it('uses configured defaults without arguments', () => {
    assert.deepEqual(parseArgs(argv()), {
      workspacesDir: getConfiguredWorkspacesDir(),
      logLevel: 'info',
    });
  });

  void it('normalizes --workspaces-dir', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sandbox-args-'));
    try {
      const result = parseArgs(argv('--workspaces-dir', `${tempDir}/`));
      assert.equal(result.workspacesDir, normalizePath(tempDir));
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  void it('accepts log levels case-insensitively', () => {
    assert.equal(parseArgs(argv('--log-level', 'WARNING')).logLevel, 'warning');
  });

  void it('rejects unknown log levels', () => {
    const error = assertCliExit(['--log-level', 'loud'], 1);
    assert.match(error.message, /Expected one of: debug, info, notice/);
  });

  void it('rejects an empty workspaces dir', () => {
    const error = assertCliExit(['--workspaces-dir', ' '], 1);
    assert.match(error.message, /Directory cannot be empty/);
  });

  void it('rejects unknown options and extra arguments', () => {
    assertCliExit(['--allow-everything'], 1);
    assertCliExit(['/some/dir'], 1);
  });

  void it('exits cleanly for --version', () => {
    const error = assertCliExit(['--version'], 0);
    assert.equal(error.message, pkgInfo.version);
  });

  void it('exits cleanly for --help', () => {
    const error = assertCliExit(['--help'], 0);
    assert.match(error.message, /--workspaces-dir <dir>/);
  });
});
