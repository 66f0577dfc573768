import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { SandboxIdentity } from '../../config/types.js';
import { ErrorCode, isNodeError, McpError } from '../errors.js';
import { toMcpError, toSandboxEscapeError } from './path-errors.js';
import {
  assertValidIdentity,
  getSessionRoot,
  isPathWithinRoot,
} from './session-root.js';

/**
 * Maps a logical, session-relative path onto the filesystem while keeping
 * it inside the session sandbox.
 */
export interface SandboxPathResolver {
  /**
   * Absolute path of `requestedPath` inside the sandbox. Rejects with an
   * {@link McpError}: `E_ACCESS_DENIED` when the path cannot be confined,
   * `E_NOT_FOUND` / `E_PERMISSION_DENIED` for filesystem failures.
   */
  resolve(requestedPath: string, sandbox: SandboxIdentity): Promise<string>;
  /** Session root used as the base of display paths. Never touches disk. */
  sessionRoot(sandbox: SandboxIdentity): string;
}

export interface SandboxResolverOptions {
  workspacesDir: string;
}

const LEADING_SEPARATORS = /^[/\\]+/;

function assertRequestedPath(requestedPath: string): void {
  if (requestedPath.includes('\0')) {
    throw new McpError(
      ErrorCode.E_INVALID_INPUT,
      'Path contains null bytes',
      requestedPath
    );
  }
}

async function ensureSessionRoot(root: string): Promise<void> {
  try {
    await fs.mkdir(root, { recursive: true });
  } catch (error) {
    throw toMcpError(root, error);
  }
}

async function realpathOrUndefined(
  target: string,
  requestedPath: string
): Promise<string | undefined> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return undefined;
    throw toMcpError(requestedPath, error);
  }
}

async function ensureRealPathWithinRoot(
  candidate: string,
  root: string,
  requestedPath: string
): Promise<void> {
  const realCandidate = await realpathOrUndefined(candidate, requestedPath);
  // Missing targets are reported by the caller once it stats the path.
  if (realCandidate === undefined) return;

  const realRoot = await realpathOrUndefined(root, requestedPath);
  if (realRoot === undefined || !isPathWithinRoot(realCandidate, realRoot)) {
    throw toSandboxEscapeError(requestedPath, { resolvedPath: realCandidate });
  }
}

export function createSandboxResolver(
  options: SandboxResolverOptions
): SandboxPathResolver {
  const { workspacesDir } = options;

  return {
    sessionRoot: (sandbox) => getSessionRoot(workspacesDir, sandbox),

    async resolve(requestedPath, sandbox) {
      assertValidIdentity(sandbox);
      assertRequestedPath(requestedPath);

      const root = getSessionRoot(workspacesDir, sandbox);
      await ensureSessionRoot(root);

      const relative = requestedPath.replace(LEADING_SEPARATORS, '');
      const candidate = path.resolve(root, relative);
      if (!isPathWithinRoot(candidate, root)) {
        throw toSandboxEscapeError(requestedPath, { normalizedPath: candidate });
      }

      await ensureRealPathWithinRoot(candidate, root, requestedPath);
      return candidate;
    },
  };
}
