import * as path from 'node:path';

import type { SandboxIdentity } from '../../config/types.js';
import { ErrorCode, McpError } from '../errors.js';
import { normalizePath } from '../path-utils.js';

const SEGMENT_SEPARATORS = /[/\\]/;

function assertSingleSegment(label: string, value: string): void {
  if (
    value.length === 0 ||
    value === '.' ||
    value === '..' ||
    value.includes('\0') ||
    SEGMENT_SEPARATORS.test(value)
  ) {
    throw new McpError(
      ErrorCode.E_INVALID_INPUT,
      `Invalid ${label}: must be a single non-empty path segment`,
      undefined,
      { [label]: value }
    );
  }
}

export function assertValidIdentity(sandbox: SandboxIdentity): void {
  assertSingleSegment('workspace_id', sandbox.workspaceId);
  assertSingleSegment('agent_id', sandbox.agentId);
  assertSingleSegment('session_id', sandbox.sessionId);
}

/**
 * Root directory of a session sandbox. Pure path derivation: nothing is
 * checked or created on disk.
 */
export function getSessionRoot(
  workspacesDir: string,
  sandbox: SandboxIdentity
): string {
  return path.join(
    normalizePath(workspacesDir),
    sandbox.workspaceId,
    sandbox.agentId,
    sandbox.sessionId
  );
}

export function normalizeForComparison(p: string): string {
  return process.platform === 'win32' ? p.toLowerCase() : p;
}

export function isPathWithinRoot(
  candidatePath: string,
  root: string
): boolean {
  const candidate = normalizeForComparison(candidatePath);
  const allowed = normalizeForComparison(root);
  if (allowed === normalizeForComparison(path.parse(root).root)) {
    return candidate.startsWith(allowed);
  }
  return candidate === allowed || candidate.startsWith(allowed + path.sep);
}
