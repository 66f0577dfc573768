import * as fsp from 'node:fs/promises';
import { performance } from 'node:perf_hooks';

import type { GrepSearchResult, SearchRequest } from '../../config/types.js';
import {
  getConfiguredWorkspacesDir,
  HARD_MAX_MATCHES,
  MAX_MATCHES,
} from '../constants.js';
import { ErrorCode, McpError } from '../errors.js';
import { publishScanSummary } from '../observability.js';
import { toMcpError } from '../sandbox/path-errors.js';
import {
  createSandboxResolver,
  type SandboxPathResolver,
} from '../sandbox/resolver.js';
import { scanFile } from './line-scanner.js';
import { compilePattern } from './pattern.js';
import { buildSuccessResult, toGrepFailure } from './result.js';
import { ScanContext, type TraversalSignal } from './scan-context.js';
import {
  type TraversalOptions,
  walkDirectory,
  walkSingleFile,
} from './traversal.js';

export interface GrepSearchOptions {
  resolver?: SandboxPathResolver;
  /** Lowers the cap for this call; values above 1000 are clamped. */
  maxMatches?: number;
  redosGuard?: boolean;
}

function resolveMaxMatches(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) {
    return MAX_MATCHES;
  }
  return Math.min(HARD_MAX_MATCHES, Math.max(1, Math.floor(requested)));
}

async function traverseTarget(
  target: string,
  request: SearchRequest,
  options: TraversalOptions
): Promise<TraversalSignal> {
  try {
    const stats = await fsp.stat(target);
    if (stats.isFile()) return await walkSingleFile(target, options);
    if (stats.isDirectory()) return await walkDirectory(target, options);
  } catch (error: unknown) {
    throw toMcpError(request.path, error);
  }

  throw new McpError(
    ErrorCode.E_NOT_FILE,
    `Not a regular file or directory: ${request.path}`,
    request.path
  );
}

/**
 * Searches the sandboxed target of `request` for lines matching its
 * pattern. Never rejects: every failure is returned as `{ error }`.
 */
export async function grepSearch(
  request: SearchRequest,
  options: GrepSearchOptions = {}
): Promise<GrepSearchResult> {
  let regex: RegExp;
  try {
    regex = compilePattern(request.pattern, {
      redosGuard: options.redosGuard,
    });
  } catch (error: unknown) {
    return toGrepFailure(error, request.path);
  }

  const resolver =
    options.resolver ??
    createSandboxResolver({ workspacesDir: getConfiguredWorkspacesDir() });
  const startedAt = performance.now();

  try {
    const target = await resolver.resolve(request.path, request.sandbox);
    const context = new ScanContext(
      resolveMaxMatches(options.maxMatches),
      resolver.sessionRoot(request.sandbox)
    );

    await traverseTarget(target, request, {
      recursive: request.recursive,
      context,
      visitFile: async (filePath) => {
        const outcome = await scanFile(filePath, regex, context);
        return outcome.kind === 'scanned' && outcome.halted
          ? 'halt'
          : 'continue';
      },
    });

    publishScanSummary({
      ...context.summary,
      recursive: request.recursive,
      totalMatches: context.matches.length,
      durationMs: performance.now() - startedAt,
    });
    return buildSuccessResult(request, context);
  } catch (error: unknown) {
    return toGrepFailure(error, request.path);
  }
}

/** Positional form of {@link grepSearch}. */
export function search(
  path: string,
  pattern: string,
  workspaceId: string,
  agentId: string,
  sessionId: string,
  recursive = false,
  options: GrepSearchOptions = {}
): Promise<GrepSearchResult> {
  return grepSearch(
    { path, pattern, sandbox: { workspaceId, agentId, sessionId }, recursive },
    options
  );
}
