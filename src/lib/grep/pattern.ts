import safeRegex from 'safe-regex2';

import { REDOS_GUARD_ENABLED } from '../constants.js';
import { ErrorCode, formatUnknownErrorMessage, McpError } from '../errors.js';

export interface CompilePatternOptions {
  redosGuard?: boolean;
}

const ENGINE_MESSAGE_PREFIX = /^Invalid regular expression: \/.*\/[a-z]*: /s;

function describeSyntaxError(error: unknown): string {
  return formatUnknownErrorMessage(error).replace(ENGINE_MESSAGE_PREFIX, '');
}

// Star height above one or too many repetitions count as unsafe.
function ensureSafePattern(pattern: string, regex: RegExp): void {
  if (safeRegex(regex)) return;

  throw new McpError(
    ErrorCode.E_INVALID_PATTERN,
    'Invalid regex pattern: potentially catastrophic backtracking',
    undefined,
    { pattern, reason: 'ReDoS risk detected' }
  );
}

/**
 * Compiles a search pattern. Throws `E_INVALID_PATTERN` without touching
 * the filesystem, so callers must compile before resolving any path.
 */
export function compilePattern(
  pattern: string,
  options: CompilePatternOptions = {}
): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (error: unknown) {
    throw McpError.fromError(
      ErrorCode.E_INVALID_PATTERN,
      `Invalid regex pattern: ${describeSyntaxError(error)}`,
      error,
      undefined,
      { pattern }
    );
  }

  if (options.redosGuard ?? REDOS_GUARD_ENABLED) {
    ensureSafePattern(pattern, regex);
  }
  return regex;
}
