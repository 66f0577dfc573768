import type {
  GrepSearchFailure,
  GrepSearchSuccess,
  SearchRequest,
} from '../../config/types.js';
import {
  classifyError,
  ErrorCode,
  formatUnknownErrorMessage,
} from '../errors.js';
import type { ScanContext } from './scan-context.js';

export function formatCapWarning(maxMatches: number): string {
  return `Stopped early after reaching MAX_MATCHES=${maxMatches}`;
}

export function buildSuccessResult(
  request: SearchRequest,
  context: ScanContext
): GrepSearchSuccess {
  const result: GrepSearchSuccess = {
    success: true,
    pattern: request.pattern,
    path: request.path,
    recursive: request.recursive,
    matches: context.matches.map((match) => ({
      file: match.file,
      line_number: match.lineNumber,
      line_content: match.lineContent,
    })),
    total_matches: context.matches.length,
  };

  if (context.summary.capped) {
    result.warning = formatCapWarning(context.maxMatches);
  }
  return result;
}

export function toGrepFailure(
  error: unknown,
  requestedPath: string
): GrepSearchFailure {
  switch (classifyError(error)) {
    case ErrorCode.E_INVALID_PATTERN:
      return { error: formatUnknownErrorMessage(error) };
    case ErrorCode.E_NOT_FOUND:
      return { error: `Directory or file not found: ${requestedPath}` };
    case ErrorCode.E_PERMISSION_DENIED:
      return { error: `Permission denied accessing: ${requestedPath}` };
    default:
      return {
        error: `Failed to perform grep search: ${formatUnknownErrorMessage(error)}`,
      };
  }
}
