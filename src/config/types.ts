export interface SandboxIdentity {
  workspaceId: string;
  agentId: string;
  sessionId: string;
}

export type SearchRequest = Readonly<{
  path: string;
  pattern: string;
  sandbox: Readonly<SandboxIdentity>;
  recursive: boolean;
}>;

export interface GrepMatch {
  file: string;
  line_number: number;
  line_content: string;
}

export interface GrepSearchSuccess {
  success: true;
  pattern: string;
  path: string;
  recursive: boolean;
  matches: GrepMatch[];
  total_matches: number;
  warning?: string;
}

export interface GrepSearchFailure {
  error: string;
}

export type GrepSearchResult = GrepSearchSuccess | GrepSearchFailure;

export type SkipReason = 'not-text' | 'access-denied' | 'io-error';

export interface ScanSummary {
  filesScanned: number;
  filesMatched: number;
  skippedBinary: number;
  skippedInaccessible: number;
  directoriesPruned: number;
  symlinksNotFollowed: number;
  capped: boolean;
}

export const ErrorCode = {
  E_ACCESS_DENIED: 'E_ACCESS_DENIED',
  E_NOT_FOUND: 'E_NOT_FOUND',
  E_NOT_FILE: 'E_NOT_FILE',
  E_NOT_DIRECTORY: 'E_NOT_DIRECTORY',
  E_INVALID_PATTERN: 'E_INVALID_PATTERN',
  E_INVALID_INPUT: 'E_INVALID_INPUT',
  E_PERMISSION_DENIED: 'E_PERMISSION_DENIED',
  E_SYMLINK_NOT_ALLOWED: 'E_SYMLINK_NOT_ALLOWED',
  E_UNKNOWN: 'E_UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
