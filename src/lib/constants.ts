import { homedir } from 'node:os';
import * as path from 'node:path';

import { normalizePath } from './path-utils.js';

const TRUE_ENV_VALUES = new Set(['1', 'true', 'yes']);
const FALSE_ENV_VALUES = new Set(['0', 'false', 'no']);

// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const value = process.env[envVar];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

export function parseEnvFlag(envVar: string, defaultValue: boolean): boolean {
  const value = process.env[envVar]?.trim().toLowerCase();
  if (!value) return defaultValue;
  if (TRUE_ENV_VALUES.has(value)) return true;
  if (FALSE_ENV_VALUES.has(value)) return false;

  console.error(
    `[WARNING] Invalid ${envVar} value: ${value} (expected 1/0, true/false or yes/no). Using default: ${String(defaultValue)}`
  );
  return defaultValue;
}

export const HARD_MAX_MATCHES = 1000;

export const MAX_MATCHES = parseEnvInt(
  'SANDBOX_GREP_MAX_MATCHES',
  HARD_MAX_MATCHES,
  1,
  HARD_MAX_MATCHES
);

export const MAX_PATTERN_LENGTH = 1000;

// Longer lines are cut at this many characters before matching.
export const MAX_LINE_LENGTH = parseEnvInt(
  'SANDBOX_GREP_MAX_LINE_LENGTH',
  1_000_000,
  1_000,
  100_000_000
);

export const REDOS_GUARD_ENABLED = parseEnvFlag(
  'SANDBOX_GREP_REDOS_GUARD',
  true
);

export const DEFAULT_WORKSPACES_DIR = path.join(
  homedir(),
  '.sandbox-grep',
  'workspaces'
);

export function getConfiguredWorkspacesDir(): string {
  const fromEnv = process.env['SANDBOX_GREP_WORKSPACES_DIR']?.trim();
  return normalizePath(
    fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_WORKSPACES_DIR
  );
}

export const IGNORED_DIRECTORY_NAMES: ReadonlySet<string> = new Set([
  'node_modules',
  '.git',
  '__pycache__',
  '.venv',
  'venv',
  'dist',
  'build',
  '.pytest_cache',
  '.mypy_cache',
]);

export const BINARY_EXTENSIONS: ReadonlySet<string> = new Set([
  // compiled code and data stores
  '.pyc',
  '.pyo',
  '.pyd',
  '.class',
  '.o',
  '.so',
  '.dll',
  '.exe',
  '.dylib',
  '.db',
  '.sqlite',
  '.sqlite3',
  // archives
  '.zip',
  '.tar',
  '.gz',
  '.7z',
  '.rar',
  '.whl',
  // media and documents
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.webp',
  '.ico',
  '.svg',
  '.mp3',
  '.mp4',
  '.mov',
  '.avi',
  '.pdf',
  '.docx',
  '.xlsx',
  // fonts
  '.ttf',
  '.otf',
  '.woff',
  '.woff2',
]);
