import * as os from 'node:os';
import * as path from 'node:path';

export function expandHome(filepath: string): string {
  if (filepath === '~') return os.homedir();
  if (filepath.startsWith('~/')) {
    return path.join(os.homedir(), filepath.slice(2));
  }
  return filepath;
}

/**
 * Absolute, `~`-expanded form of a configured directory. On Windows the
 * drive letter is lowercased so comparisons against resolved paths agree.
 */
export function normalizePath(p: string): string {
  const resolved = path.resolve(expandHome(p.trim()));

  if (process.platform === 'win32' && /^[A-Z]:/.test(resolved)) {
    return resolved.charAt(0).toLowerCase() + resolved.slice(1);
  }

  return resolved;
}
