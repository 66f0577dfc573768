import { z } from 'zod';

import { MAX_PATTERN_LENGTH } from '../lib/constants.js';

const MAX_PATH_LENGTH = 4096;
const MAX_IDENTIFIER_LENGTH = 255;

export function isSinglePathSegment(value: string): boolean {
  if (value === '.' || value === '..') return false;
  return !/[/\\\0]/u.test(value);
}

export const SandboxPathSchema = z
  .string()
  .min(1, 'Path cannot be empty')
  .max(MAX_PATH_LENGTH, `Path is too long (max ${MAX_PATH_LENGTH} characters)`)
  .refine((value) => !value.includes('\0'), {
    message: 'Path contains null bytes',
  });

export const RegexPatternSchema = z
  .string()
  .min(1, 'Pattern cannot be empty')
  .max(
    MAX_PATTERN_LENGTH,
    `Pattern is too long (max ${MAX_PATTERN_LENGTH} characters)`
  );

export function sandboxIdentifierSchema(label: string): z.ZodString {
  return z
    .string()
    .min(1, `${label} cannot be empty`)
    .max(MAX_IDENTIFIER_LENGTH, `${label} is too long`)
    .refine(isSinglePathSegment, {
      message: `${label} must be a single path segment`,
    });
}

export const RecursiveSchema = z
  .boolean()
  .optional()
  .default(false)
  .describe(
    'Search subdirectories too. Dependency, VCS, build and cache directories (node_modules, .git, dist, ...) are always skipped'
  );
