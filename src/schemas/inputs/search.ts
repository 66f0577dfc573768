import { z } from 'zod';

import {
  RecursiveSchema,
  RegexPatternSchema,
  SandboxPathSchema,
  sandboxIdentifierSchema,
} from '../input-helpers.js';

export const GrepSearchInputSchema = z
  .object({
    path: SandboxPathSchema.describe(
      'File or directory to search, relative to the session root. Examples: ".", "src", "notes/todo.md"'
    ),
    pattern: RegexPatternSchema.describe(
      'Regular expression matched against each line. Examples: "TODO|FIXME", "^import ", "function\\s+\\w+"'
    ),
    workspace_id: sandboxIdentifierSchema('workspace_id').describe(
      'The ID of the workspace'
    ),
    agent_id: sandboxIdentifierSchema('agent_id').describe(
      'The ID of the agent'
    ),
    session_id: sandboxIdentifierSchema('session_id').describe(
      'The ID of the current session'
    ),
    recursive: RecursiveSchema,
  })
  .strict();
