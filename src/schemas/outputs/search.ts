import { z } from 'zod';

export const GrepMatchSchema = z.object({
  file: z.string().describe('Path relative to the session root'),
  line_number: z.number().int().describe('1-based line number'),
  line_content: z
    .string()
    .describe('Matching line, surrounding whitespace trimmed'),
});

export const GrepSearchOutputSchema = z.object({
  success: z.literal(true).optional(),
  pattern: z.string().optional(),
  path: z.string().optional(),
  recursive: z.boolean().optional(),
  matches: z.array(GrepMatchSchema).optional(),
  total_matches: z.number().int().optional(),
  warning: z
    .string()
    .optional()
    .describe('Present when the search stopped at the match cap'),
  error: z.string().optional(),
});
