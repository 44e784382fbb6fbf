import { z } from 'zod';
import type { DiffOptions } from './types';
import { logEvent } from './logger';

export const DEFAULT_DIFF_OPTIONS: Readonly<DiffOptions> = {
  contextLines: 3,
  ignoreWhitespace: false,
};

const diffOptionsSchema = z.object({
  contextLines: z.number().int().nonnegative().optional(),
  ignoreWhitespace: z.boolean().optional(),
});

export function resolveDiffOptions(input?: Partial<DiffOptions>): DiffOptions {
  const parsed = diffOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    logEvent('warn', 'Ignoring invalid diff options', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
    return { ...DEFAULT_DIFF_OPTIONS };
  }

  return {
    contextLines: parsed.data.contextLines ?? DEFAULT_DIFF_OPTIONS.contextLines,
    ignoreWhitespace: parsed.data.ignoreWhitespace ?? DEFAULT_DIFF_OPTIONS.ignoreWhitespace,
  };
}
