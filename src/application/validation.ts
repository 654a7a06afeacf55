import type { z } from 'zod';

/** Flattens zod issues into a single log-friendly line. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
