import type { z } from 'zod';

/**
 * Flatten zod issues to "path: message" strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.map(String).join('.') : 'root';
    return `${path}: ${issue.message}`;
  });
}
