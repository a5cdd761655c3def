/**
 * Reference data loading
 * Bundled JSON tables live in packages/core/data, beside src/
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { formatZodIssues } from './zod-issues.js';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Read a bundled JSON file and validate it against a schema
 * Throws ValidationError when the file does not match
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const path = fileURLToPath(new URL(fileName, DATA_DIR));
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(`Invalid reference data in ${fileName}`, {
      issues: formatZodIssues(result.error),
    });
  }
  return result.data;
}
