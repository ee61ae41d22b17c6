import { z } from 'zod';
import { manifestDocumentSchema } from './manifest';
import { FormatError, MisplacedFieldError } from '../../core/errors';
import { ManifestDocument } from '../../types';

/**
 * Sections where a `kv-namespaces` key is a known placement mistake.
 */
const MISPLACED_KV_LOCATIONS = new Set(['site']);

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function findMisplacedField(issues: z.ZodIssue[]): MisplacedFieldError | undefined {
  for (const issue of issues) {
    if (issue.code !== z.ZodIssueCode.unrecognized_keys || issue.path.length !== 1) {
      continue;
    }
    const location = String(issue.path[0]);
    if (MISPLACED_KV_LOCATIONS.has(location) && issue.keys.includes('kv-namespaces')) {
      return new MisplacedFieldError('kv-namespaces', location);
    }
  }
  return undefined;
}

/**
 * Parse a generic key/value tree into a typed manifest document.
 * Throws FormatError (or its MisplacedFieldError subtype) on any schema violation.
 */
export function parseManifestDocument(tree: unknown): ManifestDocument {
  const result = manifestDocumentSchema.safeParse(tree);
  if (result.success) {
    return result.data;
  }

  const misplaced = findMisplacedField(result.error.issues);
  if (misplaced) {
    throw misplaced;
  }

  const issues = result.error.issues.map(formatIssue);
  throw new FormatError(`Invalid manifest:\n  ${issues.join('\n  ')}`, issues);
}

/**
 * Non-throwing variant, in the shape of the other validators.
 */
export function validateManifestDocument(tree: unknown): { valid: boolean; errors: string[] } {
  try {
    parseManifestDocument(tree);
    return { valid: true, errors: [] };
  } catch (error) {
    if (error instanceof FormatError) {
      return { valid: false, errors: error.issues };
    }
    throw error;
  }
}
