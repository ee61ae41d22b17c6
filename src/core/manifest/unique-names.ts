import { NameConflictError } from '../errors';
import { ManifestDocument } from '../../types';

/**
 * Collect every name that occurs more than once across the top-level name and
 * the explicit names of all environment overlays. Each duplicate appears once.
 */
export function findDuplicateNames(document: ManifestDocument): Set<string> {
  const seen = new Set<string>([document.name]);
  const duplicates = new Set<string>();

  for (const overlay of Object.values(document.environments ?? {})) {
    if (overlay.name === undefined) {
      continue;
    }
    if (seen.has(overlay.name)) {
      duplicates.add(overlay.name);
    } else {
      seen.add(overlay.name);
    }
  }

  return duplicates;
}

export function assertUniqueNames(document: ManifestDocument): void {
  const duplicates = findDuplicateNames(document);
  if (duplicates.size > 0) {
    throw new NameConflictError(duplicates);
  }
}
