import { PatchError, PatchErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ResolvedCommit } from '../types/patch.js';
import type { VcsRepository } from '../vcs/types.js';

// Exported patches must name a stable commit: no HEAD-style aliases, no ancestry
// selectors, no reflog entries, no ranges.
const RELATIVE_SYNTAX: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /HEAD/, reason: 'HEAD and other symbolic head aliases are not allowed' },
  { pattern: /^@$/, reason: '"@" is an alias for HEAD' },
  { pattern: /\^/, reason: 'ancestry selectors (^) are not allowed' },
  { pattern: /~/, reason: 'ancestry selectors (~) are not allowed' },
  { pattern: /@\{/, reason: 'reflog selectors (@{...}) are not allowed' },
  { pattern: /\.\./, reason: 'ranges are not supported; export each commit separately' },
  { pattern: /^-/, reason: 'references may not start with "-"' },
  { pattern: /\s/, reason: 'references may not contain whitespace' },
];

/** Throws INVALID_REFERENCE unless `reference` can name one explicit commit. */
export function validateReference(reference: string): void {
  if (reference.trim() === '') {
    throw new PatchError(PatchErrorCode.INVALID_REFERENCE, 'Commit reference is empty', { reference });
  }
  for (const { pattern, reason } of RELATIVE_SYNTAX) {
    if (pattern.test(reference)) {
      throw new PatchError(
        PatchErrorCode.INVALID_REFERENCE,
        `Invalid commit reference "${reference}": ${reason}. Use a commit hash or tag.`,
        { reference }
      );
    }
  }
}

export interface ResolveOptions {
  /** Export a commit even when no remote-tracking branch contains it. */
  allowLocal?: boolean;
}

/**
 * Resolve `reference` against the search repositories in order; the first one that
 * knows it supplies the commit.
 */
export async function resolveCommit(
  reference: string,
  repos: readonly VcsRepository[],
  options: ResolveOptions = {}
): Promise<ResolvedCommit> {
  validateReference(reference);

  for (const repo of repos) {
    const id = await repo.resolveReference(reference);
    if (id === null) continue;

    logger.debug({ reference, id, repository: repo.location }, 'Reference resolved');
    if (!options.allowLocal && !(await repo.isPublished(id))) {
      throw new PatchError(
        PatchErrorCode.LOCAL_COMMIT,
        `Commit ${id} exists only in the local repository ${repo.location}. Use --force to export it anyway.`,
        { reference, id, repository: repo.location }
      );
    }
    return repo.readCommit(id);
  }

  throw new PatchError(PatchErrorCode.UNKNOWN_COMMIT, `Could not locate commit "${reference}"`, {
    reference,
    searched: repos.map((repo) => repo.location),
  });
}
