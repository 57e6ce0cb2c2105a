import type { ResolvedCommit } from '../types/patch.js';

/**
 * The version-control collaborator. The core only reads through this interface;
 * nothing here may change repository state.
 */
export interface VcsRepository {
  /** Location the repository was opened from, as configured. */
  readonly location: string;

  /** Full commit id for `reference`, or null when this repository does not know it. */
  resolveReference(reference: string): Promise<string | null>;

  /** Commit metadata and its ordered per-file changes. */
  readCommit(id: string): Promise<ResolvedCommit>;

  /** Whether `id` is reachable from this repository's tracked history (its HEAD). */
  contains(id: string): Promise<boolean>;

  /** First release tag containing `id` (e.g. `v6.3-rc2`), or null. */
  describeVersion(id: string): Promise<string | null>;

  /** Predicted tag of the next release, from the latest release tag. */
  nextVersion(): Promise<string | null>;

  /** False when the commit exists only locally (no remote-tracking branch contains it). */
  isPublished(id: string): Promise<boolean>;
}

/** Opens the repository at a configured location; null when there is none. */
export type RepositoryOpener = (location: string) => Promise<VcsRepository | null>;
