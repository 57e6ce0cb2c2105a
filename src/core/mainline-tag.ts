import { repositoriesFor } from '../config/loader.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { MAINLINE_KEY, type PatchConfig } from '../types/config.js';
import type { MainlineTag, ResolvedCommit } from '../types/patch.js';
import type { RepositoryOpener, VcsRepository } from '../vcs/types.js';

export const VERSION_PLACEHOLDER = '{version}';
const DEFAULT_QUEUED = 'Queued in subsystem maintainer repo';

/**
 * Scan the configured mainline repositories in order and stop at the first one whose
 * history contains the commit. No config, no candidates, or no match: unresolved.
 */
export async function resolveMainlineTag(
  commit: ResolvedCommit,
  config: PatchConfig | undefined,
  openRepository: RepositoryOpener
): Promise<MainlineTag> {
  const candidates = repositoriesFor(config, MAINLINE_KEY);

  for (const location of candidates) {
    let repo: VcsRepository | null;
    try {
      repo = await openRepository(location);
    } catch (err) {
      logger.debug({ location, error: describeError(err) }, 'Skipping mainline candidate');
      continue;
    }
    if (repo === null || !(await repo.contains(commit.id))) continue;

    const template = config?.mainlineTags[location] ?? VERSION_PLACEHOLDER;
    const value = await expandTemplate(template, commit.id, repo, config?.format.queued ?? DEFAULT_QUEUED);
    logger.debug({ commit: commit.id, repository: location, value }, 'Mainline tag resolved');
    return { kind: 'resolved', value, repository: location };
  }

  return { kind: 'unresolved' };
}

async function expandTemplate(template: string, id: string, repo: VcsRepository, queued: string): Promise<string> {
  if (!template.includes(VERSION_PLACEHOLDER)) return template;

  // Merged after the latest tag: name the release it will land in.
  const version = (await repo.describeVersion(id)) ?? (await repo.nextVersion());
  if (version === null) return queued;
  return template.split(VERSION_PLACEHOLDER).join(version);
}

export function renderMainlineTag(tag: MainlineTag, notInMainline: string): string {
  return tag.kind === 'resolved' ? tag.value : notInMainline;
}
